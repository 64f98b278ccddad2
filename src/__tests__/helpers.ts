import { expect } from 'vitest';
import { BoardGrid } from '../interface/sudoku.interface';

export const PARTIAL_TEXT = `4 . . |. . . |8 . 5
. 3 . |. . . |. . .
. . . |7 . . |. . .
------+------+------
. 2 . |. . . |. 6 .
. . . |. 8 . |4 . .
. . . |. 1 . |. . .
------+------+------
. . . |6 . 3 |. 7 .
5 . . |2 . . |. . .
1 . 4 |. . . |. . .
`;

export const PARTIAL_GRID: BoardGrid = [
    [ 4, 0, 0, 0, 0, 0, 8, 0, 5 ],
    [ 0, 3, 0, 0, 0, 0, 0, 0, 0 ],
    [ 0, 0, 0, 7, 0, 0, 0, 0, 0 ],
    [ 0, 2, 0, 0, 0, 0, 0, 6, 0 ],
    [ 0, 0, 0, 0, 8, 0, 4, 0, 0 ],
    [ 0, 0, 0, 0, 1, 0, 0, 0, 0 ],
    [ 0, 0, 0, 6, 0, 3, 0, 7, 0 ],
    [ 5, 0, 0, 2, 0, 0, 0, 0, 0 ],
    [ 1, 0, 4, 0, 0, 0, 0, 0, 0 ],
];

// the same board as PARTIAL_TEXT, on a single line
export const PARTIAL_LINE = '4.....8.5.3..........7......2.....6.....8.4......1.......6.3.7.5..2.....1.4......';

// same as PARTIAL_TEXT, with a second 4 in the first row
export const DUPLICATE_TEXT = PARTIAL_TEXT.replace('4 . . |', '4 . 4 |');

// Arto Inkala's "hardest sudoku"
export const INKALA_TEXT = `8 5 . |. . 2 |4 . .
    7 2 . |. . . |. . 9
    . . 4 |. . . |. . .
    ------+------+------
    . . . |1 . 7 |. . 2
    3 . 5 |. . . |9 . .
    . 4 . |. . . |. . .
    ------+------+------
    . . . |. 8 . |. 7 .
    . 1 7 |. . . |. . .
    . . . |. 3 6 |. 4 .
`;

export const INKALA_SOLUTION_TEXT = `8 5 9 |6 1 2 |4 3 7
7 2 3 |8 5 4 |1 6 9
1 6 4 |3 7 9 |5 2 8
------+------+------
9 8 6 |1 4 7 |3 5 2
3 7 5 |2 6 8 |9 1 4
2 4 1 |5 9 3 |7 8 6
------+------+------
4 3 2 |9 8 1 |6 7 5
6 1 7 |4 2 5 |8 9 3
5 9 8 |7 3 6 |2 4 1
`;

export const INKALA_SOLUTION_GRID: BoardGrid = [
    [ 8, 5, 9, 6, 1, 2, 4, 3, 7 ],
    [ 7, 2, 3, 8, 5, 4, 1, 6, 9 ],
    [ 1, 6, 4, 3, 7, 9, 5, 2, 8 ],
    [ 9, 8, 6, 1, 4, 7, 3, 5, 2 ],
    [ 3, 7, 5, 2, 6, 8, 9, 1, 4 ],
    [ 2, 4, 1, 5, 9, 3, 7, 8, 6 ],
    [ 4, 3, 2, 9, 8, 1, 6, 7, 5 ],
    [ 6, 1, 7, 4, 2, 5, 8, 9, 3 ],
    [ 5, 9, 8, 7, 3, 6, 2, 4, 1 ],
];

// Row A holds 1-6 and B7 holds 9, so A7, A8 and A9 can only take 7 or 8.
// Propagation accepts it, search cannot complete it.
export const UNSOLVABLE_LINE = '123456...' + '......9..' + '.'.repeat(63);

/**
 * Assert that every row, column and box holds each digit exactly once.
 *
 * @param grid
 */
export function expect_valid_solution(grid: BoardGrid): void {
    const expected = [ 1, 2, 3, 4, 5, 6, 7, 8, 9 ];
    const sorted = (values: number[]) => [ ...values ].sort((a, b) => a - b);

    for (let i = 0; i < 9; ++i) {
        expect(sorted(grid[i])).toEqual(expected);
        expect(sorted(grid.map(row => row[i]))).toEqual(expected);

        const box_row = Math.floor(i / 3) * 3;
        const box_col = (i % 3) * 3;
        const box = grid.slice(box_row, box_row + 3).flatMap(row => row.slice(box_col, box_col + 3));
        expect(sorted(box)).toEqual(expected);
    }
}
