import { CellKind } from '../enum/cell-kind.enum';
import { ErrorCode } from '../enum/error-code.enum';
import { ConflictError, SudokuError, UnsolvableError } from '../error/sudoku.error';
import { BoardGrid, Coordinate, Digit } from '../interface/sudoku.interface';
import { Cell, cells_equal, FilledCell, OpenCell } from './cell.model';
import { coord, NR_SQUARES, PEERS, to_digit } from './peers.model';
import { search } from './search.model';

/**
 * An immutable sudoku board of 81 cells.
 *
 * Every operation that places a digit returns a new board, so a board can be
 * kept and reused after deriving other boards from it.
 */
export class Board {

    public static readonly BLANK_CHAR: string = '.';

    private static readonly EMPTY: Board = new Board(new Array<Cell>(NR_SQUARES).fill(OpenCell.EMPTY));

    private constructor(private readonly cells: readonly Cell[]) {}

    /**
     * A board with every square open and nothing eliminated.
     */
    public static empty(): Board {
        return Board.EMPTY;
    }

    public cell(coordinate: Coordinate): Cell {
        return this.cells[coordinate];
    }

    /**
     * Place `digit` at `coordinate` and propagate. Throws a `ConflictError`
     * if the assignment or anything it forces contradicts the board.
     *
     * @param coordinate
     * @param digit
     */
    public assign(coordinate: Coordinate, digit: Digit): Board {
        const next = this.try_assign(coordinate, digit);

        if (!next) {
            throw new ConflictError(coordinate, digit);
        }

        return next;
    };

    /**
     * Same as `assign`, but return `false` on a contradiction instead of
     * throwing. Used by the search, where contradictions are expected.
     *
     * @param coordinate
     * @param digit
     */
    public try_assign(coordinate: Coordinate, digit: Digit): Board | false {
        const cells = [ ...this.cells ];

        if (!Board._assign(cells, coordinate, digit)) {
            return false;
        }

        return new Board(cells);
    };

    /**
     * Place `digit` at `row` and `col`, both counted from 0.
     *
     * @param row
     * @param col
     * @param digit
     */
    public with_cell(row: number, col: number, digit: number): Board {
        if (!Number.isInteger(row) || !Number.isInteger(col) || row < 0 || row > 8 || col < 0 || col > 8) {
            throw new SudokuError(ErrorCode.ERR_COORDINATE_INVALID);
        }

        const valid_digit = to_digit(digit);
        if (valid_digit === undefined) {
            throw new SudokuError(ErrorCode.ERR_DIGIT_INVALID);
        }

        return this.assign(coord(row, col), valid_digit);
    };

    /**
     * Complete the board by search. Throws an `UnsolvableError` if no
     * completion exists. If there are several, the first one found is returned.
     */
    public solve(): Board {
        const solution = search(this);

        if (!solution) {
            throw new UnsolvableError();
        }

        return solution;
    };

    public is_solved(): boolean {
        return this.cells.every(cell => cell.kind === CellKind.FILLED);
    }

    public filled_count(): number {
        return this.cells.filter(cell => cell.kind === CellKind.FILLED).length;
    }

    public equals(other: Board): boolean {
        return this.cells.every((cell, i) => cells_equal(cell, other.cells[i]));
    }


    // Conversions
    // -------------------------------------------------------------------------

    /**
     * Convert the board to a two-dimensional array, 0 for open squares.
     * The grid is a fresh copy and may be modified freely.
     */
    public as_grid(): BoardGrid {
        const rows: BoardGrid = [];

        for (let r = 0; r < 9; ++r) {
            const row: number[] = [];

            for (let c = 0; c < 9; ++c) {
                const cell = this.cells[coord(r, c)];
                row.push(cell.kind === CellKind.FILLED ? cell.digit : 0);
            }

            rows.push(row);
        }

        return rows;
    };

    /**
     * Render the board as text, with lines separating the boxes:
     *
     *     4 . . |. . . |8 . 5
     *     . 3 . |. . . |. . .
     *     . . . |7 . . |. . .
     *     ------+------+------
     *     ...
     */
    public to_text(): string {
        // horizontal box padding
        const H_BOX_PADDING = '------+------+------\n';

        let display_string = '';

        for (const [ key, cell ] of this.cells.entries()) {
            display_string += cell.kind === CellKind.FILLED ? String(cell.digit) : Board.BLANK_CHAR;

            // end of a line, vertical edge of a box, or just the next square
            if (key % 9 === 8) {
                display_string += '\n';
            } else if (key % 3 === 2) {
                display_string += ' |';
            } else {
                display_string += ' ';
            }

            // horizontal edge of a box between bands
            if (key === 26 || key === 53) {
                display_string += H_BOX_PADDING;
            }
        }

        return display_string;
    };


    // Propagation
    // -------------------------------------------------------------------------

    /**
     * Fill `digit` in at `coordinate` and eliminate it from all peers. Any
     * peer left with a single candidate is assigned in turn, so the cascade
     * runs until nothing new is determined. Return `false` on a contradiction.
     *
     * WARNING: This will modify the contents of `cells` directly. On `false`
     * the array is left half-updated and must be thrown away.
     *
     * @param cells
     * @param coordinate
     * @param digit
     */
    private static _assign(cells: Cell[], coordinate: Coordinate, digit: Digit): boolean {
        const target = cells[coordinate];

        switch (target.kind) {
            case CellKind.OPEN:
                // the square is open, but the digit was ruled out already
                if (!target.is_possible(digit)) {
                    return false;
                }
                break;
            case CellKind.FILLED:
                // committed squares are never rewritten
                if (target.digit !== digit) {
                    return false;
                }
                break;
        }

        cells[coordinate] = FilledCell.of(digit);

        for (const peer of PEERS[coordinate]) {
            const cell = cells[peer];

            switch (cell.kind) {
                case CellKind.FILLED:
                    if (cell.digit === digit) {
                        return false;
                    }
                    break;
                case CellKind.OPEN: {
                    const next = cell.eliminate(digit);

                    if (next.kind === CellKind.FILLED) {
                        if (!Board._assign(cells, peer, next.digit)) {
                            return false;
                        }
                    } else {
                        cells[peer] = next;
                    }
                    break;
                }
            }
        }

        return true;
    };
}
