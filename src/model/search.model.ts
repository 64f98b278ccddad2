import { CellKind } from '../enum/cell-kind.enum';
import { Coordinate } from '../interface/sudoku.interface';
import type { Board } from './board.model';
import { OpenCell } from './cell.model';
import { NR_SQUARES } from './peers.model';

/**
 * Given a `board`, using depth-first search, recursively try all candidates
 * of the most constrained open square until a solution is found, or `false`
 * if no solution exists.
 *
 * Boards are immutable, so a failed branch is simply dropped and the next
 * candidate is tried against the same `board`.
 *
 * @param board
 */
export function search(board: Board): Board | false {
    // find the open square with the most eliminated candidates; on ties the
    // last one in row-major order wins
    let max_nr_eliminated = 0;
    let max_eliminated_square: Coordinate = -1;
    let max_eliminated_cell: OpenCell | null = null;

    for (let square = 0; square < NR_SQUARES; ++square) {
        const cell = board.cell(square);

        if (cell.kind === CellKind.OPEN && cell.nr_eliminated >= max_nr_eliminated) {
            max_nr_eliminated = cell.nr_eliminated;
            max_eliminated_square = square;
            max_eliminated_cell = cell;
        }
    }

    // no open square left, we've a solved puzzle!
    if (max_eliminated_cell === null) {
        return board;
    }

    for (const digit of max_eliminated_cell.possible_digits()) {
        const next = board.try_assign(max_eliminated_square, digit);

        // if the assignment causes a contradiction, try the next candidate
        if (!next) {
            continue;
        }

        const solution = search(next);
        if (solution) {
            return solution;
        }
    }

    // if we get through all candidates of the square without finding an
    // answer, there isn't one
    return false;
}
