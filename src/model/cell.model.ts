import { CellKind } from '../enum/cell-kind.enum';
import { Digit } from '../interface/sudoku.interface';
import { DIGITS } from './peers.model';

/**
 * A square holding a committed digit.
 */
export class FilledCell {
    public readonly kind = CellKind.FILLED;

    private static readonly INSTANCES: readonly FilledCell[] = DIGITS.map(digit => new FilledCell(digit));

    private constructor(public readonly digit: Digit) {}

    public static of(digit: Digit): FilledCell {
        return FilledCell.INSTANCES[digit - 1];
    }
}

/**
 * A square without a digit yet. Bit `d` of `eliminated` is set once digit `d`
 * is ruled out; `nr_eliminated` caches the number of set bits and stays below 8.
 */
export class OpenCell {
    public readonly kind = CellKind.OPEN;

    public static readonly EMPTY: OpenCell = new OpenCell(0, 0);

    private constructor(public readonly eliminated: number, public readonly nr_eliminated: number) {}

    /**
     * Rule out `digit`. Returns a filled cell once a single digit is left,
     * and this cell itself if `digit` was already ruled out.
     *
     * @param digit
     */
    public eliminate(digit: Digit): Cell {
        if (!this.is_possible(digit)) {
            return this;
        }

        const next = new OpenCell(this.eliminated | (1 << digit), this.nr_eliminated + 1);
        if (next.nr_eliminated === 8) {
            return FilledCell.of(next.possible_digits()[0]);
        }

        return next;
    }

    /**
     * Digits not ruled out yet, in ascending order.
     */
    public possible_digits(): Digit[] {
        return DIGITS.filter(digit => this.is_possible(digit));
    }

    public is_possible(digit: Digit): boolean {
        return (this.eliminated & (1 << digit)) === 0;
    }
}

export type Cell = FilledCell | OpenCell;

/**
 * Structural equality of two cells.
 *
 * @param a
 * @param b
 */
export function cells_equal(a: Cell, b: Cell): boolean {
    switch (a.kind) {
        case CellKind.FILLED:
            return b.kind === CellKind.FILLED && b.digit === a.digit;
        case CellKind.OPEN:
            return b.kind === CellKind.OPEN && b.eliminated === a.eliminated;
    }
}
