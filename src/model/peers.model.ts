import { Coordinate, Digit, PeersTable, Unit, UnitsTable } from '../interface/sudoku.interface';

// Square relationships
// -------------------------------------------------------------------------
// Squares and their relationships with units and peers. Everything here is
// computed once when the module loads and frozen afterwards.

export const ROWS: string = 'ABCDEFGHI';
export const COLS: string = '123456789';
export const DIGITS: readonly Digit[] = Object.freeze([ 1, 2, 3, 4, 5, 6, 7, 8, 9 ]);
export const NR_SQUARES = 81;

/**
 * Coordinate of the square at `row` and `col`, both counted from 0.
 *
 * @param row
 * @param col
 */
export function coord(row: number, col: number): Coordinate {
    return row * 9 + col;
}

/**
 * Human-readable name of a square, e.g. `A1` for 0 and `I9` for 80.
 *
 * @param coordinate
 */
export function square_name(coordinate: Coordinate): string {
    return ROWS[Math.floor(coordinate / 9)] + COLS[coordinate % 9];
}

/**
 * Narrow a number to a digit, or `undefined` if it is not one.
 *
 * @param value
 */
export function to_digit(value: number): Digit | undefined {
    return DIGITS.find(digit => digit === value);
}

/**
 * Cross product of row and column indices, e.g.,
 *   _cross([0, 1], [0, 1]) -> [0, 1, 9, 10]
 *
 * @param rows
 * @param cols
 */
function _cross(rows: number[], cols: number[]): Coordinate[] {
    const result: Coordinate[] = [];

    for (const row of rows) {
        for (const col of cols) {
            result.push(coord(row, col));
        }
    }

    return result;
}

/**
 * Get a list of all units: rows, then columns, then boxes.
 */
function _get_all_units(): Unit[] {
    const indices = [ 0, 1, 2, 3, 4, 5, 6, 7, 8 ];
    const units: Unit[] = [];

    // collect rows
    for (const row of indices) {
        units.push(_cross([ row ], indices));
    }

    // collect columns
    for (const col of indices) {
        units.push(_cross(indices, [ col ]));
    }

    // collect boxes
    const bands = [ [ 0, 1, 2 ], [ 3, 4, 5 ], [ 6, 7, 8 ] ];
    for (const band_rows of bands) {
        for (const band_cols of bands) {
            units.push(_cross(band_rows, band_cols));
        }
    }

    return units.map(unit => Object.freeze(unit));
}

/**
 * Return, for each square, the units it is a member of.
 *
 * @param units
 */
function _get_square_units_map(units: Unit[]): UnitsTable {
    const square_units: Unit[][] = [];

    for (let square = 0; square < NR_SQUARES; ++square) {
        square_units.push(units.filter(unit => unit.includes(square)));
    }

    return square_units;
}

/**
 * Return, for each square, the other squares of its units without duplicates.
 *
 * @param units_map
 */
function _get_square_peers_map(units_map: UnitsTable): PeersTable {
    const square_peers: (readonly Coordinate[])[] = [];

    for (let square = 0; square < NR_SQUARES; ++square) {
        const peers: Coordinate[] = [];

        for (const unit of units_map[square]) {
            for (const unit_square of unit) {
                if (unit_square !== square && !peers.includes(unit_square)) {
                    peers.push(unit_square);
                }
            }
        }

        square_peers.push(Object.freeze(peers));
    }

    return Object.freeze(square_peers);
}

export const UNITS: readonly Unit[] = Object.freeze(_get_all_units());
export const SQUARE_UNITS: UnitsTable = _get_square_units_map([ ...UNITS ]);
export const PEERS: PeersTable = _get_square_peers_map(SQUARE_UNITS);
