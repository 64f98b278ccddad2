/**
 * Index of a square on the board, row-major: `row * 9 + col`.
 * Always in the range [0, 81).
 */
export type Coordinate = number;

/**
 * A digit that can be placed on the board.
 */
export type Digit = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

/**
 * Grid representation of a sudoku board.
 * It is a two-dimensional array of digits, 0 marks an open square.
 */
export type BoardGrid = number[][];

/**
 * A row, column or box: the 9 squares that must hold each digit once.
 */
export type Unit = readonly Coordinate[];

/**
 * For every square, the other squares sharing one of its units.
 */
export type PeersTable = readonly (readonly Coordinate[])[];

/**
 * For every square, the three units (row, col, box) it belongs to.
 */
export type UnitsTable = readonly (readonly Unit[])[];
