import { ErrorCode } from '../enum/error-code.enum';
import { Coordinate, Digit } from '../interface/sudoku.interface';
import type { Board } from '../model/board.model';
import { square_name } from '../model/peers.model';

/**
 * Base class of every error raised by the solver.
 */
export class SudokuError extends Error {
    constructor(public readonly code: ErrorCode, message: string = code) {
        super(message);
        this.name = 'SudokuError';
    }
}

/**
 * The input ended before all 81 squares were read.
 *
 * `partial` is the board built so far. It is only meant for diagnostics.
 */
export class ParseError extends SudokuError {
    constructor(public readonly cells_read: number, public readonly partial: Board) {
        super(ErrorCode.ERR_INPUT_INCOMPLETE, ErrorCode.ERR_INPUT_INCOMPLETE.replace('{cells}', String(cells_read)));
        this.name = 'ParseError';
    }
}

/**
 * An assignment contradicts the board, either directly or through propagation.
 */
export class ConflictError extends SudokuError {
    public readonly square: string;

    constructor(public readonly coordinate: Coordinate, public readonly digit: Digit) {
        const square = square_name(coordinate);
        super(ErrorCode.ERR_CONFLICT, ErrorCode.ERR_CONFLICT.replace('{digit}', String(digit)).replace('{square}', square));
        this.name = 'ConflictError';
        this.square = square;
    }
}

export class UnsolvableError extends SudokuError {
    constructor() {
        super(ErrorCode.ERR_UNSOLVABLE);
        this.name = 'UnsolvableError';
    }
}

/**
 * Check if error is raised by the solver.
 */
export function is_sudoku_error(error: unknown): error is SudokuError {
    return error instanceof SudokuError;
}
