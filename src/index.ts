/*
    sudoku-propagate
    ----------------

    A sudoku solver library based on constraint propagation and search.

    Whenever a digit is placed, it is eliminated from the square's peers. A peer
    left with a single candidate is filled in turn. Whatever propagation cannot
    settle is completed by trying the candidates of the most constrained square.
*/
import { CellKind } from './enum/cell-kind.enum';
import { ErrorCode } from './enum/error-code.enum';
import { ConflictError, is_sudoku_error, ParseError, SudokuError, UnsolvableError } from './error/sudoku.error';
import { Board } from './model/board.model';
import { FilledCell, OpenCell } from './model/cell.model';
import { BoardReader, parse, parse_all } from './model/parser.model';
import { coord, DIGITS, PEERS, square_name, UNITS } from './model/peers.model';

export type { Cell } from './model/cell.model';
export type { BoardGrid, Coordinate, Digit, PeersTable, Unit } from './interface/sudoku.interface';

export {
    Board,
    BoardReader,
    CellKind,
    ConflictError,
    coord,
    DIGITS,
    ErrorCode,
    FilledCell,
    is_sudoku_error,
    OpenCell,
    parse,
    parse_all,
    ParseError,
    PEERS,
    square_name,
    SudokuError,
    UNITS,
    UnsolvableError,
};
