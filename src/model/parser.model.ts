import { ConflictError, ParseError } from '../error/sudoku.error';
import { Digit } from '../interface/sudoku.interface';
import { Board } from './board.model';
import { NR_SQUARES, to_digit } from './peers.model';

/**
 * A square token read from the input: a digit, or 0 for an open square.
 */
type Token = Digit | 0;

/**
 * Reads sudoku boards from a text, one after another.
 *
 * The following semantics apply to every square, in row-major order:
 *
 * - Any digit except zero fills the square directly. If a conflict arises
 *   (same digit in the same column, for example), a `ConflictError` is thrown.
 * - A zero or dot (`0` or `.`) leaves the square open.
 * - Any other character is ignored.
 *
 * Thanks to this a board parses the same from a decorated grid as from a
 * single line of 81 characters.
 */
export class BoardReader {
    private position = 0;

    constructor(private readonly text: string) {}

    /**
     * Whether there is at least one more square token in the input.
     */
    public has_next(): boolean {
        for (let i = this.position; i < this.text.length; ++i) {
            if (BoardReader._token(this.text[i]) !== undefined) {
                return true;
            }
        }

        return false;
    }

    /**
     * Read the next 81 squares into a board.
     *
     * On a conflict the rest of the board is still consumed, so that the
     * next call starts at the following board.
     */
    public read(): Board {
        let board = Board.empty();
        let conflict: ConflictError | null = null;

        for (let square = 0; square < NR_SQUARES; ++square) {
            const token = this._next_token();

            if (token === undefined) {
                throw new ParseError(square, board);
            }

            if (token === 0 || conflict) {
                continue;
            }

            const next = board.try_assign(square, token);
            if (next) {
                board = next;
            } else {
                conflict = new ConflictError(square, token);
            }
        }

        if (conflict) {
            throw conflict;
        }

        return board;
    }

    private _next_token(): Token | undefined {
        while (this.position < this.text.length) {
            const token = BoardReader._token(this.text[this.position++]);

            if (token !== undefined) {
                return token;
            }
        }

        return undefined;
    }

    private static _token(char: string): Token | undefined {
        if (char === Board.BLANK_CHAR || char === '0') {
            return 0;
        }

        // anything but 1-9 is noise
        return /^[1-9]$/.test(char) ? to_digit(Number(char)) : undefined;
    }
}

/**
 * Parse a single board from `text`. See `BoardReader` for the format.
 *
 * @param text
 */
export function parse(text: string): Board {
    return new BoardReader(text).read();
}

/**
 * Parse every board in `text`, e.g. a file with one puzzle per line.
 *
 * @param text
 */
export function parse_all(text: string): Board[] {
    const reader = new BoardReader(text);
    const boards: Board[] = [];

    while (reader.has_next()) {
        boards.push(reader.read());
    }

    return boards;
}
