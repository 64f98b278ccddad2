/**
 * Reads sudoku puzzles from stdin and prints their solutions.
 *
 * Usage: sudoku [--json] [--all] < puzzle.txt
 */
import { is_sudoku_error, UnsolvableError } from '../error/sudoku.error';
import { Board } from '../model/board.model';
import { BoardReader } from '../model/parser.model';

export interface CliOutput {
    log(message: string): void;
    error(message: string): void;
}

interface CliOptions {
    json: boolean;
    all: boolean;
    help: boolean;
}

const USAGE = [
    'Usage: sudoku [--json] [--all] < puzzle.txt',
    '',
    'Reads a puzzle from stdin and prints its solution.',
    '  Digits 1-9 are givens, 0 or . are open squares, anything else is ignored.',
    '',
    'Options:',
    '  --json      print the solution as a JSON grid (0 for open squares)',
    '  --all       solve every puzzle in the input, not only the first',
    '  -h, --help  show this help',
].join('\n');

const NO_SOLUTION = 'NO SOLUTION FOUND';

function parse_options(args: string[]): CliOptions | string {
    const options: CliOptions = { json: false, all: false, help: false };

    for (const arg of args) {
        switch (arg) {
            case '--json':
                options.json = true;
                break;
            case '--all':
                options.all = true;
                break;
            case '-h':
            case '--help':
                options.help = true;
                break;
            default:
                return `Unknown option: ${arg}`;
        }
    }

    return options;
}

function render(board: Board, options: CliOptions): string {
    return options.json ? JSON.stringify(board.as_grid()) : board.to_text().trimEnd();
}

/**
 * Solve the next puzzle of `reader`. Returns the rendered solution, or the
 * message to report on failure.
 */
function solve_next(reader: BoardReader, options: CliOptions): { ok: true; text: string } | { ok: false; message: string } {
    let board: Board;

    try {
        board = reader.read();
    } catch (error) {
        if (is_sudoku_error(error)) {
            return { ok: false, message: error.message };
        }
        throw error;
    }

    try {
        return { ok: true, text: render(board.solve(), options) };
    } catch (error) {
        if (error instanceof UnsolvableError) {
            return { ok: false, message: NO_SOLUTION };
        }
        throw error;
    }
}

/**
 * Run the command line tool on `input` and return the exit code.
 *
 * @param args arguments without the node executable and script
 * @param input the whole of stdin
 * @param output
 */
export function run(args: string[], input: string, output: CliOutput = console): number {
    const options = parse_options(args);

    if (typeof options === 'string') {
        output.error(`${options}\n${USAGE}`);
        return 2;
    }

    if (options.help) {
        output.log(USAGE);
        return 0;
    }

    const reader = new BoardReader(input);

    if (!options.all) {
        const result = solve_next(reader, options);

        if (!result.ok) {
            output.error(result.message);
            return 1;
        }

        output.log(result.text);
        return 0;
    }

    let failed = 0;
    let count = 0;

    while (reader.has_next()) {
        const result = solve_next(reader, options);
        count++;

        if (!result.ok) {
            output.error(`puzzle ${count}: ${result.message}`);
            failed++;
            continue;
        }

        // blank line between grids
        if (count - failed > 1 && !options.json) {
            output.log('');
        }
        output.log(result.text);
    }

    return failed > 0 ? 1 : 0;
}
