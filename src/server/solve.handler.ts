import { z } from 'zod';
import { ErrorCode } from '../enum/error-code.enum';
import { is_sudoku_error, SudokuError, UnsolvableError } from '../error/sudoku.error';
import { Board } from '../model/board.model';
import { parse } from '../model/parser.model';
import { render_page } from './page.template';

export interface HandlerRequest {
    method: string;
    content_type?: string;
    body: string;
}

export interface HandlerResponse {
    status: number;
    headers: Record<string, string>;
    body: string;
}

/**
 * JSON bodies either carry the puzzle text, or the 81 squares row by row
 * with 0 for open squares.
 */
export const SolveBodySchema = z.union([
    z.object({ sudoku: z.string() }),
    z.object({ board: z.array(z.number().int().min(0).max(9)).length(81) }),
]);

export type SolveBody = z.infer<typeof SolveBodySchema>;

const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';
const JSON_CONTENT_TYPE = 'application/json';

function media_type(content_type: string | undefined): string {
    return (content_type ?? '').split(';')[0].trim().toLowerCase();
}

/**
 * Extract the puzzle text from a request body, depending on its content type.
 *
 * @param request
 */
export function get_source(request: HandlerRequest): string {
    switch (media_type(request.content_type)) {
        case FORM_CONTENT_TYPE:
            return new URLSearchParams(request.body).get('sudoku') ?? '';
        case JSON_CONTENT_TYPE: {
            let payload: unknown;
            try {
                payload = JSON.parse(request.body);
            } catch {
                throw new SudokuError(ErrorCode.ERR_REQUEST_INVALID, `${ErrorCode.ERR_REQUEST_INVALID}: malformed JSON`);
            }

            const parsed = SolveBodySchema.safeParse(payload);
            if (!parsed.success) {
                throw new SudokuError(
                    ErrorCode.ERR_REQUEST_INVALID,
                    `${ErrorCode.ERR_REQUEST_INVALID}: expected "sudoku" text or a "board" of 81 digits`,
                );
            }

            return 'sudoku' in parsed.data ? parsed.data.sudoku : parsed.data.board.join('');
        }
        default:
            return request.body;
    }
}

export function generic_solve(source: string): Board {
    return parse(source).solve();
}

function error_status(error: SudokuError): number {
    return error instanceof UnsolvableError ? 422 : 400;
}

function json_response(status: number, payload: unknown, headers: Record<string, string> = {}): HandlerResponse {
    return {
        status,
        headers: { 'Content-Type': JSON_CONTENT_TYPE, ...headers },
        body: JSON.stringify(payload),
    };
}

function html_response(status: number, body: string, headers: Record<string, string> = {}): HandlerResponse {
    return {
        status,
        headers: { 'Content-Type': 'text/html; charset=utf-8', ...headers },
        body,
    };
}

/**
 * `POST /solve`: answer with the solved grid as JSON.
 *
 * @param request
 */
export function handle_solve(request: HandlerRequest): HandlerResponse {
    if (request.method !== 'POST') {
        return json_response(405, { error: 'Invalid method, only POST allowed' }, { Allow: 'POST' });
    }

    try {
        const solved = generic_solve(get_source(request));
        return json_response(200, solved.as_grid());
    } catch (error) {
        if (is_sudoku_error(error)) {
            return json_response(error_status(error), { error: error.message });
        }
        throw error;
    }
}

/**
 * `GET /` shows the input form, `POST /` shows it again with the solution
 * or the error next to it.
 *
 * @param request
 */
export function handle_page(request: HandlerRequest): HandlerResponse {
    if (request.method === 'GET' || request.method === 'HEAD') {
        return html_response(200, render_page({ source: '' }));
    }

    if (request.method !== 'POST') {
        return html_response(405, render_page({ source: '', error: 'Invalid method' }), { Allow: 'GET, POST' });
    }

    let source = '';
    try {
        source = get_source(request);
        const solved = generic_solve(source);
        return html_response(200, render_page({ source, grid: solved.as_grid() }));
    } catch (error) {
        if (is_sudoku_error(error)) {
            return html_response(error_status(error), render_page({ source, error: error.message }));
        }
        throw error;
    }
}
