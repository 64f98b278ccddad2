import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { ServerConfig } from './config';
import { handle_page, handle_solve, type HandlerRequest, type HandlerResponse } from './solve.handler';

type Route = (request: HandlerRequest) => HandlerResponse;

const ROUTES: Record<string, Route> = {
    '/': handle_page,
    '/solve': handle_solve,
};

class BodyTooLargeError extends Error {
    constructor(limit: number) {
        super(`Request body exceeds ${limit} bytes`);
        this.name = 'BodyTooLargeError';
    }
}

/**
 * Read the request body as text.
 *
 * A body over `limit` bytes is drained without buffering and rejected once it ends.
 *
 * @param req
 * @param limit
 */
function read_body(req: IncomingMessage, limit: number): Promise<string> {
    const method = (req.method || 'GET').toUpperCase();
    if (method === 'GET' || method === 'HEAD') {
        return Promise.resolve('');
    }
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        let size = 0;
        req.on('data', (chunk) => {
            const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
            size += buffer.length;
            if (size <= limit) {
                chunks.push(buffer);
            }
        });
        req.on('end', () => {
            if (size > limit) {
                reject(new BodyTooLargeError(limit));
                return;
            }
            resolve(Buffer.concat(chunks).toString('utf8'));
        });
        req.on('error', reject);
    });
}

function send(res: ServerResponse, response: HandlerResponse): void {
    res.statusCode = response.status;
    for (const [key, value] of Object.entries(response.headers)) {
        res.setHeader(key, value);
    }
    res.end(response.body);
}

function send_text(res: ServerResponse, status: number, message: string): void {
    send(res, { status, headers: { 'Content-Type': 'text/plain; charset=utf-8' }, body: message });
}

async function handle(req: IncomingMessage, res: ServerResponse, config: ServerConfig): Promise<void> {
    const { pathname } = new URL(req.url || '/', 'http://localhost');
    const route = ROUTES[pathname];

    if (!route) {
        send_text(res, 404, 'Not found');
        return;
    }

    let body: string;
    try {
        body = await read_body(req, config.max_body_bytes);
    } catch (error) {
        if (error instanceof BodyTooLargeError) {
            send_text(res, 413, error.message);
            return;
        }
        throw error;
    }

    send(res, route({
        method: (req.method || 'GET').toUpperCase(),
        content_type: req.headers['content-type'],
        body,
    }));
}

/**
 * Create the HTTP server. It is not listening yet.
 *
 * @param config
 */
export function create_server(config: ServerConfig): Server {
    return createServer((req, res) => {
        handle(req, res, config).catch((error: unknown) => {
            console.error('Solver error', error);
            if (!res.headersSent) {
                send_text(res, 500, 'Internal solver error.');
            } else {
                res.end();
            }
        });
    });
}

export function start_server(config: ServerConfig): Server {
    const server = create_server(config);

    server.listen(config.port, config.host, () => {
        const address = server.address();
        const port = typeof address === 'object' && address ? address.port : config.port;
        console.log(`Sudoku solver listening on http://${config.host}:${port}`);
    });

    return server;
}
