import { z } from 'zod';
import { ErrorCode } from '../enum/error-code.enum';
import { SudokuError } from '../error/sudoku.error';

// An empty variable counts as unset
function from_env<T extends z.ZodTypeAny>(schema: T) {
    return z.preprocess(value => (value === '' ? undefined : value), schema);
}

export const ServerConfigSchema = z.object({
    PORT: from_env(z.coerce.number().int().min(0).max(65535).default(8080)),
    HOST: from_env(z.string().min(1).default('127.0.0.1')),
    MAX_BODY_BYTES: from_env(z.coerce.number().int().positive().default(65536)), // Request bodies above this get 413
});

export interface ServerConfig {
    port: number;
    host: string;
    max_body_bytes: number;
}

/**
 * Read the server configuration from environment variables.
 */
export function load_config(env: Record<string, string | undefined> = process.env): ServerConfig {
    const parsed = ServerConfigSchema.safeParse({
        PORT: env.PORT,
        HOST: env.HOST,
        MAX_BODY_BYTES: env.MAX_BODY_BYTES,
    });

    if (!parsed.success) {
        const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new SudokuError(ErrorCode.ERR_CONFIG_INVALID, `${ErrorCode.ERR_CONFIG_INVALID}: ${details}`);
    }

    return {
        port: parsed.data.PORT,
        host: parsed.data.HOST,
        max_body_bytes: parsed.data.MAX_BODY_BYTES,
    };
}
