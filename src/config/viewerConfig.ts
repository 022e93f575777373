import os from 'node:os';
import path from 'node:path';
import { Token } from 'typedi';
import { z } from 'zod';
import { ConfigError } from '../errors/ViewerErrors';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const booleanFlag = z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

const ViewerConfigSchema = z.object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    MESSAGE_ROOT: z.string().trim().min(1).optional(),
    SCRATCH_DIR: z.string().trim().min(1).optional(),
    APP_TITLE: z.string().trim().min(1).default('Mail Viewer'),
    CONTENT_CACHE_SIZE: z.coerce.number().int().min(0).default(10),
    ROW_HEIGHT: z.coerce.number().positive().default(24),
    WATCH_MESSAGES: booleanFlag.default('true'),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface ViewerConfig {
    port: number;
    messageRoot: string;
    scratchDir: string;
    appTitle: string;
    contentCacheSize: number;
    rowHeight: number;
    watchMessages: boolean;
    logLevel: LogLevel;
}

export const ViewerConfigToken = new Token<ViewerConfig>('viewer-config');

export function loadViewerConfig(env: NodeJS.ProcessEnv = process.env): ViewerConfig {
    const parsed = ViewerConfigSchema.safeParse(pickDefined(env));
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        );
    }

    const values = parsed.data;
    return {
        port: values.PORT,
        messageRoot: path.resolve(values.MESSAGE_ROOT ?? path.join(process.cwd(), 'data', 'messages')),
        scratchDir: path.resolve(values.SCRATCH_DIR ?? path.join(os.tmpdir(), 'mail-viewer')),
        appTitle: values.APP_TITLE,
        contentCacheSize: values.CONTENT_CACHE_SIZE,
        rowHeight: values.ROW_HEIGHT,
        watchMessages: values.WATCH_MESSAGES,
        logLevel: values.LOG_LEVEL,
    };
}

// Blank variables count as unset so defaults apply.
function pickDefined(env: NodeJS.ProcessEnv): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (typeof value === 'string' && value.trim().length > 0) {
            result[key] = value;
        }
    }
    return result;
}
