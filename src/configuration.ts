/**
 * Configuration for rotary-menu.
 *
 * Environment defaults are read by `loadConfig()`; option objects handed to
 * the controller are validated with the schemas below.
 */

import * as z from 'zod';
import { ConfigurationError } from '@/errors';

export const geometrySchema = z.object({
    cols: z.number().int().min(2, 'a display needs at least 2 columns'),
    rows: z.number().int().positive(),
});

export const controllerOptionsSchema = z.object({
    geometry: geometrySchema,
    cursorGlyph: z.string().length(1).nullable().default(null),
    errorMarker: z.string().default('#ERR'),
    strictRender: z.boolean().default(false),
});

export type ControllerOptionsInput = z.input<typeof controllerOptionsSchema>;
export type ControllerOptions = z.output<typeof controllerOptionsSchema>;

export const timerOptionsSchema = z.object({
    startDelayMs: z.number().int().nonnegative().default(1000),
    stepMs: z.number().int().positive().default(250),
});

export type MarqueeTimerOptions = z.input<typeof timerOptionsSchema>;

export function parseOptions<S extends z.ZodTypeAny>(schema: S, value: unknown, label: string): z.output<S> {
    const result = schema.safeParse(value);
    if (!result.success) {
        const details = result.error.issues
            .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid ${label}: ${details}`);
    }
    return result.data;
}

export type Config = {
    cols: number;
    rows: number;
    timeoutSeconds: number;
    logFile: string | null;
    debug: boolean;
};

const envSchema = z.object({
    cols: z.coerce.number().int().min(2).default(20),
    rows: z.coerce.number().int().positive().default(4),
    timeoutSeconds: z.coerce.number().int().nonnegative().default(0),
});

export function readFlag(value: string | undefined): boolean {
    return ['true', '1', 'yes'].includes(value?.toLowerCase() ?? '');
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const parsed = parseOptions(envSchema, {
        cols: env.ROTARY_MENU_COLS || undefined,
        rows: env.ROTARY_MENU_ROWS || undefined,
        timeoutSeconds: env.ROTARY_MENU_TIMEOUT || undefined,
    }, 'environment');
    const logFile = env.ROTARY_MENU_LOG_FILE?.trim();
    return {
        ...parsed,
        logFile: logFile ? logFile : null,
        debug: readFlag(env.DEBUG),
    };
}
