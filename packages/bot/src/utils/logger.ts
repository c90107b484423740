import winston from 'winston';
import crypto from 'crypto';

/**
 * Process-wide logger for the relay. `LOG_LEVEL` picks the threshold,
 * `LOG_FORMAT=pretty` switches from JSON lines to a colorized console view.
 */

type LogFormat = 'json' | 'pretty';

function consoleFormat(format: LogFormat): winston.Logform.Format {
    const base = [winston.format.timestamp(), winston.format.errors({ stack: true })];
    if (format === 'json') {
        return winston.format.combine(...base, winston.format.json());
    }
    return winston.format.combine(
        ...base,
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
            const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
            return `[${timestamp}] ${level}: ${message}${extra}`;
        }),
    );
}

export const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: consoleFormat(process.env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json'),
    defaultMeta: { service: 'loot-relay' },
    transports: [new winston.transports.Console()],
});

// ── Per-request logging ─────────────────────────────────────────────

/** `loot-` plus 16 hex characters. */
export function generateCorrelationId(): string {
    return `loot-${crypto.randomBytes(8).toString('hex')}`;
}

/**
 * Logger for one loot request, from the Discord event to the reply.
 */
export function correlatedLogger(correlationId: string): winston.Logger {
    return logger.child({ correlationId });
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
