import { type Logger, type LogLevel } from '@vox/core';
import pino, { type DestinationStream, type Logger as PinoInstance } from 'pino';

/** Context keys that may carry provider credentials. */
export const REDACTED_LOG_PATHS = ['apiKey', '*.apiKey', 'headers.authorization'];

export interface PinoLoggerOptions {
    level?: LogLevel;
    /** Human-readable output through pino-pretty. Ignored when `destination` is set. */
    prettyPrint?: boolean;
    name?: string;
    /** Bound on every entry; defaults to `{ service: 'vox' }`. */
    bindings?: Record<string, unknown>;
    destination?: DestinationStream;
    /** Wrap an existing pino instance instead of creating one. */
    instance?: PinoInstance;
}

/**
 * Logger port backed by pino. Engine components log through child loggers
 * bound to `component`, and request-scoped work adds `requestId`.
 */
export class PinoLogger implements Logger {
    private readonly pino: PinoInstance;

    constructor(options: PinoLoggerOptions = {}) {
        this.pino = options.instance ?? PinoLogger.create(options);
    }

    private static create(options: PinoLoggerOptions): PinoInstance {
        const { level = 'info', prettyPrint = false, name, bindings = { service: 'vox' }, destination } = options;

        const pinoOptions: pino.LoggerOptions = {
            level,
            base: bindings,
            redact: REDACTED_LOG_PATHS,
            ...(name ? { name } : {})
        };

        if (destination) {
            return pino(pinoOptions, destination);
        }

        if (prettyPrint) {
            pinoOptions.transport = {
                target: 'pino-pretty',
                options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname,service' }
            };
        }

        return pino(pinoOptions);
    }

    public trace(obj: Record<string, unknown>, msg?: string): void;
    public trace(msg: string): void;
    public trace(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('trace', arg1, arg2);
    }

    public debug(obj: Record<string, unknown>, msg?: string): void;
    public debug(msg: string): void;
    public debug(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('debug', arg1, arg2);
    }

    public info(obj: Record<string, unknown>, msg?: string): void;
    public info(msg: string): void;
    public info(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('info', arg1, arg2);
    }

    public warn(obj: Record<string, unknown>, msg?: string): void;
    public warn(msg: string): void;
    public warn(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('warn', arg1, arg2);
    }

    public error(obj: Record<string, unknown>, msg?: string): void;
    public error(msg: string): void;
    public error(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('error', arg1, arg2);
    }

    public fatal(obj: Record<string, unknown>, msg?: string): void;
    public fatal(msg: string): void;
    public fatal(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('fatal', arg1, arg2);
    }

    public child(bindings: Record<string, unknown>): Logger {
        return new PinoLogger({ instance: this.pino.child(bindings) });
    }

    private write(level: pino.Level, arg1: Record<string, unknown> | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.pino[level](arg1);
        } else {
            this.pino[level](arg1, arg2);
        }
    }
}
