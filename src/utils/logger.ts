/**
 * Component logger.
 *
 * - warn: always written
 * - info / debug: written only when the `OBBVH_DEBUG=true` environment variable is set
 */

export type LogContext = {
    /** module name, e.g. 'build' */
    component: string;
    /** operation being performed, e.g. 'buildTree' */
    operation?: string;
    /** extra structured data printed after the message */
    data?: Record<string, unknown>;
};

export type Logger = {
    warn(message: string, ctx?: Partial<LogContext>): void;
    info(message: string, ctx?: Partial<LogContext>): void;
    debug(message: string, ctx?: Partial<LogContext>): void;
};

export function isDebugEnabled(): boolean {
    if (typeof process !== 'undefined' && process.env) {
        return process.env.OBBVH_DEBUG === 'true';
    }
    return false;
}

function formatContext(ctx: LogContext): string {
    let prefix = `[${ctx.component}]`;
    if (ctx.operation) {
        prefix += ` ${ctx.operation}`;
    }
    return prefix;
}

function write(sink: (...args: unknown[]) => void, line: string, data: Record<string, unknown> | undefined): void {
    if (data !== undefined) {
        sink(line, data);
    } else {
        sink(line);
    }
}

/** create a logger for one component */
export function createLogger(component: string): Logger {
    return {
        warn(message, ctx) {
            write(console.warn, `${formatContext({ component, ...ctx })} ${message}`, ctx?.data);
        },
        info(message, ctx) {
            if (!isDebugEnabled()) return;
            write(console.info, `${formatContext({ component, ...ctx })} ${message}`, ctx?.data);
        },
        debug(message, ctx) {
            if (!isDebugEnabled()) return;
            write(console.debug, `${formatContext({ component, ...ctx })} ${message}`, ctx?.data);
        },
    };
}
