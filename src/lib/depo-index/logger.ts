import type { Logger } from "./types";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

const noop = (): void => {};

/**
 * Console-backed logger that drops messages below `level`.
 * Components prefix their messages with a `[Component]` tag.
 */
export function createLogger(level: LogLevel = "info", sink: Logger = console): Logger {
    const enabled = (candidate: LogLevel) => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];

    return {
        debug: enabled("debug") ? sink.debug.bind(sink) : noop,
        info: enabled("info") ? sink.info.bind(sink) : noop,
        warn: enabled("warn") ? sink.warn.bind(sink) : noop,
        error: enabled("error") ? sink.error.bind(sink) : noop,
    };
}

/** Default logger used when a component is constructed without one */
export const defaultLogger: Logger = createLogger("info");

/** Swallows everything; handy for tests and library embedding */
export const silentLogger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
};
