import ky from "ky";
import pino from "pino";
import pretty from "pino-pretty";
import type { FetchLike } from "./http.ts";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export type LoggingConfig = {
    level: LogLevel;
    logtailToken?: string;
    logtailIngestUrl?: string;
    service: string;
    /** Transport for Logtail posts, defaults to the global fetch. */
    fetch?: FetchLike;
};

export type LogData = Record<string, unknown>;

export type AppLogger = {
    info: (message: string, data?: LogData) => void;
    warn: (message: string, data?: LogData) => void;
    error: (message: string, data?: LogData) => void;
    debug: (message: string, data?: LogData) => void;
    /** Resolves once every shipped log entry has been acknowledged. */
    flush: () => Promise<void>;
};

const LEVEL_ORDER: LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

const consoleLogger = ({ level, service }: LoggingConfig): AppLogger => {
    const stream = pretty({
        singleLine: true,
        colorize: true,
        include: "level,time,msg",
        messageFormat: (log, messageKey) => `${log[messageKey]}`,
    });
    const base = pino({ level, base: { service } }, stream);

    return {
        info: (message, data) => base.info(data ?? {}, message),
        warn: (message, data) => base.warn(data ?? {}, message),
        error: (message, data) => base.error(data ?? {}, message),
        debug: (message, data) => base.debug(data ?? {}, message),
        flush: () => Promise.resolve(),
    };
};

const logtailLogger = ({ level, service, logtailToken, logtailIngestUrl, fetch }: LoggingConfig): AppLogger => {
    const kyInstance = ky.create({
        prefixUrl: logtailIngestUrl,
        headers: {
            Authorization: `Bearer ${logtailToken}`,
        },
        ...(fetch ? { fetch } : {}),
    });
    const pending = new Set<Promise<void>>();
    const threshold = LEVEL_ORDER.indexOf(level);

    const ship = (entryLevel: LogLevel) => (message: string, data?: LogData) => {
        if (LEVEL_ORDER.indexOf(entryLevel) < threshold) return;
        const post = kyInstance.post("", { json: { message, level: entryLevel, service, ...data } })
            .then(() => undefined)
            .catch((error: unknown) => {
                console.error(`Failed to ship log entry "${message}" to logtail`, error);
            })
            .finally(() => pending.delete(post));
        pending.add(post);
    };

    return {
        info: ship("info"),
        warn: ship("warn"),
        error: ship("error"),
        debug: ship("debug"),
        flush: async () => {
            await Promise.all([...pending]);
        },
    };
};

export const createLogger = (config: LoggingConfig): AppLogger => {
    if (!config.logtailToken || !config.logtailIngestUrl) {
        return consoleLogger(config);
    }
    return logtailLogger(config);
};
