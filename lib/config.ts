import fs from "fs-extra";
import { z } from "zod";
import type { Dayjs } from "dayjs";
import type { LoggingConfig } from "./logger.ts";
import { MARKET_TIMEZONE, parseIsoDay, todayIn } from "./utils.ts";

export const EXCHANGES = ["NFO", "BFO"] as const;
export type Exchange = typeof EXCHANGES[number];

export const IndexConfigSchema = z.object({
    name: z.string().nonempty(),
    symbol: z.string().nonempty(),
    instrument: z.string().nonempty(),
    exchange: z.enum(EXCHANGES),
    cadence: z.enum(["WEEKLY", "MONTHLY"]),
});
export type IndexConfig = z.infer<typeof IndexConfigSchema>;

const IndexConfigListSchema = z.array(IndexConfigSchema).nonempty("Index config must list at least one index");

const EnvSchema = z.object({
    BOT_TOKEN: z.string().optional(),
    CHAT_ID: z.string().optional(),
    TELEGRAM_API_URL: z.url().default("https://api.telegram.org"),
    FORCE_EXPIRY_TODAY: z.stringbool().default(false),
    FORCE_DAY_ID: z.iso.date().optional(),
    NFO_SYMBOLS_URL: z.url().default("https://api.shoonya.com/NFO_symbols.txt.zip"),
    BFO_SYMBOLS_URL: z.url().default("https://api.shoonya.com/BFO_symbols.txt.zip"),
    SCRIP_MASTER_URL: z.url().default("https://margincalculator.angelbroking.com/OpenAPI_File/files/OpenAPIScripMaster.json"),
    INDEX_CONFIG_FILE: z.string().default("./data/index-config.json"),
    OUTPUT_DIR: z.string().default("temp"),
    SAVE_FILE_LOCALLY: z.stringbool().default(false),
    HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    LOGTAIL_SOURCE_TOKEN: z.string().optional(),
    LOGTAIL_INGEST_URL: z.url().optional(),
});

export type TelegramConfig = {
    apiBaseUrl: string;
    botToken?: string;
    chatId?: string;
};

export type AppConfig = {
    timezone: string;
    /** Midnight of the run date in `timezone`; FORCE_DAY_ID pins it. */
    referenceDate: Dayjs;
    forceDayId?: string;
    forceExpiryToday: boolean;
    telegram: TelegramConfig;
    sources: {
        symbolMasters: Record<Exchange, string>;
        scripMaster: string;
    };
    indices: IndexConfig[];
    output: {
        dir: string;
        saveFileLocally: boolean;
    };
    http: {
        timeoutMs: number;
    };
    logging: LoggingConfig;
};

export const loadIndexConfig = async (fileName: string): Promise<IndexConfig[]> => {
    const content: unknown = await fs.readJson(fileName);
    return IndexConfigListSchema.parse(content);
}

export const loadConfig = async (
    env: Record<string, string | undefined>,
    { now = new Date(), service = "expiry-symbol-jobs" }: { now?: Date; service?: string } = {},
): Promise<AppConfig> => {
    const parsed = EnvSchema.parse(env);
    const timezone = MARKET_TIMEZONE;

    const referenceDate = parsed.FORCE_DAY_ID ? parseIsoDay(parsed.FORCE_DAY_ID, timezone) : todayIn(timezone, now);
    if (!referenceDate) {
        throw new Error(`FORCE_DAY_ID is not a valid calendar date: ${parsed.FORCE_DAY_ID}`);
    }

    return {
        timezone,
        referenceDate,
        forceDayId: parsed.FORCE_DAY_ID,
        forceExpiryToday: parsed.FORCE_EXPIRY_TODAY,
        telegram: {
            apiBaseUrl: parsed.TELEGRAM_API_URL.replace(/\/+$/, ""),
            botToken: parsed.BOT_TOKEN,
            chatId: parsed.CHAT_ID,
        },
        sources: {
            symbolMasters: {
                NFO: parsed.NFO_SYMBOLS_URL,
                BFO: parsed.BFO_SYMBOLS_URL,
            },
            scripMaster: parsed.SCRIP_MASTER_URL,
        },
        indices: await loadIndexConfig(parsed.INDEX_CONFIG_FILE),
        output: {
            dir: parsed.OUTPUT_DIR,
            saveFileLocally: parsed.SAVE_FILE_LOCALLY,
        },
        http: {
            timeoutMs: parsed.HTTP_TIMEOUT_MS,
        },
        logging: {
            level: parsed.LOG_LEVEL,
            logtailToken: parsed.LOGTAIL_SOURCE_TOKEN,
            logtailIngestUrl: parsed.LOGTAIL_INGEST_URL,
            service,
        },
    };
}
