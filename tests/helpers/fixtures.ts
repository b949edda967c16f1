import JSZip from "jszip";
import type { Dayjs } from "dayjs";

import type { AppConfig, IndexConfig } from "../../lib/config.ts";
import type { AppLogger, LogData } from "../../lib/logger.ts";
import { parseIsoDay } from "../../lib/utils.ts";

export const day = (iso: string): Dayjs => {
    const parsed = parseIsoDay(iso);
    if (!parsed) {
        throw new Error(`invalid test date ${iso}`);
    }
    return parsed;
};

export const NIFTY: IndexConfig = { name: "NIFTY", symbol: "NIFTY", instrument: "OPTIDX", exchange: "NFO", cadence: "WEEKLY" };
export const BANKNIFTY: IndexConfig = { name: "BANKNIFTY", symbol: "BANKNIFTY", instrument: "OPTIDX", exchange: "NFO", cadence: "MONTHLY" };
export const SENSEX: IndexConfig = { name: "SENSEX", symbol: "BSXOPT", instrument: "OPTIDX", exchange: "BFO", cadence: "WEEKLY" };

export const NFO_URL = "https://symbols.test/NFO_symbols.txt.zip";
export const BFO_URL = "https://symbols.test/BFO_symbols.txt.zip";
export const SCRIP_MASTER_URL = "https://scrips.test/OpenAPIScripMaster.json";
export const TELEGRAM_URL = "https://telegram.test/bottest-token/sendDocument";

export const SYMBOL_MASTER_HEADER = "Exchange,Token,LotSize,Symbol,TradingSymbol,Expiry,Instrument,OptionType,StrikePrice,TickSize,";

export const symbolMasterArchive = async (lines: string[], entryName = "NFO_symbols.txt") => {
    const zip = new JSZip();
    zip.file(entryName, `${lines.join("\n")}\n`);
    return await zip.generateAsync({ type: "arraybuffer" });
};

export const testConfig = (overrides: Partial<AppConfig> = {}): AppConfig => ({
    timezone: "Asia/Kolkata",
    referenceDate: day("2025-07-10"),
    forceExpiryToday: false,
    telegram: { apiBaseUrl: "https://telegram.test", botToken: "test-token", chatId: "test-chat" },
    sources: {
        symbolMasters: { NFO: NFO_URL, BFO: BFO_URL },
        scripMaster: SCRIP_MASTER_URL,
    },
    indices: [NIFTY],
    output: { dir: "temp", saveFileLocally: false },
    http: { timeoutMs: 5_000 },
    logging: { level: "silent", service: "test" },
    ...overrides,
});

export type LogEntry = { level: string; message: string; data?: LogData };

export const createRecordingLogger = () => {
    const entries: LogEntry[] = [];
    const record = (level: string) => (message: string, data?: LogData) => {
        entries.push({ level, message, data });
    };
    const logger: AppLogger = {
        info: record("info"),
        warn: record("warn"),
        error: record("error"),
        debug: record("debug"),
        flush: async () => {},
    };
    return { logger, entries };
};
