import ExcelJS from "exceljs";
import fs from "fs-extra";
import path from "node:path";
import { z } from "zod";
import type { KyInstance } from "ky";
import type { AppConfig } from "./config.ts";
import type { AppLogger } from "./logger.ts";
import { sendTelegramDocument } from "./telegram.ts";
import { MARKET_TIMEZONE, formatIsoDay, parseDayMonthYear } from "./utils.ts";

const CellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const ScripRecordSchema = z.object({
    exch_seg: z.string(),
    strike: z.string().default(""),
    expiry: z.string().default(""),
}).catchall(CellSchema);
export type ScripRecord = z.infer<typeof ScripRecordSchema>;

export type ScripCell = z.infer<typeof CellSchema>;
export type ScripSheetRow = Record<string, ScripCell>;

export const SHEET_SEGMENTS = ["NFO", "BFO"] as const;

export const toStrike = (value: string) => {
    if (value.trim() == "") return null;
    const strike = Number(value);
    return Number.isFinite(strike) ? strike : null;
}

const toExpirySortKey = (value: string) => parseDayMonthYear(value, MARKET_TIMEZONE, "")?.valueOf() ?? null;

//blank values sort after every number
const compareNullable = (a: number | null, b: number | null) => {
    if (a === null) return b === null ? 0 : 1;
    if (b === null) return -1;
    return a - b;
}

/** Orders by numeric strike, then expiry date; unparsable values go last and ties keep input order. */
export const sortScripRecords = (records: ScripRecord[]) => records
    .map((record) => ({ record, strike: toStrike(record.strike), expiry: toExpirySortKey(record.expiry) }))
    .sort((a, b) => compareNullable(a.strike, b.strike) || compareNullable(a.expiry, b.expiry))
    .map(({ record, strike }): ScripSheetRow => ({ ...record, strike }));

//every key seen across the payload, in first-seen order
export const collectColumns = (records: ScripRecord[]) => {
    const columns = new Set<string>();
    for (const record of records) {
        for (const key of Object.keys(record)) columns.add(key);
    }
    return [...columns];
}

export const buildSymbolTokenWorkbook = (records: ScripRecord[]) => {
    const columns = collectColumns(records);
    const workbook = new ExcelJS.Workbook();
    for (const segment of SHEET_SEGMENTS) {
        const sheet = workbook.addWorksheet(segment);
        sheet.columns = columns.map((key) => ({ header: key, key }));
        sheet.addRows(sortScripRecords(records.filter((record) => record.exch_seg == segment)));
    }
    return workbook;
}

export const downloadScripMaster = async (http: KyInstance, url: string) => {
    const payload: unknown = await http.get(url).json();
    return z.array(ScripRecordSchema).parse(payload);
}

export const runSymbolTokenJob = async (
    config: Pick<AppConfig, "sources" | "output" | "telegram" | "referenceDate">,
    { http, logger }: { http: KyInstance; logger: AppLogger },
) => {
    logger.info(`📥 Downloading scrip master JSON...`, { url: config.sources.scripMaster });
    const records = await downloadScripMaster(http, config.sources.scripMaster);
    logger.info(`Loaded ${records.length} scrip records`, { records: records.length });

    logger.info(`📊 Creating Excel (NFO & BFO sheets, sorted)...`);
    const workbook = buildSymbolTokenWorkbook(records);
    const buffer = await workbook.xlsx.writeBuffer();

    const fileName = `symbol_token_${formatIsoDay(config.referenceDate)}.xlsx`;
    const filePath = path.join(config.output.dir, fileName);
    await fs.ensureDir(config.output.dir);
    await fs.writeFile(filePath, Buffer.from(buffer));

    logger.info(`📤 Sending file to Telegram...`, { fileName });
    await sendTelegramDocument(http, config.telegram, { fileName, content: new Blob([buffer]) });

    if (!config.output.saveFileLocally) {
        await fs.remove(filePath);
        logger.info(`🧹 Local file deleted`, { filePath });
    }

    logger.info(`✅ Done! File sent: ${fileName}`, { fileName });
    return { fileName, filePath };
}
