import type { Dayjs } from "dayjs";
import type { KyInstance } from "ky";
import type { AppConfig, Exchange } from "./config.ts";
import type { AppLogger } from "./logger.ts";
import type { InstrumentTable } from "./symbolMaster.ts";
import { downloadSymbolMaster } from "./symbolMaster.ts";
import { isIncludedInBundle, resolveExpiry } from "./expiry.ts";
import type { NotFoundReason } from "./expiry.ts";
import { buildBundleName, buildExpiryExport, createArchive } from "./exports.ts";
import type { ExportFile } from "./exports.ts";
import { requireTelegramCredentials, sendTelegramDocument } from "./telegram.ts";
import { formatDayLabel } from "./utils.ts";

export type SkippedIndex = {
    name: string;
    reason: NotFoundReason | "not-expiring-today";
    expiryDate?: string;
};

export type ExpiryPlan = {
    files: ExportFile[];
    skipped: SkippedIndex[];
};

export type DispatchOutcome =
    | { status: "no-expiry"; skipped: SkippedIndex[] }
    | { status: "sent"; bundleName: string; files: string[]; skipped: SkippedIndex[] };

type PlanConfig = Pick<AppConfig, "indices" | "timezone" | "forceExpiryToday">;

export const planExpiryExports = (
    tables: Map<Exchange, InstrumentTable>,
    config: PlanConfig,
    referenceDate: Dayjs,
    logger: AppLogger,
): ExpiryPlan => {
    const files: ExportFile[] = [];
    const skipped: SkippedIndex[] = [];

    for (const index of config.indices) {
        const table = tables.get(index.exchange);
        if (!table) {
            throw new Error(`No ${index.exchange} symbol master was loaded for ${index.name}`);
        }

        const resolution = resolveExpiry(table, index, referenceDate, config.timezone);
        if (resolution.droppedRows > 0) {
            logger.warn(`🟡 ${index.name}: dropped ${resolution.droppedRows} rows with unparsable expiry`, { index: index.name, droppedRows: resolution.droppedRows });
        }

        if (resolution.status == "not-found") {
            logger.info(`${index.name}: no expiry found (${resolution.reason})`, { index: index.name, reason: resolution.reason });
            skipped.push({ name: index.name, reason: resolution.reason });
            continue;
        }

        const expiryLabel = formatDayLabel(resolution.expiryDate);
        if (!isIncludedInBundle(resolution, referenceDate, config.forceExpiryToday)) {
            logger.debug(`${index.name}: next expiry ${expiryLabel} is not today`, { index: index.name, expiryDate: expiryLabel });
            skipped.push({ name: index.name, reason: "not-expiring-today", expiryDate: expiryLabel });
            continue;
        }

        const file = buildExpiryExport(resolution);
        files.push(file);
        logger.info(`✅ Expiry detected → ${file.fileName}`, { index: index.name, expiryDate: expiryLabel, rows: resolution.rows.length });
    }

    return { files, skipped };
}

export const loadSymbolMasters = async (http: KyInstance, config: Pick<AppConfig, "indices" | "sources">, logger: AppLogger) => {
    const exchanges = [...new Set(config.indices.map((index) => index.exchange))];
    const tables = new Map<Exchange, InstrumentTable>();
    for (const exchange of exchanges) {
        const url = config.sources.symbolMasters[exchange];
        logger.info(`📥 Loading ${exchange} symbol master...`, { exchange, url });
        const table = await downloadSymbolMaster(http, exchange, url);
        logger.info(`Loaded ${table.rows.length} ${exchange} instruments`, { exchange, rows: table.rows.length });
        tables.set(exchange, table);
    }
    return tables;
}

export const runExpiryDispatch = async (
    config: AppConfig,
    { http, logger }: { http: KyInstance; logger: AppLogger },
): Promise<DispatchOutcome> => {
    if (config.forceExpiryToday) {
        logger.warn(`⚠️ FORCE_EXPIRY_TODAY is on, every resolved expiry will be sent`, { forceExpiryToday: true });
    }
    if (config.forceDayId) {
        logger.info(`Force day id for this run: ${config.forceDayId}`, { forceDayId: config.forceDayId });
    }

    const tables = await loadSymbolMasters(http, config, logger);
    const { files, skipped } = planExpiryExports(tables, config, config.referenceDate, logger);

    if (files.length == 0) {
        logger.info(`⏭ No expiry today. Exiting cleanly.`, { referenceDate: formatDayLabel(config.referenceDate) });
        return { status: "no-expiry", skipped };
    }

    requireTelegramCredentials(config.telegram);

    const bundleName = buildBundleName(config.referenceDate);
    const archive = await createArchive(files);
    await sendTelegramDocument(http, config.telegram, { fileName: bundleName, content: new Blob([archive]) });
    logger.info(`📤 Sent ${files.length} expiry files to Telegram`, { bundleName, files: files.map((file) => file.fileName) });

    return { status: "sent", bundleName, files: files.map((file) => file.fileName), skipped };
}
