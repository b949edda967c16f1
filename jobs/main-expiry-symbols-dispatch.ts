import { loadConfig } from "../lib/config.ts";
import { createHttpClient } from "../lib/http.ts";
import { createLogger } from "../lib/logger.ts";
import { runExpiryDispatch } from "../lib/expiryDispatch.ts";
import { formatDayLabel } from "../lib/utils.ts";

//runs daily, only sends symbol files on an actual expiry day
const config = await loadConfig(process.env, { service: "expiry-symbols-dispatch" });
const logger = createLogger(config.logging);
const http = createHttpClient({ timeoutMs: config.http.timeoutMs });

logger.info(`🔄 Checking expiries for ${formatDayLabel(config.referenceDate)}`);

try {
    const outcome = await runExpiryDispatch(config, { http, logger });
    if (outcome.status == "sent") {
        logger.info(`🟢 Sent ${outcome.bundleName} with ${outcome.files.length} files`);
    }
} catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`❌ Expiry dispatch failed: ${message}`, { error: message });
    process.exitCode = 1;
} finally {
    await logger.flush();
}
