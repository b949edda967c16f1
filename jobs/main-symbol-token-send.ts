import { loadConfig } from "../lib/config.ts";
import { createHttpClient } from "../lib/http.ts";
import { createLogger } from "../lib/logger.ts";
import { runSymbolTokenJob } from "../lib/scripMaster.ts";

const config = await loadConfig(process.env, { service: "symbol-token-send" });
const logger = createLogger(config.logging);
const http = createHttpClient({ timeoutMs: config.http.timeoutMs });

try {
    await runSymbolTokenJob(config, { http, logger });
} catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`❌ Error occurred: ${message}`, { error: message });
    process.exitCode = 1;
} finally {
    await logger.flush();
}
