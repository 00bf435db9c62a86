// Load environment variables before reading configuration.
// Only load .env files in development - in production, use the container's environment
import dotenv from "dotenv";
if (process.env.NODE_ENV !== "production") {
  dotenv.config({ path: ".env.local" });
  dotenv.config();
}

import { loadConfig } from "./config";
import { createApp } from "./app";
import { syncAll } from "./services/content/loader";
import { DisabledSheetSync, LocalContentFetcher } from "./services/integrations";
import { createStore } from "./services/store";
import { errorMessage, logger } from "./utils/logger";

async function main(): Promise<void> {
  const config = loadConfig();
  logger.setLevel(config.logLevel);

  const store = await createStore(config);
  const contentFetcher = new LocalContentFetcher(config.contentSource, config.contentRepoBranch);
  const sheetSync = new DisabledSheetSync();

  const prepared = await contentFetcher.prepare();
  await syncAll(store, config.contentRoot, {
    contentSource: config.contentSource,
    repoBranch: prepared.branch,
    refreshStatus: prepared.status,
    refreshSchedule: config.contentRefreshSchedule,
    backupSchedule: config.databaseBackupSchedule,
    refreshedAt: prepared.refreshed_at ?? null,
  });

  const app = createApp({ config, store, contentFetcher, sheetSync });
  const server = app.listen(config.port, () => {
    logger.info("Cyber grader API started", {
      port: config.port,
      contentRoot: config.contentRoot,
      persistence: store.status(),
    });
  });

  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => {
      store.close().then(
        () => process.exit(0),
        () => process.exit(1)
      );
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((error) => {
  logger.error("Failed to start server", { error: errorMessage(error) });
  process.exit(1);
});
