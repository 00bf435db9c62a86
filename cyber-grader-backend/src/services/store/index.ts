import { AppConfig } from "../../config";
import { PersistenceDegradedError } from "../../middleware/errors";
import { errorMessage, logger } from "../../utils/logger";
import { CoreStore } from "./coreStore";
import { PersistingStore } from "./persistingStore";
import { PostgresBackend } from "./backends/postgres";
import { SupabaseBackend } from "./backends/supabase";
import { PersistenceBackend } from "./types";

export { CoreStore } from "./coreStore";
export { PersistingStore } from "./persistingStore";
export type { GraderStore, PersistenceBackend } from "./types";

type StoreConfig = Pick<
  AppConfig,
  "contentRoot" | "databaseUrl" | "databaseSchema" | "supabaseUrl" | "supabaseKey" | "persistenceTimeoutMs"
>;

/**
 * Pick the durable backend from configuration: Postgres when a database URL is
 * set, else Supabase when a URL and key are set, else none. Returns null for
 * memory-only mode; throws if the backend client cannot be constructed.
 */
export function selectBackend(config: StoreConfig): PersistenceBackend | null {
  if (config.databaseUrl) {
    return PostgresBackend.fromOptions({
      connectionString: config.databaseUrl,
      schema: config.databaseSchema,
      timeoutMs: config.persistenceTimeoutMs,
    });
  }
  if (config.supabaseUrl && config.supabaseKey) {
    return SupabaseBackend.fromOptions({ url: config.supabaseUrl, key: config.supabaseKey });
  }
  return null;
}

/**
 * Build and initialise the store. Never rejects: a backend that cannot be
 * constructed or initialised leaves the store in in-memory mode.
 */
export async function createStore(
  config: StoreConfig,
  now?: () => Date
): Promise<PersistingStore> {
  const core = new CoreStore({ contentRoot: config.contentRoot, now });
  const options = { timeoutMs: config.persistenceTimeoutMs };

  let backend: PersistenceBackend | null;
  try {
    backend = selectBackend(config);
  } catch (error) {
    const backendName = config.databaseUrl ? "postgres" : "supabase";
    const degraded = new PersistenceDegradedError(
      backendName,
      "client construction",
      errorMessage(error)
    );
    logger.error("Falling back to in-memory store", {
      code: degraded.code,
      error: degraded.message,
    });
    return PersistingStore.degraded(core, backendName, errorMessage(error), options);
  }

  const store = new PersistingStore(core, backend, options);
  await store.init();
  return store;
}
