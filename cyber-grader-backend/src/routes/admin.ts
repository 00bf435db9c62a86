import { Router, Request, Response } from "express";
import { AppConfig } from "../config";
import { asyncHandler } from "../middleware/errorHandler";
import { ExportScoresResponse } from "../types/api";
import { syncAll } from "../services/content/loader";
import {
  ContentFetcher,
  ContentFetchStatus,
  SheetSync,
  SheetSyncResult,
} from "../services/integrations";
import { GraderStore } from "../services/store/types";
import { errorMessage, logger } from "../utils/logger";

export interface AdminRouteDeps {
  config: AppConfig;
  store: GraderStore;
  contentFetcher: ContentFetcher;
  sheetSync: SheetSync;
}

/**
 * Run a best-effort collaborator, turning a thrown error into its error status
 */
export async function settle<T>(
  label: string,
  call: () => Promise<T>,
  onError: (message: string) => T
): Promise<T> {
  try {
    return await call();
  } catch (error) {
    logger.warn(`${label} failed`, { error: errorMessage(error) });
    return onError(errorMessage(error));
  }
}

export default function adminRoutes(deps: AdminRouteDeps): Router {
  const { config, store, contentFetcher, sheetSync } = deps;
  const router = Router();

  /**
   * POST /admin/sync
   * Refresh the content root, then reload every definition
   */
  router.post(
    "/admin/sync",
    asyncHandler(async (_req: Request, res: Response): Promise<void> => {
      const fetched = await settle<ContentFetchStatus>(
        "Content refresh",
        () => contentFetcher.refresh(),
        (message) => ({
          status: "error",
          source: config.contentSource,
          branch: config.contentRepoBranch,
          message,
        })
      );

      res.json(
        await syncAll(store, config.contentRoot, {
          contentSource: config.contentSource,
          repoBranch: fetched.branch,
          refreshStatus: fetched.status,
          refreshSchedule: config.contentRefreshSchedule,
          backupSchedule: config.databaseBackupSchedule,
          refreshedAt: fetched.refreshed_at ?? null,
        })
      );
    })
  );

  /**
   * GET /admin/export-scores
   * Every attempt of every user, mirrored to the spreadsheet when configured
   */
  router.get(
    "/admin/export-scores",
    asyncHandler(async (_req: Request, res: Response): Promise<void> => {
      const exported = await store.exportAll();
      const sheetResult = await settle<SheetSyncResult>(
        "Spreadsheet sync",
        () => sheetSync.syncScores(exported),
        (message) => ({ status: "error", updated_ranges: [], rows_written: 0, message })
      );

      const response: ExportScoresResponse = { ...exported, sheet_sync: sheetResult };
      res.json(response);
    })
  );

  return router;
}
