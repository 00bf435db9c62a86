import { ExportResponse } from "../../types/results";

/**
 * Optional collaborators. Each call reports how it went in its return value
 * and never throws into the grading core.
 */

export type ContentRefreshStatus = "local" | "cloned" | "updated" | "skipped" | "missing" | "error";

export interface ContentFetchStatus {
  status: ContentRefreshStatus;
  source: string;
  branch: string | null;
  refreshed_at?: string;
  message?: string;
}

// Makes the content root current before a sync (e.g. a git pull)
export interface ContentFetcher {
  prepare(): Promise<ContentFetchStatus>;
  refresh(): Promise<ContentFetchStatus>;
}

export interface SheetSyncResult {
  status: "success" | "skipped" | "error";
  spreadsheet_id?: string | null;
  updated_ranges: string[];
  rows_written: number;
  message?: string | null;
}

// Mirrors an export into a spreadsheet
export interface SheetSync {
  syncScores(exported: ExportResponse): Promise<SheetSyncResult>;
}

/**
 * Content that is already on disk; nothing to fetch.
 */
export class LocalContentFetcher implements ContentFetcher {
  constructor(
    private readonly source: string,
    private readonly branch: string | null = null
  ) {}

  private status(): ContentFetchStatus {
    return { status: "local", source: this.source, branch: this.branch };
  }

  async prepare(): Promise<ContentFetchStatus> {
    return this.status();
  }

  async refresh(): Promise<ContentFetchStatus> {
    return this.status();
  }
}

export class DisabledSheetSync implements SheetSync {
  async syncScores(_exported: ExportResponse): Promise<SheetSyncResult> {
    return {
      status: "skipped",
      spreadsheet_id: null,
      updated_ranges: [],
      rows_written: 0,
      message: "Spreadsheet sync is not configured",
    };
  }
}
