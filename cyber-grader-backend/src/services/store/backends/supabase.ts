import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { ExamDefinition, LabDefinition, QuizDefinition } from "../../../types/content";
import {
  ExamSubmissionResult,
  FlagSubmissionResult,
  QuizSubmissionResult,
  StoreSnapshot,
} from "../../../types/results";
import { DatabaseError } from "../../../middleware/errorHandler";
import { logger } from "../../../utils/logger";
import { PersistenceBackend } from "../types";
import {
  Row,
  TABLES,
  examFromRow,
  examResultFromRow,
  examResultToRow,
  examToRow,
  flagResultFromRow,
  flagResultToRow,
  labFromRow,
  labToRow,
  quizFromRow,
  quizResultFromRow,
  quizResultToRow,
  quizToRow,
} from "./rows";

export interface SupabaseBackendOptions {
  url: string;
  key: string;
  pageSize?: number;
}

// PostgREST returns at most this many rows per response
const DEFAULT_PAGE_SIZE = 1000;

type PostgrestResult = { error: { message: string } | null };

const check = (table: string, action: string, { error }: PostgrestResult): void => {
  if (error) {
    throw new DatabaseError(`Failed to ${action} ${table}: ${error.message}`);
  }
};

/**
 * Supabase persistence over the same table layout as the Postgres backend.
 * Tables are created by the SQL migration under supabase/migrations; `init`
 * only checks that they are reachable.
 */
export class SupabaseBackend implements PersistenceBackend {
  readonly name = "supabase";

  constructor(
    private readonly client: SupabaseClient,
    private readonly pageSize: number = DEFAULT_PAGE_SIZE
  ) {}

  /**
   * Throws when the client cannot be constructed (e.g. a malformed URL);
   * the store factory treats that as a degraded start.
   */
  static fromOptions(options: SupabaseBackendOptions): SupabaseBackend {
    const client = createClient(options.url, options.key, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    });
    return new SupabaseBackend(client, options.pageSize);
  }

  async init(): Promise<void> {
    for (const table of Object.values(TABLES)) {
      check(table, "reach", await this.client.from(table).select("id").limit(1));
    }
  }

  // Whole table in id order, one range request per page until a short page
  private async fetchAll(table: string): Promise<Row[]> {
    const rows: Row[] = [];
    for (let offset = 0; ; offset += this.pageSize) {
      const page = await this.client
        .from(table)
        .select("*")
        .order("id")
        .range(offset, offset + this.pageSize - 1);
      check(table, "read", page);

      const data: Row[] = page.data ?? [];
      rows.push(...data);
      if (data.length < this.pageSize) {
        return rows;
      }
    }
  }

  async load(): Promise<StoreSnapshot> {
    return {
      labs: (await this.fetchAll(TABLES.labs)).map(labFromRow),
      quizzes: (await this.fetchAll(TABLES.quizzes)).map(quizFromRow),
      exams: (await this.fetchAll(TABLES.exams)).map(examFromRow),
      labAttempts: (await this.fetchAll(TABLES.labSubmissions)).map(flagResultFromRow),
      quizAttempts: (await this.fetchAll(TABLES.quizSubmissions)).map(quizResultFromRow),
      examAttempts: (await this.fetchAll(TABLES.examSubmissions)).map(examResultFromRow),
    };
  }

  /**
   * Upsert the rows that differ from what is stored and delete ids that are gone.
   * PostgREST has no transactions, so a failure part-way leaves earlier rows applied.
   */
  private async replaceDefinitions<T>(
    table: string,
    definitions: T[],
    toRow: (definition: T) => Row,
    fromRow: (row: Row) => T
  ): Promise<void> {
    const stored = new Map<string, string>();
    for (const row of await this.fetchAll(table)) {
      const definition = fromRow(row);
      stored.set(String(row.id), JSON.stringify(toRow(definition)));
    }

    const incoming = definitions.map(toRow);
    const changed = incoming.filter((row) => stored.get(String(row.id)) !== JSON.stringify(row));
    const incomingIds = new Set(incoming.map((row) => String(row.id)));
    const stale = [...stored.keys()].filter((id) => !incomingIds.has(id));

    if (changed.length > 0) {
      check(table, "upsert", await this.client.from(table).upsert(changed, { onConflict: "id" }));
    }
    if (stale.length > 0) {
      check(table, "prune", await this.client.from(table).delete().in("id", stale));
    }

    logger.debug(`Synced ${table}`, {
      module: "store.supabase",
      rows: incoming.length,
      changed: changed.length,
      removed: stale.length,
    });
  }

  replaceLabs(labs: LabDefinition[]): Promise<void> {
    return this.replaceDefinitions(TABLES.labs, labs, labToRow, labFromRow);
  }

  replaceQuizzes(quizzes: QuizDefinition[]): Promise<void> {
    return this.replaceDefinitions(TABLES.quizzes, quizzes, quizToRow, quizFromRow);
  }

  replaceExams(exams: ExamDefinition[]): Promise<void> {
    return this.replaceDefinitions(TABLES.exams, exams, examToRow, examFromRow);
  }

  private async insert(table: string, row: Row): Promise<void> {
    check(table, "insert into", await this.client.from(table).insert(row));
  }

  insertFlagResult(result: FlagSubmissionResult): Promise<void> {
    return this.insert(TABLES.labSubmissions, flagResultToRow(result));
  }

  insertQuizResult(result: QuizSubmissionResult): Promise<void> {
    return this.insert(TABLES.quizSubmissions, quizResultToRow(result));
  }

  insertExamResult(result: ExamSubmissionResult): Promise<void> {
    return this.insert(TABLES.examSubmissions, examResultToRow(result));
  }

  async close(): Promise<void> {
    // supabase-js holds no pooled connections
  }
}
