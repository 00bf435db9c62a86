import { Pool } from "pg";
import { ExamDefinition, LabDefinition, QuizDefinition } from "../../../types/content";
import {
  ExamSubmissionResult,
  FlagSubmissionResult,
  QuizSubmissionResult,
  StoreSnapshot,
} from "../../../types/results";
import { errorMessage, logger } from "../../../utils/logger";
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

// The parts of pg's Pool and PoolClient this backend uses
export interface PgQueryResult {
  rows: Row[];
  rowCount: number | null;
}

export interface PgClient {
  query(text: string, values?: unknown[]): Promise<PgQueryResult>;
  release(): void;
}

export interface PgPool {
  query(text: string, values?: unknown[]): Promise<PgQueryResult>;
  connect(): Promise<PgClient>;
  end(): Promise<void>;
}

export interface PostgresBackendOptions {
  connectionString: string;
  schema: string;
  timeoutMs: number;
  poolSize?: number;
}

interface DefinitionTable {
  table: string;
  columns: readonly string[];
  jsonColumns: readonly string[];
}

const LABS: DefinitionTable = {
  table: TABLES.labs,
  columns: ["id", "title", "version", "instructions_path", "flags"],
  jsonColumns: ["flags"],
};

const QUIZZES: DefinitionTable = {
  table: TABLES.quizzes,
  columns: ["id", "title", "version", "questions"],
  jsonColumns: ["questions"],
};

const EXAMS: DefinitionTable = {
  table: TABLES.exams,
  columns: ["id", "title", "version", "stages"],
  jsonColumns: ["stages"],
};

const quoteIdent = (name: string): string => `"${name.replace(/"/g, '""')}"`;

/**
 * Postgres persistence. Definitions live in one row per id with their nested
 * parts as JSONB; attempts are append-only rows ordered by a serial id.
 */
export class PostgresBackend implements PersistenceBackend {
  readonly name = "postgres";

  constructor(
    private readonly pool: PgPool,
    private readonly schema: string = "public"
  ) {}

  static fromOptions(options: PostgresBackendOptions): PostgresBackend {
    const poolSize = options.poolSize ?? 10;
    const pool = new Pool({
      connectionString: options.connectionString,
      max: poolSize,
      connectionTimeoutMillis: options.timeoutMs,
      query_timeout: options.timeoutMs,
    });

    pool.on("error", (err) => {
      logger.error("Postgres pool error", {
        module: "store.postgres",
        error: err.message,
      });
    });

    return new PostgresBackend(pool, options.schema);
  }

  private qualified(table: string): string {
    return `${quoteIdent(this.schema)}.${quoteIdent(table)}`;
  }

  async init(): Promise<void> {
    const statements = [
      `CREATE SCHEMA IF NOT EXISTS ${quoteIdent(this.schema)}`,
      `CREATE TABLE IF NOT EXISTS ${this.qualified(TABLES.labs)} (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        version TEXT NOT NULL,
        instructions_path TEXT NOT NULL,
        flags JSONB NOT NULL
      )`,
      `CREATE TABLE IF NOT EXISTS ${this.qualified(TABLES.quizzes)} (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        version TEXT NOT NULL,
        questions JSONB NOT NULL
      )`,
      `CREATE TABLE IF NOT EXISTS ${this.qualified(TABLES.exams)} (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        version TEXT NOT NULL,
        stages JSONB NOT NULL
      )`,
      `CREATE TABLE IF NOT EXISTS ${this.qualified(TABLES.labSubmissions)} (
        id BIGSERIAL PRIMARY KEY,
        user_id TEXT NOT NULL,
        lab_id TEXT NOT NULL,
        flag_name TEXT NOT NULL,
        correct BOOLEAN NOT NULL,
        submitted_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
      `CREATE TABLE IF NOT EXISTS ${this.qualified(TABLES.quizSubmissions)} (
        id BIGSERIAL PRIMARY KEY,
        user_id TEXT NOT NULL,
        quiz_id TEXT NOT NULL,
        score INTEGER NOT NULL,
        max_score INTEGER NOT NULL,
        submitted_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
      `CREATE TABLE IF NOT EXISTS ${this.qualified(TABLES.examSubmissions)} (
        id BIGSERIAL PRIMARY KEY,
        user_id TEXT NOT NULL,
        exam_id TEXT NOT NULL,
        stage_id TEXT NOT NULL,
        score INTEGER NOT NULL,
        max_score INTEGER NOT NULL,
        submitted_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
    ];

    for (const statement of statements) {
      await this.pool.query(statement);
    }
  }

  async load(): Promise<StoreSnapshot> {
    const select = async (table: string, orderBy: string): Promise<Row[]> => {
      const result = await this.pool.query(
        `SELECT * FROM ${this.qualified(table)} ORDER BY ${orderBy}`
      );
      return result.rows;
    };

    const labs = (await select(TABLES.labs, "id")).map(labFromRow);
    const quizzes = (await select(TABLES.quizzes, "id")).map(quizFromRow);
    const exams = (await select(TABLES.exams, "id")).map(examFromRow);
    const labAttempts = (await select(TABLES.labSubmissions, "id")).map(flagResultFromRow);
    const quizAttempts = (await select(TABLES.quizSubmissions, "id")).map(quizResultFromRow);
    const examAttempts = (await select(TABLES.examSubmissions, "id")).map(examResultFromRow);

    return { labs, quizzes, exams, labAttempts, quizAttempts, examAttempts };
  }

  /**
   * Upsert every row by id and delete rows whose id is gone, in one transaction.
   * Unchanged rows are left untouched, so replaying the same content writes nothing.
   */
  private async replaceDefinitions(layout: DefinitionTable, rows: Row[]): Promise<void> {
    const { table, columns, jsonColumns } = layout;
    const target = this.qualified(table);
    const dataColumns = columns.slice(1);

    const placeholders = columns
      .map((column, index) => (jsonColumns.includes(column) ? `$${index + 1}::jsonb` : `$${index + 1}`))
      .join(", ");
    const assignments = dataColumns
      .map((column) => `${quoteIdent(column)} = EXCLUDED.${quoteIdent(column)}`)
      .join(", ");
    const current = dataColumns.map((column) => `${target}.${quoteIdent(column)}`).join(", ");
    const incoming = dataColumns.map((column) => `EXCLUDED.${quoteIdent(column)}`).join(", ");

    const upsertSql =
      `INSERT INTO ${target} (${columns.map(quoteIdent).join(", ")}) VALUES (${placeholders}) ` +
      `ON CONFLICT (id) DO UPDATE SET ${assignments} ` +
      `WHERE (${current}) IS DISTINCT FROM (${incoming})`;

    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      let changed = 0;
      for (const row of rows) {
        const values = columns.map((column) =>
          jsonColumns.includes(column) ? JSON.stringify(row[column]) : row[column]
        );
        const result = await client.query(upsertSql, values);
        changed += result.rowCount ?? 0;
      }
      const removed = await client.query(
        `DELETE FROM ${target} WHERE NOT (id = ANY($1::text[]))`,
        [rows.map((row) => row.id)]
      );
      await client.query("COMMIT");

      logger.debug(`Synced ${table}`, {
        module: "store.postgres",
        rows: rows.length,
        changed,
        removed: removed.rowCount ?? 0,
      });
    } catch (error) {
      // A failed rollback must not mask the error that caused it
      await client.query("ROLLBACK").catch((rollbackError: unknown) => {
        logger.warn(`Rollback of ${table} sync failed`, {
          module: "store.postgres",
          error: errorMessage(rollbackError),
        });
      });
      throw error;
    } finally {
      client.release();
    }
  }

  replaceLabs(labs: LabDefinition[]): Promise<void> {
    return this.replaceDefinitions(LABS, labs.map(labToRow));
  }

  replaceQuizzes(quizzes: QuizDefinition[]): Promise<void> {
    return this.replaceDefinitions(QUIZZES, quizzes.map(quizToRow));
  }

  replaceExams(exams: ExamDefinition[]): Promise<void> {
    return this.replaceDefinitions(EXAMS, exams.map(examToRow));
  }

  private async insert(table: string, row: Row): Promise<void> {
    const columns = Object.keys(row);
    const placeholders = columns.map((_, index) => `$${index + 1}`).join(", ");
    await this.pool.query(
      `INSERT INTO ${this.qualified(table)} (${columns.map(quoteIdent).join(", ")}) VALUES (${placeholders})`,
      columns.map((column) => row[column])
    );
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

  close(): Promise<void> {
    return this.pool.end();
  }
}
