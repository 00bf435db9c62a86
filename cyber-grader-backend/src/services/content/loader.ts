import fs from "fs";
import path from "path";
import * as yaml from "js-yaml";
import { z, ZodTypeAny } from "zod";
import {
  ContentSet,
  examDefinitionSchema,
  labDefinitionSchema,
  quizDefinitionSchema,
  ExamDefinition,
  LabDefinition,
  QuizDefinition,
} from "../../types/content";
import { SyncResponse } from "../../types/results";
import { ContentValidationError } from "../../middleware/errors";
import { logger } from "../../utils/logger";
import { GraderStore } from "../store/types";

/**
 * Version tag for content that does not carry one: the UTC date as YYYY.MM.DD
 */
export function defaultVersion(now: Date = new Date()): string {
  const month = String(now.getUTCMonth() + 1).padStart(2, "0");
  const day = String(now.getUTCDate()).padStart(2, "0");
  return `${now.getUTCFullYear()}.${month}.${day}`;
}

// `*.yml` files of one content directory, in lexical filename order
function definitionFiles(root: string, kind: string): string[] {
  const dir = path.join(root, kind);
  if (!fs.existsSync(dir)) {
    return [];
  }
  return fs
    .readdirSync(dir)
    .filter((name) => name.endsWith(".yml"))
    .sort()
    .map((name) => path.join(dir, name));
}

function readYaml(file: string): Record<string, unknown> {
  let data: unknown;
  try {
    data = yaml.load(fs.readFileSync(file, "utf8"));
  } catch (error) {
    throw new ContentValidationError(file, [
      { path: "", message: error instanceof Error ? error.message : String(error) },
    ]);
  }
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new ContentValidationError(file, [
      { path: "", message: "Expected a mapping at the top level" },
    ]);
  }
  return Object.fromEntries(Object.entries(data));
}

function parseDefinition<S extends ZodTypeAny>(
  schema: S,
  file: string,
  input: Record<string, unknown>
): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ContentValidationError(
      file,
      parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      }))
    );
  }
  return parsed.data;
}

export function loadLabs(root: string, now: Date = new Date()): LabDefinition[] {
  return definitionFiles(root, "labs").map((file) => {
    const { instructions, ...data } = readYaml(file);
    return parseDefinition(labDefinitionSchema, file, {
      version: defaultVersion(now),
      ...data,
      instructions_path: instructions ?? data.instructions_path ?? "",
    });
  });
}

export function loadQuizzes(root: string, now: Date = new Date()): QuizDefinition[] {
  return definitionFiles(root, "quizzes").map((file) =>
    parseDefinition(quizDefinitionSchema, file, {
      version: defaultVersion(now),
      ...readYaml(file),
    })
  );
}

export function loadExams(root: string, now: Date = new Date()): ExamDefinition[] {
  return definitionFiles(root, "exams").map((file) =>
    parseDefinition(examDefinitionSchema, file, {
      version: defaultVersion(now),
      ...readYaml(file),
    })
  );
}

/**
 * Read and validate every definition under `root`. Any malformed file aborts
 * the whole load.
 */
export function loadContent(root: string, now: Date = new Date()): ContentSet {
  return {
    labs: loadLabs(root, now),
    quizzes: loadQuizzes(root, now),
    exams: loadExams(root, now),
  };
}

export interface SyncMetadata {
  contentSource?: string | null;
  repoBranch?: string | null;
  refreshStatus?: string | null;
  refreshSchedule?: string | null;
  backupSchedule?: string | null;
  refreshedAt?: string | null;
  now?: Date;
}

const distinctIds = (items: { id: string }[]): number => new Set(items.map((item) => item.id)).size;

/**
 * Load all content from `root` and replace the store's definitions in one step.
 * Nothing is applied unless every file is valid.
 */
export async function syncAll(
  store: GraderStore,
  root: string,
  meta: SyncMetadata = {}
): Promise<SyncResponse> {
  const now = meta.now ?? new Date();
  const content = loadContent(root, now);

  await store.replaceContent(content);

  const response: SyncResponse = {
    labs: distinctIds(content.labs),
    quizzes: distinctIds(content.quizzes),
    exams: distinctIds(content.exams),
    version: defaultVersion(now),
    content_source: meta.contentSource ?? root,
    repo_branch: meta.repoBranch ?? null,
    refresh_status: meta.refreshStatus ?? null,
    refresh_schedule: meta.refreshSchedule ?? null,
    backup_schedule: meta.backupSchedule ?? null,
    refreshed_at: meta.refreshedAt ?? now.toISOString(),
  };

  logger.info("Content synced", {
    labs: response.labs,
    quizzes: response.quizzes,
    exams: response.exams,
    source: response.content_source,
  });

  return response;
}
