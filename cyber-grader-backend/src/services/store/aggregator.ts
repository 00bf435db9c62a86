import fs from "fs";
import path from "path";
import { LabDefinition } from "../../types/content";
import { FlagSubmissionResult, LabStatus } from "../../types/results";
import { AttemptLedger } from "./ledger";

export const INSTRUCTIONS_NOT_FOUND = "Instructions not found";

/**
 * Number of distinct flags of `lab` the user has ever answered correctly.
 * Later wrong attempts never take a solved flag away.
 */
export function labScore(
  lab: LabDefinition,
  userId: string,
  attempts: AttemptLedger<FlagSubmissionResult>
): number {
  const solved = new Set<string>();
  for (const flag of lab.flags) {
    if (attempts.forKey(userId, lab.id, flag.name).some((attempt) => attempt.correct)) {
      solved.add(flag.name);
    }
  }
  return solved.size;
}

function readInstructions(contentRoot: string, instructionsPath: string): string {
  if (!instructionsPath) {
    return INSTRUCTIONS_NOT_FOUND;
  }
  const target = path.resolve(contentRoot, instructionsPath);
  try {
    return fs.statSync(target).isFile() ? fs.readFileSync(target, "utf8") : INSTRUCTIONS_NOT_FOUND;
  } catch {
    return INSTRUCTIONS_NOT_FOUND;
  }
}

export function labStatus(
  lab: LabDefinition,
  userId: string,
  attempts: AttemptLedger<FlagSubmissionResult>,
  contentRoot: string
): LabStatus {
  return {
    id: lab.id,
    title: lab.title,
    version: lab.version,
    instructions: readInstructions(contentRoot, lab.instructions_path),
    score: labScore(lab, userId, attempts),
    total_flags: lab.flags.length,
    // Expected values are never exposed
    flags: lab.flags.map((flag) => ({
      name: flag.name,
      prompt: flag.prompt,
      validator: flag.validator,
      pattern: flag.pattern ?? null,
    })),
  };
}

/**
 * Deterministic export order: by submission time, then user id. Ties keep the
 * order the attempts were recorded in.
 */
export function chronological<T extends { submitted_at: string; user_id: string }>(
  records: readonly T[]
): T[] {
  return [...records].sort((a, b) => {
    const byTime = Date.parse(a.submitted_at) - Date.parse(b.submitted_at);
    if (byTime !== 0) {
      return byTime;
    }
    return a.user_id < b.user_id ? -1 : a.user_id > b.user_id ? 1 : 0;
  });
}
