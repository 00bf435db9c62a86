// How a lab flag submission is checked
export enum FlagValidator {
  EXACT = "exact",
  REGEX = "regex",
  FILE_EXISTS = "file_exists",
}

// Quiz question kinds
export enum QuestionType {
  MULTIPLE_CHOICE = "multiple_choice",
  SHORT_ANSWER = "short_answer",
}

// Persistence mode reported by the store
export enum PersistenceMode {
  MEMORY = "memory", // no durable backend configured
  PERSISTENT = "persistent",
  DEGRADED = "degraded", // backend configured but disabled after a failure
}
