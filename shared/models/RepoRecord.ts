/**
 * Repository Record Types
 * Canonical descriptor of one classified repository
 */

/** Marker for optional text columns the classifier left empty */
export const UNKNOWN_VALUE = "Unknown";

export interface RepoRecord {
  /** `<organization>/<repository>` */
  readonly id: string;
  readonly repository: string;
  readonly organization: string;
  readonly description: string;
  readonly url: string;
  readonly solutionType: string;
  readonly competency: string;
  readonly customerProblems: string;
  readonly solutionMarketing: string;
  readonly primaryLanguage: string;
  readonly secondaryLanguage: string;
  readonly awsServices: readonly string[];
  readonly deploymentTools: readonly string[];
  readonly costRange: string;
  readonly setupTime: string;
  readonly usp: string;
  readonly freshnessStatus: string;
  readonly topics: readonly string[];
  readonly stars: number;
}

export const REQUIRED_STRING_FIELDS = ["id", "repository", "organization", "url"] as const;

export const OPTIONAL_STRING_FIELDS = [
  "description",
  "solutionType",
  "competency",
  "customerProblems",
  "solutionMarketing",
  "primaryLanguage",
  "secondaryLanguage",
  "costRange",
  "setupTime",
  "usp",
  "freshnessStatus",
] as const;

export const LIST_FIELDS = ["awsServices", "deploymentTools", "topics"] as const;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Structural check for records read back from JSON.
 */
export function isRepoRecord(value: unknown): value is RepoRecord {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const fields: Record<string, unknown> = { ...value };
  for (const field of REQUIRED_STRING_FIELDS) {
    const fieldValue = fields[field];
    if (typeof fieldValue !== "string" || fieldValue.length === 0) return false;
  }
  for (const field of OPTIONAL_STRING_FIELDS) {
    if (typeof fields[field] !== "string") return false;
  }
  for (const field of LIST_FIELDS) {
    if (!isStringArray(fields[field])) return false;
  }
  return typeof fields.stars === "number";
}

/** Records are immutable once created; list fields are frozen too. */
export function freezeRecord(record: RepoRecord): RepoRecord {
  Object.freeze(record.awsServices);
  Object.freeze(record.deploymentTools);
  Object.freeze(record.topics);
  return Object.freeze(record);
}
