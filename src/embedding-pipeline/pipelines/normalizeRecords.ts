/**
 * Classification CSV → canonical repository records
 *
 * One record per valid row, in row order. Rows without a repository name (or
 * repeating an id already seen) are dropped and reported, never fatal.
 */
import { parse } from "csv-parse/sync";
import type { ArtifactStore } from "../../../shared/lib/artifactStore.js";
import { errorMessage } from "../../../shared/lib/errors.js";
import { UNKNOWN_VALUE, freezeRecord, isRepoRecord, type RepoRecord } from "../../../shared/models/RepoRecord.js";

export type RawRow = Record<string, string | undefined>;

export interface DroppedRow {
    /** 1-based data row number (header excluded) */
    row: number;
    reason: "missing_repository" | "duplicate_id";
}

export interface NormalizeResult {
    records: RepoRecord[];
    dropped: number;
    droppedRows: DroppedRow[];
}

export interface NormalizeOptions {
    /** Used when the CSV has no organization column */
    organization: string;
    /** Only the first `limit` rows are considered */
    limit?: number;
}

const EMPTY_MARKERS = new Set(["", "none", "n/a", "na", "null", "unknown", "-"]);

function isEmptyMarker(value: string): boolean {
    return EMPTY_MARKERS.has(value.trim().toLowerCase());
}

/**
 * Reads the first non-empty column among `names`.
 */
function column(row: RawRow, ...names: string[]): string {
    for (const name of names) {
        const value = row[name]?.trim();
        if (value) return value;
    }
    return "";
}

function text(row: RawRow, ...names: string[]): string {
    const value = column(row, ...names);
    return isEmptyMarker(value) ? UNKNOWN_VALUE : value;
}

/**
 * Accepts JSON arrays (`["Lambda","S3"]`) and `,` `;` `|` separated lists.
 */
export function parseList(raw: string): string[] {
    const value = raw.trim();
    if (isEmptyMarker(value)) return [];

    let items: string[] | null = null;
    if (value.startsWith("[")) {
        try {
            const parsed: unknown = JSON.parse(value);
            if (Array.isArray(parsed)) {
                items = parsed.map((item) => String(item));
            }
        } catch {
            // not JSON, fall through to separator parsing
        }
    }
    if (items === null) {
        items = value.split(/[,;|]/);
    }

    const seen = new Set<string>();
    const result: string[] = [];
    for (const item of items) {
        const cleaned = item.trim().replace(/^['"]|['"]$/g, "").trim();
        if (!cleaned || isEmptyMarker(cleaned) || seen.has(cleaned)) continue;
        seen.add(cleaned);
        result.push(cleaned);
    }
    return result;
}

export function parseStars(raw: string): number {
    const value = Number.parseInt(raw.replace(/[,_\s]/g, ""), 10);
    return Number.isFinite(value) && value > 0 ? value : 0;
}

/**
 * Builds the canonical record for one row, or null when the row has no
 * repository name.
 */
export function normalizeRow(row: RawRow, defaultOrganization: string): RepoRecord | null {
    const repository = column(row, "repository", "name", "repo");
    if (!repository || isEmptyMarker(repository)) {
        return null;
    }
    const organization = column(row, "organization", "org", "owner") || defaultOrganization;

    return freezeRecord({
        id: `${organization}/${repository}`,
        repository,
        organization,
        description: text(row, "description"),
        url: column(row, "url", "html_url") || `https://github.com/${organization}/${repository}`,
        solutionType: text(row, "solution_type"),
        competency: text(row, "competency"),
        customerProblems: text(row, "customer_problems"),
        solutionMarketing: text(row, "solution_marketing"),
        primaryLanguage: text(row, "primary_language"),
        secondaryLanguage: text(row, "secondary_language"),
        awsServices: parseList(column(row, "aws_services")),
        deploymentTools: parseList(column(row, "deployment_tools")),
        costRange: text(row, "cost_range"),
        setupTime: text(row, "setup_time"),
        usp: text(row, "usp"),
        freshnessStatus: text(row, "freshness_status"),
        topics: parseList(column(row, "topics")),
        stars: parseStars(column(row, "stars", "stargazers_count")),
    });
}

export function normalizeRecords(rows: readonly RawRow[], options: NormalizeOptions): NormalizeResult {
    const limit = options.limit ?? rows.length;
    const records: RepoRecord[] = [];
    const droppedRows: DroppedRow[] = [];
    const seenIds = new Set<string>();

    rows.slice(0, limit).forEach((row, idx) => {
        const record = normalizeRow(row, options.organization);
        if (!record) {
            droppedRows.push({ row: idx + 1, reason: "missing_repository" });
            return;
        }
        if (seenIds.has(record.id)) {
            droppedRows.push({ row: idx + 1, reason: "duplicate_id" });
            return;
        }
        seenIds.add(record.id);
        records.push(record);
    });

    if (droppedRows.length > 0) {
        console.warn(`⚠️  Dropped ${droppedRows.length} row(s) that failed validation`);
    }

    return { records, dropped: droppedRows.length, droppedRows };
}

/**
 * Parses classification CSV text into header-keyed rows.
 */
export function parseClassificationCsv(csvText: string): RawRow[] {
    const parsed: unknown = parse(csvText, {
        columns: true,
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
        trim: true,
    });

    if (!Array.isArray(parsed)) {
        throw new Error("CSV parser did not return a row list");
    }

    return parsed.map((row: unknown, idx: number) => {
        if (typeof row !== "object" || row === null) {
            throw new Error(`CSV row ${idx + 1} is not a record`);
        }
        const normalized: RawRow = {};
        for (const [key, value] of Object.entries(row)) {
            normalized[key.trim().toLowerCase()] = typeof value === "string" ? value : undefined;
        }
        return normalized;
    });
}

export interface CanonicalRecordsFile {
    organization: string;
    generatedAt: string;
    count: number;
    dropped: number;
    records: RepoRecord[];
}

/**
 * Persists the canonical record list for the index build.
 */
export async function writeCanonicalRecords(
    store: ArtifactStore,
    key: string,
    organization: string,
    result: NormalizeResult
): Promise<void> {
    const file: CanonicalRecordsFile = {
        organization,
        generatedAt: new Date().toISOString(),
        count: result.records.length,
        dropped: result.dropped,
        records: result.records,
    };
    await store.put(key, Buffer.from(JSON.stringify(file, null, 2), "utf-8"), "application/json");
    console.log(`💾 Saved ${result.records.length} records to ${store.location}/${key}`);
}

export async function readCanonicalRecords(store: ArtifactStore, key: string): Promise<RepoRecord[]> {
    const body = await store.get(key);
    if (body === null) {
        throw new Error(`Canonical records not found: ${store.location}/${key}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(body.toString("utf-8"));
    } catch (error) {
        throw new Error(`Canonical records file is not valid JSON: ${errorMessage(error)}`);
    }

    if (typeof parsed !== "object" || parsed === null || !("records" in parsed) || !Array.isArray(parsed.records)) {
        throw new Error("Canonical records file has no records array");
    }

    return parsed.records.map((record: unknown, idx: number) => {
        if (!isRepoRecord(record)) {
            throw new Error(`Canonical record ${idx} is malformed`);
        }
        return freezeRecord(record);
    });
}
