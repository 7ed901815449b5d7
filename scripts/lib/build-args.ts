/**
 * Command line parsing for scripts/build-index.ts
 */

export const DEFAULT_SOURCE_KEY = "results/classification_results.csv";
export const DEFAULT_OUT_DIR = "output";

export const USAGE = `Usage: build-index <organization> [options]

Options:
  --csv <path>             classification CSV on disk
  --source-bucket <name>   read the CSV from S3 instead
  --source-key <key>       S3 key of the CSV (default ${DEFAULT_SOURCE_KEY})
  --limit <n>              only the first n rows
  --out <dir>              local output directory (default ${DEFAULT_OUT_DIR})
  --batch-size <n>         texts per embedding request
  --upload                 publish the pair to INDEX_BUCKET
  --index-key <key>        serving key of the vector index (default <organization>/vector_index.bin)
  --metadata-key <key>     serving key of the metadata table (default <organization>/metadata.json)
  --no-checkpoint          do not save or resume build checkpoints`;

export type CsvSource =
    | { kind: "file"; path: string }
    | { kind: "s3"; bucket: string; key: string };

export interface BuildArgs {
    organization: string;
    source: CsvSource;
    limit?: number;
    outDir: string;
    batchSize?: number;
    upload: boolean;
    indexKey: string;
    metadataKey: string;
    checkpoint: boolean;
}

/** Bad command line; the CLI exits with code 2. */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "UsageError";
    }
}

function positiveInteger(flag: string, raw: string): number {
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 1) {
        throw new UsageError(`${flag} expects a positive integer, got "${raw}"`);
    }
    return value;
}

export function parseBuildArgs(argv: readonly string[]): BuildArgs {
    const positional: string[] = [];
    const values = new Map<string, string>();
    let upload = false;
    let checkpoint = true;

    const valueFlags = new Set([
        "--csv",
        "--source-bucket",
        "--source-key",
        "--limit",
        "--out",
        "--batch-size",
        "--index-key",
        "--metadata-key",
    ]);

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i] ?? "";

        if (arg === "--upload") {
            upload = true;
        } else if (arg === "--no-checkpoint") {
            checkpoint = false;
        } else if (valueFlags.has(arg)) {
            const value = argv[i + 1];
            if (value === undefined || value.startsWith("--")) {
                throw new UsageError(`${arg} needs a value`);
            }
            values.set(arg, value);
            i++;
        } else if (arg.startsWith("--")) {
            throw new UsageError(`Unknown option ${arg}`);
        } else {
            positional.push(arg);
        }
    }

    const [organization, ...extra] = positional;
    if (!organization) {
        throw new UsageError("Missing <organization>");
    }
    if (extra.length > 0) {
        throw new UsageError(`Unexpected argument ${extra[0]}`);
    }

    const csvPath = values.get("--csv");
    const sourceBucket = values.get("--source-bucket");
    let source: CsvSource;
    if (csvPath && sourceBucket) {
        throw new UsageError("Use either --csv or --source-bucket, not both");
    } else if (csvPath) {
        source = { kind: "file", path: csvPath };
    } else if (sourceBucket) {
        source = { kind: "s3", bucket: sourceBucket, key: values.get("--source-key") ?? DEFAULT_SOURCE_KEY };
    } else {
        throw new UsageError("A CSV source is required: --csv <path> or --source-bucket <name>");
    }

    const limit = values.get("--limit");
    const batchSize = values.get("--batch-size");

    return {
        organization,
        source,
        limit: limit === undefined ? undefined : positiveInteger("--limit", limit),
        outDir: values.get("--out") ?? DEFAULT_OUT_DIR,
        batchSize: batchSize === undefined ? undefined : positiveInteger("--batch-size", batchSize),
        upload,
        indexKey: values.get("--index-key") ?? `${organization}/vector_index.bin`,
        metadataKey: values.get("--metadata-key") ?? `${organization}/metadata.json`,
        checkpoint,
    };
}
