#!/usr/bin/env tsx
/**
 * Builds the vector index pair for one organization
 *
 * classification CSV → canonical records → embeddings → vector_index.bin +
 * metadata.json, optionally published to INDEX_BUCKET.
 *
 * Usage:
 *   npm run build-index -- aws-samples --csv data/classification_results.csv
 *   npm run build-index -- aws-samples --source-bucket my-bucket --upload
 *
 * Exit codes: 0 success, 1 build failure, 2 usage error.
 */

import dotenv from "dotenv";
dotenv.config();

import { readFile } from "fs/promises";
import path from "path";
import { S3Client } from "@aws-sdk/client-s3";
import { getEnv, loadEmbeddingConfig, requireEnv } from "../shared/config/env.js";
import { LocalArtifactStore, S3ArtifactStore } from "../shared/lib/artifactStore.js";
import { errorMessage } from "../shared/lib/errors.js";
import { EmbeddingClient } from "../src/embedding-pipeline/nlp/embedding/openaiEmbedding.js";
import { IndexBuilder } from "../src/embedding-pipeline/pipelines/buildIndex.js";
import {
    normalizeRecords,
    parseClassificationCsv,
    readCanonicalRecords,
    writeCanonicalRecords,
} from "../src/embedding-pipeline/pipelines/normalizeRecords.js";
import { publishArtifacts, writeArtifactsLocally } from "../src/embedding-pipeline/storage/artifactPublisher.js";
import { FileCheckpointStore } from "../src/embedding-pipeline/storage/checkpointStore.js";
import { USAGE, UsageError, parseBuildArgs, type BuildArgs, type CsvSource } from "./lib/build-args.js";

async function readCsv(source: CsvSource, region: string): Promise<string> {
    if (source.kind === "file") {
        console.log(`📥 Reading CSV from ${source.path}`);
        return readFile(source.path, "utf-8");
    }

    console.log(`📥 Downloading CSV from s3://${source.bucket}/${source.key}`);
    const store = new S3ArtifactStore(source.bucket, new S3Client({ region }));
    const body = await store.get(source.key);
    if (body === null) {
        throw new Error(`CSV not found: s3://${source.bucket}/${source.key}`);
    }
    return body.toString("utf-8");
}

async function run(args: BuildArgs): Promise<number> {
    const region = getEnv("AWS_REGION", "us-west-2");
    const startTime = Date.now();
    console.log(`🚀 Building index for ${args.organization}\n`);

    // 1. normalize
    const rows = parseClassificationCsv(await readCsv(args.source, region));
    const normalized = normalizeRecords(rows, { organization: args.organization, limit: args.limit });
    console.log(`   → ${normalized.records.length} records (${normalized.dropped} dropped)`);
    if (normalized.records.length === 0) {
        console.error("❌ No valid records in the CSV, nothing to build");
        return 1;
    }

    const outStore = new LocalArtifactStore(args.outDir);
    const recordsKey = `records_${args.organization}.json`;
    await writeCanonicalRecords(outStore, recordsKey, args.organization, normalized);
    const records = await readCanonicalRecords(outStore, recordsKey);

    // 2. embed + build
    const embedder = EmbeddingClient.fromConfig(loadEmbeddingConfig());
    const builder = new IndexBuilder(embedder, {
        organization: args.organization,
        batchSize: args.batchSize,
        checkpoint: args.checkpoint
            ? new FileCheckpointStore(path.join(args.outDir, `checkpoint_${args.organization}.json`))
            : undefined,
    });
    const built = await builder.build(records);
    if (built.isErr()) {
        console.error(`❌ Index build failed (${built.error.kind}): ${built.error.message}`);
        if (args.checkpoint) {
            console.error("   Progress is checkpointed; run the same command again to resume.");
        }
        return 1;
    }

    // 3. write + publish
    await writeArtifactsLocally(args.outDir, built.value);
    if (args.upload) {
        const store = new S3ArtifactStore(requireEnv("INDEX_BUCKET", "build-index"), new S3Client({ region }));
        await publishArtifacts(store, built.value, { indexKey: args.indexKey, metadataKey: args.metadataKey });
    }

    console.log(`\n✅ Done in ${((Date.now() - startTime) / 1000).toFixed(1)}s (build ${built.value.buildId})`);
    return 0;
}

async function main(): Promise<number> {
    let args: BuildArgs;
    try {
        args = parseBuildArgs(process.argv.slice(2));
    } catch (error) {
        if (error instanceof UsageError) {
            console.error(`❌ ${error.message}\n\n${USAGE}`);
            return 2;
        }
        throw error;
    }
    return run(args);
}

main()
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
        console.error(`❌ Build failed: ${errorMessage(error)}`);
        process.exit(1);
    });
