/**
 * Build checkpoints
 *
 * Saved after every embedded batch so an interrupted build resumes where it
 * stopped. A checkpoint only applies to the exact same inputs, identified by
 * its fingerprint.
 */
import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import path from "path";
import { errorMessage } from "../../../shared/lib/errors.js";

export interface BuildCheckpoint {
    fingerprint: string;
    /** Number of leading records already embedded */
    processed: number;
    embeddings: number[][];
}

export interface CheckpointStore {
    load(): Promise<BuildCheckpoint | null>;
    save(checkpoint: BuildCheckpoint): Promise<void>;
    clear(): Promise<void>;
}

function isCheckpoint(value: unknown): value is BuildCheckpoint {
    if (typeof value !== "object" || value === null) return false;
    if (!("fingerprint" in value) || !("processed" in value) || !("embeddings" in value)) return false;
    const { fingerprint, processed, embeddings } = value;
    return typeof fingerprint === "string"
        && typeof processed === "number"
        && Array.isArray(embeddings)
        && embeddings.every((vector) => Array.isArray(vector) && vector.every((x) => typeof x === "number"));
}

export class FileCheckpointStore implements CheckpointStore {
    constructor(readonly filePath: string) {}

    async load(): Promise<BuildCheckpoint | null> {
        let raw: string;
        try {
            raw = await readFile(this.filePath, "utf-8");
        } catch (error) {
            if (error instanceof Error && "code" in error && error.code === "ENOENT") {
                return null;
            }
            throw error;
        }

        try {
            const parsed: unknown = JSON.parse(raw);
            if (isCheckpoint(parsed)) {
                return parsed;
            }
            console.warn(`⚠️  Ignoring malformed checkpoint ${this.filePath}`);
        } catch (error) {
            console.warn(`⚠️  Ignoring unreadable checkpoint ${this.filePath}: ${errorMessage(error)}`);
        }
        return null;
    }

    async save(checkpoint: BuildCheckpoint): Promise<void> {
        await mkdir(path.dirname(this.filePath), { recursive: true });
        const temp = `${this.filePath}.tmp`;
        await writeFile(temp, JSON.stringify(checkpoint));
        await rename(temp, this.filePath);
    }

    async clear(): Promise<void> {
        await rm(this.filePath, { force: true });
    }
}
