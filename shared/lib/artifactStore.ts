/**
 * Durable storage for the index artifact pair.
 *
 * S3 in production, a local directory for development and for the build
 * CLI's own output.
 */
import { mkdir, readFile, rename, writeFile } from "fs/promises";
import path from "path";
import { GetObjectCommand, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import type { StorageConfig } from "../config/env.js";

export interface ArtifactStore {
    /** Human readable location, used in logs */
    readonly location: string;
    /** Object bytes, or null when the key does not exist */
    get(key: string): Promise<Buffer | null>;
    put(key: string, body: Buffer, contentType: string): Promise<void>;
}

function isMissingObjectError(error: unknown): boolean {
    if (!(error instanceof Error)) return false;
    return error.name === "NoSuchKey" || error.name === "NotFound";
}

export class S3ArtifactStore implements ArtifactStore {
    readonly location: string;

    constructor(
        private readonly bucket: string,
        private readonly client: S3Client = new S3Client({})
    ) {
        this.location = `s3://${bucket}`;
    }

    static fromConfig(config: StorageConfig): S3ArtifactStore {
        return new S3ArtifactStore(config.bucket, new S3Client({ region: config.region }));
    }

    async get(key: string): Promise<Buffer | null> {
        try {
            const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
            if (!response.Body) {
                return Buffer.alloc(0);
            }
            return Buffer.from(await response.Body.transformToByteArray());
        } catch (error) {
            if (isMissingObjectError(error)) {
                return null;
            }
            throw error;
        }
    }

    async put(key: string, body: Buffer, contentType: string): Promise<void> {
        await this.client.send(new PutObjectCommand({
            Bucket: this.bucket,
            Key: key,
            Body: body,
            ContentType: contentType,
            ContentEncoding: key.endsWith(".gz") ? "gzip" : undefined,
            Metadata: {
                "generated-at": new Date().toISOString(),
            },
        }));
    }
}

export class LocalArtifactStore implements ArtifactStore {
    readonly location: string;

    constructor(private readonly rootDir: string) {
        this.location = path.resolve(rootDir);
    }

    private resolve(key: string): string {
        const resolved = path.resolve(this.rootDir, key);
        if (resolved !== this.location && !resolved.startsWith(this.location + path.sep)) {
            throw new Error(`Artifact key escapes the store root: ${key}`);
        }
        return resolved;
    }

    async get(key: string): Promise<Buffer | null> {
        try {
            return await readFile(this.resolve(key));
        } catch (error) {
            if (error instanceof Error && "code" in error && error.code === "ENOENT") {
                return null;
            }
            throw error;
        }
    }

    /** Write-to-temp then rename, so readers never see a partial file. */
    async put(key: string, body: Buffer, _contentType: string): Promise<void> {
        const target = this.resolve(key);
        await mkdir(path.dirname(target), { recursive: true });
        const temp = `${target}.${process.pid}.${Date.now()}.tmp`;
        await writeFile(temp, body);
        await rename(temp, target);
    }
}

export function createArtifactStore(config: StorageConfig): ArtifactStore {
    return config.driver === "s3"
        ? S3ArtifactStore.fromConfig(config)
        : new LocalArtifactStore(config.localDir);
}
