/**
 * Heat Risk Engine — Artifact Storage
 *
 * Abstracts where model blobs live. Keys are opaque to callers: a file path
 * for FileStorage, any string for MemoryStorage.
 */

import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

export interface StorageBackend {
    /** Check if object exists */
    exists(key: string): Promise<boolean>;

    /** Write object, replacing any previous value */
    put(key: string, data: Uint8Array): Promise<void>;

    /** Get object, or null when absent */
    get(key: string): Promise<Uint8Array | null>;
}

/**
 * Local filesystem backend. Keys are paths, resolved against `rootDir`.
 */
export class FileStorage implements StorageBackend {
    constructor(private readonly rootDir: string = process.cwd()) { }

    private resolve(key: string): string {
        return path.resolve(this.rootDir, key);
    }

    async exists(key: string): Promise<boolean> {
        try {
            const info = await stat(this.resolve(key));
            return info.isFile();
        } catch (error) {
            if (isNotFound(error)) return false;
            throw error;
        }
    }

    async put(key: string, data: Uint8Array): Promise<void> {
        const target = this.resolve(key);
        await mkdir(path.dirname(target), { recursive: true });
        await writeFile(target, data);
    }

    async get(key: string): Promise<Uint8Array | null> {
        try {
            return new Uint8Array(await readFile(this.resolve(key)));
        } catch (error) {
            if (isNotFound(error)) return null;
            throw error;
        }
    }
}

/**
 * In-process backend for tests and ephemeral deployments.
 */
export class MemoryStorage implements StorageBackend {
    private readonly objects = new Map<string, Uint8Array>();

    async exists(key: string): Promise<boolean> {
        return this.objects.has(key);
    }

    async put(key: string, data: Uint8Array): Promise<void> {
        this.objects.set(key, new Uint8Array(data));
    }

    async get(key: string): Promise<Uint8Array | null> {
        const data = this.objects.get(key);
        return data ? new Uint8Array(data) : null;
    }
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
