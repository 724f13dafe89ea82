/**
 * Cache store.
 *
 * A thin addressing layer over a key/blob backend. It resolves exact hits
 * and fallback restore hints, and turns every backend failure into a
 * logged CacheError so the caller can carry on provisioning cold.
 * Eviction is left to the backend's storage.
 */

import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { CacheError, errorMessage, isNodeError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { CacheBackend, CacheEntry, CacheLookup } from './types.js';

export class CacheStore {
    constructor(
        private readonly backend: CacheBackend,
        private readonly logger: Logger = silentLogger
    ) {}

    /**
     * Exact lookup. A backend failure counts as a miss.
     */
    async get(key: string): Promise<CacheEntry | undefined> {
        try {
            return await this.backend.get(key);
        } catch (error) {
            this.logger.warn(new CacheError('get', key, error).message);
            return undefined;
        }
    }

    /**
     * Store a payload under its exact key.
     *
     * @returns false when the backend rejected the write
     */
    async put(key: string, payload: Buffer): Promise<boolean> {
        try {
            await this.backend.put(key, payload);
            return true;
        } catch (error) {
            this.logger.warn(new CacheError('put', key, error).message);
            return false;
        }
    }

    /**
     * Look up an exact key, then each fallback prefix in order.
     *
     * Fallback matches are returned as hints, never as hits.
     */
    async lookup(key: string, fallbackKeys: readonly string[] = []): Promise<CacheLookup> {
        try {
            const exact = await this.backend.get(key);
            if (exact) {
                return { kind: 'hit', entry: exact };
            }

            for (const prefix of fallbackKeys) {
                const entry = await this.backend.findLatest(prefix);
                if (entry && entry.key !== key) {
                    return { kind: 'hint', entry };
                }
            }

            return { kind: 'miss' };
        } catch (error) {
            const cacheError = new CacheError('lookup', key, error);
            this.logger.warn(`${cacheError.message}; provisioning without cache`);
            return { kind: 'miss', error: cacheError };
        }
    }
}

/**
 * In-process backend. Entries live as long as the instance.
 */
export class MemoryCacheBackend implements CacheBackend {
    private entries = new Map<string, CacheEntry>();

    constructor(private readonly now: () => Date = () => new Date()) {}

    async get(key: string): Promise<CacheEntry | undefined> {
        const entry = this.entries.get(key);
        return entry ? { ...entry, payload: Buffer.from(entry.payload) } : undefined;
    }

    async put(key: string, payload: Buffer): Promise<void> {
        // Re-insert so that Map order tracks write order
        this.entries.delete(key);
        this.entries.set(key, {
            key,
            payload: Buffer.from(payload),
            createdAt: this.now().toISOString(),
        });
    }

    async findLatest(prefix: string): Promise<CacheEntry | undefined> {
        let latest: CacheEntry | undefined;
        for (const entry of this.entries.values()) {
            if (entry.key.startsWith(prefix) && (!latest || entry.createdAt >= latest.createdAt)) {
                latest = entry;
            }
        }
        return latest ? this.get(latest.key) : undefined;
    }

    get size(): number {
        return this.entries.size;
    }
}

interface EntryMetadata {
    key: string;
    createdAt: string;
}

function isEntryMetadata(value: unknown): value is EntryMetadata {
    return typeof value === 'object' && value !== null
        && 'key' in value && typeof value.key === 'string'
        && 'createdAt' in value && typeof value.createdAt === 'string';
}

/**
 * Directory backend.
 *
 * Each entry is a `<name>.blob` with a `<name>.json` metadata sidecar, where
 * name is the URI-encoded key. Both are written through a temporary file and
 * renamed into place, blob first, so a visible sidecar always has its blob.
 * Concurrent writers of the same key end with the last rename.
 */
export class FileCacheBackend implements CacheBackend {
    constructor(
        private readonly dir: string,
        private readonly now: () => Date = () => new Date()
    ) {}

    async get(key: string): Promise<CacheEntry | undefined> {
        const metadata = await this.readMetadata(this.metadataPath(key));
        if (!metadata || metadata.key !== key) {
            return undefined;
        }

        try {
            const payload = await fs.readFile(this.blobPath(key));
            return { key, payload, createdAt: metadata.createdAt };
        } catch (error) {
            if (isNodeError(error) && error.code === 'ENOENT') {
                return undefined;
            }
            throw error;
        }
    }

    async put(key: string, payload: Buffer): Promise<void> {
        await fs.mkdir(this.dir, { recursive: true });
        const metadata: EntryMetadata = { key, createdAt: this.now().toISOString() };

        await this.writeAtomic(this.blobPath(key), payload);
        await this.writeAtomic(this.metadataPath(key), JSON.stringify(metadata));
    }

    async findLatest(prefix: string): Promise<CacheEntry | undefined> {
        let names: string[];
        try {
            names = await fs.readdir(this.dir);
        } catch (error) {
            if (isNodeError(error) && error.code === 'ENOENT') {
                return undefined;
            }
            throw error;
        }

        const candidates: EntryMetadata[] = [];
        for (const name of names) {
            if (!name.endsWith('.json')) {
                continue;
            }
            const metadata = await this.readMetadata(path.join(this.dir, name));
            if (metadata && metadata.key.startsWith(prefix)) {
                candidates.push(metadata);
            }
        }

        // Newest first; key order breaks ties so the choice is stable
        candidates.sort((a, b) =>
            b.createdAt.localeCompare(a.createdAt) || a.key.localeCompare(b.key)
        );

        for (const candidate of candidates) {
            const entry = await this.get(candidate.key);
            if (entry) {
                return entry;
            }
        }
        return undefined;
    }

    private fileName(key: string): string {
        return encodeURIComponent(key);
    }

    private blobPath(key: string): string {
        return path.join(this.dir, `${this.fileName(key)}.blob`);
    }

    private metadataPath(key: string): string {
        return path.join(this.dir, `${this.fileName(key)}.json`);
    }

    private async readMetadata(filePath: string): Promise<EntryMetadata | undefined> {
        let content: string;
        try {
            content = await fs.readFile(filePath, 'utf-8');
        } catch (error) {
            if (isNodeError(error) && error.code === 'ENOENT') {
                return undefined;
            }
            throw error;
        }

        try {
            const parsed: unknown = JSON.parse(content);
            return isEntryMetadata(parsed) ? parsed : undefined;
        } catch (error) {
            throw new Error(`Corrupt cache metadata ${filePath}: ${errorMessage(error)}`, { cause: error });
        }
    }

    private async writeAtomic(target: string, content: Buffer | string): Promise<void> {
        const temp = `${target}.${randomUUID()}.tmp`;
        try {
            await fs.writeFile(temp, content);
            await fs.rename(temp, target);
        } catch (error) {
            await fs.rm(temp, { force: true });
            throw error;
        }
    }
}
