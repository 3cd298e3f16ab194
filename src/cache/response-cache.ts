import { Logger } from '@nestjs/common';
import { createHash, randomBytes } from 'crypto';
import { promises as fs } from 'fs';
import * as path from 'path';
import { errorMessage } from '../common/utils/error.util';

export type CacheParams = Record<string, string | number | boolean | undefined>;

export interface CacheEntry<T = unknown> {
    key: string;
    fetchedAt: string;
    payload: T;
}

export interface CacheStats {
    hits: number;
    misses: number;
    writes: number;
}

function isCacheEntry(value: unknown): value is CacheEntry {
    if (typeof value !== 'object' || value === null) return false;
    return (
        'key' in value &&
        typeof value.key === 'string' &&
        'fetchedAt' in value &&
        typeof value.fetchedAt === 'string' &&
        'payload' in value
    );
}

/**
 * Content-addressed, write-once store for raw catalog responses. Entries live
 * at `<root>/<key[0..2]>/<key>.json` and are never rewritten.
 */
export class ResponseCache {
    private readonly logger = new Logger(ResponseCache.name);
    private readonly counters: CacheStats = { hits: 0, misses: 0, writes: 0 };

    private constructor(readonly root: string) {}

    static async open(root: string): Promise<ResponseCache> {
        const resolved = path.resolve(root);
        await fs.mkdir(resolved, { recursive: true });
        return new ResponseCache(resolved);
    }

    static normalizeRequest(url: string, params: CacheParams = {}): string {
        const query = Object.keys(params)
            .filter((name) => params[name] !== undefined)
            .sort()
            .map(
                (name) =>
                    `${encodeURIComponent(name)}=${encodeURIComponent(String(params[name]))}`,
            )
            .join('&');
        return query ? `${url}?${query}` : url;
    }

    static keyFor(url: string, params: CacheParams = {}): string {
        return createHash('sha256')
            .update(ResponseCache.normalizeRequest(url, params))
            .digest('hex');
    }

    async get(key: string): Promise<CacheEntry | undefined> {
        let raw: string;
        try {
            raw = await fs.readFile(this.pathFor(key), 'utf8');
        } catch {
            this.counters.misses++;
            return undefined;
        }

        try {
            const parsed: unknown = JSON.parse(raw);
            if (!isCacheEntry(parsed) || parsed.key !== key) {
                throw new Error('unexpected entry shape');
            }
            this.counters.hits++;
            return parsed;
        } catch (error) {
            this.logger.debug(
                `Ignoring unreadable cache entry ${key}: ${errorMessage(error)}`,
            );
            this.counters.misses++;
            return undefined;
        }
    }

    async put<T>(key: string, payload: T): Promise<void> {
        const target = this.pathFor(key);
        if (await this.exists(target)) {
            return;
        }

        const entry: CacheEntry<T> = {
            key,
            fetchedAt: new Date().toISOString(),
            payload,
        };
        const tmp = `${target}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`;

        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(tmp, JSON.stringify(entry), 'utf8');
        await fs.rename(tmp, target);
        this.counters.writes++;
    }

    stats(): CacheStats {
        return { ...this.counters };
    }

    private pathFor(key: string): string {
        return path.join(this.root, key.slice(0, 2), `${key}.json`);
    }

    private async exists(file: string): Promise<boolean> {
        try {
            await fs.access(file);
            return true;
        } catch {
            return false;
        }
    }
}
