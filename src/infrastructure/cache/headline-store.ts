import * as fs from 'fs';
import * as path from 'path';
import { HeadlineCacheMode } from '../../application/ports/headline-cache.port';
import {
  cacheFileName,
  cacheKeyToString,
  HeadlineCacheEntry,
  HeadlineCacheKey,
  parseCacheEntry,
} from '../../domain/entities/headline-cache-entry';

/** Physical backend of the headline cache. Failures surface as exceptions. */
export interface HeadlineStore {
  readonly kind: HeadlineCacheMode;
  read(key: HeadlineCacheKey): HeadlineCacheEntry | undefined;
  /** Returns false when the key cannot be stored and was skipped. */
  write(key: HeadlineCacheKey, entry: HeadlineCacheEntry): boolean;
  /** Removes entries whose key date differs from `today`; returns their names. */
  removeStale(today: string): string[];
}

export class MemoryHeadlineStore implements HeadlineStore {
  readonly kind = 'memory' as const;
  private readonly entries = new Map<string, { key: HeadlineCacheKey; entry: HeadlineCacheEntry }>();

  read(key: HeadlineCacheKey): HeadlineCacheEntry | undefined {
    return this.entries.get(cacheKeyToString(key))?.entry;
  }

  write(key: HeadlineCacheKey, entry: HeadlineCacheEntry): boolean {
    this.entries.set(cacheKeyToString(key), { key, entry });
    return true;
  }

  removeStale(today: string): string[] {
    const removed: string[] = [];
    for (const [name, { key }] of this.entries) {
      if (key.date !== today) {
        this.entries.delete(name);
        removed.push(name);
      }
    }
    return removed;
  }
}

const CACHE_FILE_PATTERN = /^headlines_.+\.json$/;
const CACHE_FILE_DATE = /_(\d{4}-\d{2}-\d{2})\.json$/;

export class FileHeadlineStore implements HeadlineStore {
  readonly kind = 'file' as const;

  constructor(readonly directory: string) {}

  /**
   * Creates the directory and writes then removes a probe file. Returns
   * false when the filesystem refuses either step.
   */
  static probe(directory: string): boolean {
    const probeFile = path.join(directory, `.write-probe-${process.pid}`);
    try {
      fs.mkdirSync(directory, { recursive: true });
      fs.writeFileSync(probeFile, 'ok', 'utf-8');
      fs.unlinkSync(probeFile);
      return true;
    } catch {
      return false;
    }
  }

  /** File for `key`, or undefined when its name would leave the cache directory. */
  pathFor(key: HeadlineCacheKey): string | undefined {
    const name = cacheFileName(key);
    if (path.basename(name) !== name) return undefined;
    const dir = path.resolve(this.directory);
    const file = path.resolve(dir, name);
    return path.dirname(file) === dir ? file : undefined;
  }

  read(key: HeadlineCacheKey): HeadlineCacheEntry | undefined {
    const file = this.pathFor(key);
    if (!file || !fs.existsSync(file)) return undefined;
    return parseCacheEntry(JSON.parse(fs.readFileSync(file, 'utf-8')));
  }

  /** Returns false when the key has no file inside the cache directory. */
  write(key: HeadlineCacheKey, entry: HeadlineCacheEntry): boolean {
    const file = this.pathFor(key);
    if (!file) return false;
    const tmp = `${file}.${process.pid}.tmp`;
    try {
      fs.writeFileSync(tmp, JSON.stringify(entry, null, 2), 'utf-8');
      fs.renameSync(tmp, file);
    } catch (error) {
      if (fs.existsSync(tmp)) fs.unlinkSync(tmp);
      throw error;
    }
    return true;
  }

  removeStale(today: string): string[] {
    if (!fs.existsSync(this.directory)) return [];
    const removed: string[] = [];
    for (const name of fs.readdirSync(this.directory)) {
      if (!CACHE_FILE_PATTERN.test(name)) continue;
      const date = CACHE_FILE_DATE.exec(name)?.[1];
      if (date === today) continue;
      fs.unlinkSync(path.join(this.directory, name));
      removed.push(name);
    }
    return removed;
  }
}
