import fs from 'fs';
import path from 'path';
import type { z } from 'zod';
import { lastSessionSchema } from '../types/schemas.js';
import { toCsv } from '../utils.js';

export const cacheKeys = {
  courses: 'courses',
  topics: (courseId: string) => `course_${courseId}_topics`,
  groups: (courseId: string) => `course_${courseId}_groups`,
  gradeItems: (courseId: string) => `course_${courseId}_grade_items`,
};

export interface CacheEntry<T> {
  timestamp: string;
  data: T;
}

export interface MetaEntry {
  updated: string;
  rows: number;
}

const SAFE_KEY = /^[\w.-]+$/;

function readJson(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Disk cache under `<outputDir>/.cache/<key>.json`. Values are replaced whole;
 * a missing, unreadable or mis-shaped entry is a miss.
 */
export class CacheStore {
  private readonly cacheDir: string;
  private readonly lastSessionFile: string;

  constructor(private readonly outputDir: string, options: { lastSessionFile?: string } = {}) {
    this.cacheDir = path.join(outputDir, '.cache');
    this.lastSessionFile = options.lastSessionFile ?? path.join(outputDir, '.last_session');
  }

  private entryPath(key: string): string {
    if (!SAFE_KEY.test(key)) throw new Error(`Invalid cache key: ${key}`);
    return path.join(this.cacheDir, `${key}.json`);
  }

  loadEntry<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): CacheEntry<T> | null {
    const file = this.entryPath(key);
    if (!fs.existsSync(file)) return null;
    try {
      const raw = readJson(file);
      if (!raw || typeof raw !== 'object' || !('data' in raw)) return null;
      const parsed = schema.safeParse(raw.data);
      if (!parsed.success) {
        console.error(`[Cache] Ignoring ${key}: unexpected shape`);
        return null;
      }
      const timestamp = 'timestamp' in raw && typeof raw.timestamp === 'string' ? raw.timestamp : '';
      return { timestamp, data: parsed.data };
    } catch (error) {
      console.error(`[Cache] Error loading ${key}: ${describe(error)}`);
      return null;
    }
  }

  load<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
    return this.loadEntry(key, schema)?.data ?? null;
  }

  save(key: string, data: unknown): boolean {
    const entry: CacheEntry<unknown> = { timestamp: new Date().toISOString(), data };
    try {
      fs.mkdirSync(this.cacheDir, { recursive: true });
      fs.writeFileSync(this.entryPath(key), JSON.stringify(entry, null, 2), 'utf-8');
      return true;
    } catch (error) {
      console.error(`[Cache] Error saving ${key}: ${describe(error)}`);
      return false;
    }
  }

  /** Remove one entry, or every entry when no key is given. Returns the number removed. */
  clear(key?: string): number {
    if (!fs.existsSync(this.cacheDir)) return 0;
    const files = key
      ? [this.entryPath(key)].filter(file => fs.existsSync(file))
      : fs.readdirSync(this.cacheDir).filter(name => name.endsWith('.json')).map(name => path.join(this.cacheDir, name));
    for (const file of files) fs.rmSync(file);
    return files.length;
  }

  // ==================== COURSE SNAPSHOTS ====================

  courseDir(courseId: string): string {
    if (!SAFE_KEY.test(courseId)) throw new Error(`Invalid course id: ${courseId}`);
    const dir = path.join(this.outputDir, `course_${courseId}`);
    fs.mkdirSync(dir, { recursive: true });
    return dir;
  }

  loadMeta(courseId: string): Record<string, MetaEntry> {
    const file = path.join(this.courseDir(courseId), '.meta.json');
    if (!fs.existsSync(file)) return {};
    try {
      const raw = readJson(file);
      const meta: Record<string, MetaEntry> = {};
      if (raw && typeof raw === 'object') {
        for (const [key, value] of Object.entries(raw)) {
          if (value && typeof value === 'object' && 'updated' in value && 'rows' in value
            && typeof value.updated === 'string' && typeof value.rows === 'number') {
            meta[key] = { updated: value.updated, rows: value.rows };
          }
        }
      }
      return meta;
    } catch (error) {
      console.error(`[Cache] Error loading meta for course ${courseId}: ${describe(error)}`);
      return {};
    }
  }

  saveMeta(courseId: string, key: string, rows: number): void {
    const meta = this.loadMeta(courseId);
    meta[key] = { updated: new Date().toISOString(), rows };
    try {
      fs.writeFileSync(path.join(this.courseDir(courseId), '.meta.json'), JSON.stringify(meta, null, 2));
    } catch (error) {
      console.error(`[Cache] Error saving meta for course ${courseId}: ${describe(error)}`);
    }
  }

  /**
   * Write a CSV snapshot into the course directory and record its row count in
   * `.meta.json` under the file name without extension. Empty tables are not written.
   */
  saveCsv(
    courseId: string,
    filename: string,
    headers: string[],
    rows: Array<Array<string | number | boolean | null>>,
  ): string | null {
    if (rows.length === 0) return null;
    if (!SAFE_KEY.test(filename)) throw new Error(`Invalid file name: ${filename}`);
    const file = path.join(this.courseDir(courseId), filename);
    try {
      fs.writeFileSync(file, toCsv(headers, rows), 'utf-8');
    } catch (error) {
      console.error(`[Cache] Error saving ${filename}: ${describe(error)}`);
      return null;
    }
    this.saveMeta(courseId, filename.replace(/\.csv$/, ''), rows.length);
    return file;
  }

  // ==================== LAST SESSION ====================

  loadLastSession(): Record<string, unknown> {
    if (!fs.existsSync(this.lastSessionFile)) return {};
    try {
      const parsed = lastSessionSchema.safeParse(readJson(this.lastSessionFile));
      return parsed.success ? parsed.data : {};
    } catch (error) {
      console.error(`[Cache] Error loading last session: ${describe(error)}`);
      return {};
    }
  }

  /** Merge `data` into the last-session file */
  saveLastSession(data: Record<string, unknown>): boolean {
    try {
      const merged = { ...this.loadLastSession(), ...data };
      fs.mkdirSync(path.dirname(path.resolve(this.lastSessionFile)), { recursive: true });
      fs.writeFileSync(this.lastSessionFile, JSON.stringify(merged, null, 2));
      return true;
    } catch (error) {
      console.error(`[Cache] Error saving last session: ${describe(error)}`);
      return false;
    }
  }
}
