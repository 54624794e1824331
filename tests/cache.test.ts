import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CacheStore, cacheKeys } from '../src/services/cache.js';

const namesSchema = z.array(z.string());

describe('CacheStore', () => {
  let dir: string;
  let cache: CacheStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cache-test-'));
    cache = new CacheStore(dir);
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('saves entries with a timestamp and loads them back', () => {
    expect(cache.save('courses', ['a', 'b'])).toBe(true);
    const entry = cache.loadEntry('courses', namesSchema);
    expect(entry?.data).toEqual(['a', 'b']);
    expect(entry?.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
    expect(fs.existsSync(path.join(dir, '.cache', 'courses.json'))).toBe(true);
  });

  it('treats a missing entry as a miss', () => {
    expect(cache.load('courses', namesSchema)).toBeNull();
  });

  it('treats a mis-shaped entry as a miss', () => {
    cache.save('courses', [1, 2]);
    expect(cache.load('courses', namesSchema)).toBeNull();
    expect(console.error).toHaveBeenCalledWith('[Cache] Ignoring courses: unexpected shape');
  });

  it('treats unreadable JSON as a miss', () => {
    fs.mkdirSync(path.join(dir, '.cache'), { recursive: true });
    fs.writeFileSync(path.join(dir, '.cache', 'courses.json'), '{broken');
    expect(cache.load('courses', namesSchema)).toBeNull();
  });

  it('refuses keys that could leave the cache directory', () => {
    expect(() => cache.load('../secrets', namesSchema)).toThrow('Invalid cache key: ../secrets');
  });

  it('builds per-course keys', () => {
    expect(cacheKeys.topics('7')).toBe('course_7_topics');
    expect(cacheKeys.gradeItems('7')).toBe('course_7_grade_items');
  });

  it('clears one entry or all of them', () => {
    cache.save('courses', []);
    cache.save(cacheKeys.topics('7'), []);
    cache.save(cacheKeys.groups('7'), []);

    expect(cache.clear(cacheKeys.topics('7'))).toBe(1);
    expect(cache.clear('missing')).toBe(0);
    expect(cache.clear()).toBe(2);
  });

  it('writes CSV snapshots and records their row counts', () => {
    const file = cache.saveCsv('7', 'tasks_7.csv', ['Name', 'Due'], [['Essay', '2026-03-06'], ['Quiz', null]]);
    expect(file).toBe(path.join(dir, 'course_7', 'tasks_7.csv'));
    expect(fs.readFileSync(path.join(dir, 'course_7', 'tasks_7.csv'), 'utf-8')).toBe('Name,Due\nEssay,2026-03-06\nQuiz,\n');
    expect(cache.loadMeta('7').tasks_7.rows).toBe(2);
  });

  it('skips empty CSV snapshots', () => {
    expect(cache.saveCsv('7', 'tasks_7.csv', ['Name'], [])).toBeNull();
    expect(cache.loadMeta('7')).toEqual({});
  });

  it('merges into the last-session file', () => {
    cache.saveLastSession({ last_course_id: '7' });
    cache.saveLastSession({ last_module_id: '41' });
    expect(cache.loadLastSession()).toEqual({ last_course_id: '7', last_module_id: '41' });
  });
});
