import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CacheStore, cacheKeys } from '../src/services/cache.js';
import { TopicsState } from '../src/services/topics-state.js';
import { topicSchema } from '../src/types/schemas.js';
import { makeTopic } from './helpers.js';

describe('TopicsState', () => {
  let dir: string;
  let cache: CacheStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'topics-test-'));
    cache = new CacheStore(dir);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function threeTopics(onChange?: (courseId: string) => void): TopicsState {
    return new TopicsState(cache, '7', [makeTopic(1, 'A'), makeTopic(2, 'B'), makeTopic(3, 'C')], onChange);
  }

  it('renumbers after a move', () => {
    const state = threeTopics();
    expect(state.move(0, 2)).toBe(true);
    expect(state.get().map(t => [t.sectionNumber, t.name])).toEqual([[1, 'B'], [2, 'C'], [3, 'A']]);
    expect(state.get().map(t => t.dbId)).toEqual(['102', '103', '101']);
  });

  it('rejects moves out of range', () => {
    expect(threeTopics().move(0, 3)).toBe(false);
  });

  it('renumbers after removing and inserting', () => {
    const state = threeTopics();
    expect(state.removeAt(0)?.name).toBe('A');
    state.insertAt(1, makeTopic(99, 'New', { dbId: '' }));
    expect(state.get().map(t => [t.sectionNumber, t.name])).toEqual([[1, 'B'], [2, 'New'], [3, 'C']]);
    expect(state.removeAt(5)).toBeNull();
  });

  it('keeps the activity count in step with the activities', () => {
    const state = threeTopics();
    state.updateAt(1, {
      activities: [{ id: '9', name: 'Notes', type: 'page', url: '', visible: true }],
    });
    expect(state.at(1)?.activityCount).toBe(1);
    expect(state.updateAt(7, { name: 'x' })).toBe(false);
  });

  it('writes every change through to the cache and notifies', () => {
    const onChange = vi.fn();
    const state = threeTopics(onChange);
    state.updateAt(0, { name: 'Renamed' });

    expect(onChange).toHaveBeenCalledWith('7');
    expect(cache.load(cacheKeys.topics('7'), z.array(topicSchema))?.[0].name).toBe('Renamed');
  });

  it('seeds from the cache', () => {
    cache.save(cacheKeys.topics('7'), [makeTopic(0, 'General')]);
    const state = TopicsState.fromCache(cache, '7');
    expect(state.at(0)?.name).toBe('General');
  });
});
