import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  deleteRubric,
  loadRubric,
  normalizeWeights,
  saveRubric,
  stripCodeFences,
  validateRubric,
} from '../src/services/rubric.js';

function criteria(...weights: number[]) {
  return weights.map((weight_percent, i) => ({ criterion: `C${i + 1}`, description: `Level ${i + 1}`, weight_percent }));
}

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('normalizeWeights', () => {
  it('gives the rounding residual to the first criterion', () => {
    expect(normalizeWeights(criteria(30, 30, 30)).map(c => c.weight_percent)).toEqual([34, 33, 33]);
  });

  it('scales evenly when rounding is exact', () => {
    expect(normalizeWeights(criteria(10, 10)).map(c => c.weight_percent)).toEqual([50, 50]);
  });

  it('rounds exact halves to even so many small weights stay non-negative', () => {
    const weights = normalizeWeights(criteria(...Array<number>(40).fill(1))).map(c => c.weight_percent);
    expect(weights[0]).toBe(22);
    expect(weights.slice(1).every(w => w === 2)).toBe(true);
    expect(weights.reduce((a, b) => a + b, 0)).toBe(100);
  });

  it('carries a large negative residual past the first criterion', () => {
    const weights = normalizeWeights(criteria(...Array<number>(150).fill(2))).map(c => c.weight_percent);
    expect(weights.slice(0, 50).every(w => w === 0)).toBe(true);
    expect(weights.slice(50).every(w => w === 1)).toBe(true);
    expect(weights.reduce((a, b) => a + b, 0)).toBe(100);
  });

  it('leaves rubrics that already sum to 100', () => {
    expect(normalizeWeights(criteria(60, 40)).map(c => c.weight_percent)).toEqual([60, 40]);
  });
});

describe('stripCodeFences', () => {
  it('removes a fenced block with a language tag', () => {
    expect(stripCodeFences('```json\n[1]\n```')).toBe('[1]');
  });

  it('leaves plain text alone', () => {
    expect(stripCodeFences('  [1] ')).toBe('[1]');
  });
});

describe('validateRubric', () => {
  it('accepts fenced JSON and normalises the weights', () => {
    const raw = '```json\n' + JSON.stringify(criteria(1, 1, 2)) + '\n```';
    const result = validateRubric(raw);
    expect(result.ok ? result.value.map(c => c.weight_percent) : null).toEqual([25, 25, 50]);
    expect(console.error).toHaveBeenCalledWith('[Rubric] Weights sum to 4, normalising to 100');
  });

  it('accepts an already parsed array', () => {
    expect(validateRubric(criteria(100))).toEqual({ ok: true, value: criteria(100) });
  });

  it('rejects text that is not JSON', () => {
    const result = validateRubric('here is your rubric');
    expect(result.ok ? null : result.error.kind).toBe('parse');
    expect(result.ok ? '' : result.error.message).toMatch(/^Rubric is not valid JSON/);
  });

  it('rejects an empty rubric', () => {
    const result = validateRubric('[]');
    expect(result.ok ? '' : result.error.message).toMatch(/^Invalid rubric: /);
  });

  it('names the missing field', () => {
    const result = validateRubric([{ criterion: 'Clarity', weight_percent: 100 }]);
    expect(result.ok ? '' : result.error.message).toBe('Invalid rubric at 0.description: Required');
  });

  it('rejects weights that sum to zero', () => {
    const result = validateRubric(criteria(0, 0));
    expect(result.ok ? null : result.error).toEqual({ kind: 'parse', message: 'Rubric weights sum to 0' });
  });
});

describe('rubric storage', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rubric-test-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('saves under the course directory and loads it back', () => {
    const file = saveRubric(dir, '42', '7', criteria(100));
    expect(file).toBe(path.join(dir, 'course_42', 'rubrics', 'rubric_mod7.json'));

    const loaded = loadRubric(dir, '42', '7');
    expect(loaded?.module_id).toBe('7');
    expect(loaded?.group_id).toBeNull();
    expect(loaded?.criteria).toEqual(criteria(100));
  });

  it('prefers the group rubric and falls back to the default', () => {
    saveRubric(dir, '42', '7', criteria(100));
    saveRubric(dir, '42', '7', criteria(50, 50), '3');

    expect(loadRubric(dir, '42', '7', '3')?.criteria).toEqual(criteria(50, 50));
    expect(loadRubric(dir, '42', '7', '9')?.criteria).toEqual(criteria(100));
  });

  it('reads back a normalised rubric built from many small weights', () => {
    const result = validateRubric(criteria(...Array<number>(40).fill(1)));
    if (!result.ok) throw new Error(result.error.message);
    expect(result.value.every(c => c.weight_percent >= 0)).toBe(true);

    saveRubric(dir, '42', '2', result.value);
    expect(loadRubric(dir, '42', '2')?.criteria).toEqual(result.value);
  });

  it('returns null when nothing is stored', () => {
    expect(loadRubric(dir, '42', '8')).toBeNull();
  });

  it('ignores malformed files', () => {
    const file = path.join(dir, 'course_42', 'rubrics', 'rubric_mod7.json');
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, '{"criteria":"nope"}');
    expect(loadRubric(dir, '42', '7')).toBeNull();
    expect(console.error).toHaveBeenCalledWith('[Rubric] Ignoring malformed rubric rubric_mod7.json');
  });

  it('deletes a stored rubric once', () => {
    saveRubric(dir, '42', '7', criteria(100));
    expect(deleteRubric(dir, '42', '7')).toBe(true);
    expect(deleteRubric(dir, '42', '7')).toBe(false);
  });
});
