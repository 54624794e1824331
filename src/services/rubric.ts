import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { fail, ok } from '../paatshala-client.js';
import type { Result } from '../types/paatshala.js';
import { roundHalfEven } from '../utils.js';

export const rubricCriterionSchema = z.object({
  criterion: z.string().min(1),
  description: z.string(),
  weight_percent: z.number().nonnegative(),
});

export type RubricCriterion = z.infer<typeof rubricCriterionSchema>;

const rubricSchema = z.array(rubricCriterionSchema).min(1);

const rubricDocumentSchema = z.object({
  module_id: z.string(),
  group_id: z.string().nullable(),
  generated_at: z.string(),
  criteria: rubricSchema,
});

export type RubricDocument = z.infer<typeof rubricDocumentSchema>;

/** Drop a surrounding ``` fence (with or without a language tag) */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('```')) return trimmed;
  const lines = trimmed.split('\n');
  const body = lines[lines.length - 1].trim().startsWith('```') ? lines.slice(1, -1) : lines.slice(1);
  return body.join('\n').trim();
}

/**
 * Scale weights so they sum to exactly 100. Each weight is rounded on its own
 * (halves to even) and the rounding residual goes to the first criterion. A
 * negative residual larger than the first weight carries on to the following
 * criteria, so no weight drops below 0.
 */
export function normalizeWeights(criteria: RubricCriterion[]): RubricCriterion[] {
  const total = criteria.reduce((sum, item) => sum + item.weight_percent, 0);
  if (total === 100 || total <= 0) return criteria.map(item => ({ ...item }));

  const scaled = criteria.map(item => ({ ...item, weight_percent: roundHalfEven((item.weight_percent * 100) / total) }));
  let diff = 100 - scaled.reduce((sum, item) => sum + item.weight_percent, 0);
  if (diff > 0 && scaled.length > 0) {
    scaled[0] = { ...scaled[0], weight_percent: scaled[0].weight_percent + diff };
  }
  for (let i = 0; diff < 0 && i < scaled.length; i++) {
    const taken = Math.min(scaled[i].weight_percent, -diff);
    scaled[i] = { ...scaled[i], weight_percent: scaled[i].weight_percent - taken };
    diff += taken;
  }
  return scaled;
}

/**
 * Validate a rubric produced by a model: JSON (optionally fenced) holding an array of
 * `{ criterion, description, weight_percent }`, normalised to sum to 100.
 */
export function validateRubric(raw: unknown): Result<RubricCriterion[]> {
  let value: unknown = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(stripCodeFences(raw));
    } catch (error) {
      return fail('parse', `Rubric is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  const parsed = rubricSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return fail('parse', `Invalid rubric${where}: ${issue.message}`);
  }

  const total = parsed.data.reduce((sum, item) => sum + item.weight_percent, 0);
  if (total <= 0) return fail('parse', 'Rubric weights sum to 0');
  if (total !== 100) {
    console.error(`[Rubric] Weights sum to ${total}, normalising to 100`);
  }
  return ok(normalizeWeights(parsed.data));
}

// ==================== STORAGE ====================

function rubricFile(outputDir: string, courseId: string, moduleId: string, groupId?: string): string {
  const name = groupId ? `rubric_mod${moduleId}_grp${groupId}.json` : `rubric_mod${moduleId}.json`;
  return path.join(outputDir, `course_${courseId}`, 'rubrics', name);
}

export function saveRubric(
  outputDir: string,
  courseId: string,
  moduleId: string,
  criteria: RubricCriterion[],
  groupId?: string,
): string | null {
  const file = rubricFile(outputDir, courseId, moduleId, groupId);
  const doc: RubricDocument = {
    module_id: moduleId,
    group_id: groupId ?? null,
    generated_at: new Date().toISOString(),
    criteria,
  };
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify(doc, null, 2), 'utf-8');
    return file;
  } catch (error) {
    console.error(`[Rubric] Failed to save rubric: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

/** Group-specific rubric when one exists, otherwise the module's default rubric */
export function loadRubric(outputDir: string, courseId: string, moduleId: string, groupId?: string): RubricDocument | null {
  const candidates = groupId
    ? [rubricFile(outputDir, courseId, moduleId, groupId), rubricFile(outputDir, courseId, moduleId)]
    : [rubricFile(outputDir, courseId, moduleId)];

  for (const file of candidates) {
    if (!fs.existsSync(file)) continue;
    try {
      const parsed = rubricDocumentSchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf-8')));
      if (parsed.success) return parsed.data;
      console.error(`[Rubric] Ignoring malformed rubric ${path.basename(file)}`);
    } catch (error) {
      console.error(`[Rubric] Failed to load rubric: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  return null;
}

export function deleteRubric(outputDir: string, courseId: string, moduleId: string, groupId?: string): boolean {
  const file = rubricFile(outputDir, courseId, moduleId, groupId);
  if (!fs.existsSync(file)) return false;
  fs.rmSync(file);
  return true;
}
