import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_CONCURRENCY } from '../config.js';
import { fail, ok, type PaatshalaClient } from '../paatshala-client.js';
import { effectiveGrade } from '../parsers/grading.js';
import type { GradingTable, QuizScoreTable, Result } from '../types/paatshala.js';
import { roundHalfEven, runWithConcurrency } from '../utils.js';
import { fetchGradingTable, fetchQuizScores, type PoolOptions } from './scraper.js';

export const skillDefinitionsSchema = z.object({
  milestones: z.array(z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    skills: z.array(z.object({
      id: z.string().min(1),
      name: z.string().min(1),
    })),
  })),
});

export type SkillDefinitions = z.infer<typeof skillDefinitionsSchema>;

/** Quiz name, or assignment module id for tasks, to the skill ids it counts towards */
export const skillMappingSchema = z.record(z.array(z.string()));

export type SkillMapping = z.infer<typeof skillMappingSchema>;

/** Alternative student name to the name it should be merged into */
export const nameAliasesSchema = z.record(z.string());

export interface SkillConfig {
  skills: SkillDefinitions;
  quizMappings: SkillMapping;
  taskMappings: SkillMapping;
  nameAliases: Record<string, string>;
}

export interface FlatSkill {
  id: string;
  name: string;
  milestoneId: string;
  milestoneName: string;
}

export interface SkillMatrixRow {
  student: string;
  /** Skill name to the rounded 0-10 average, null when nothing was mapped for the student */
  scores: Record<string, number | null>;
}

export interface SkillMatrix {
  /** Skill names in definition order */
  skills: string[];
  rows: SkillMatrixRow[];
}

export interface TaskGrades {
  moduleId: string;
  table: GradingTable;
}

/** Scored from submission status instead of the grade */
export const TIMELINESS_SKILL = 'S25';

const DEFAULT_TASK_MAX_GRADE = 15;

const CONFIG_FILES = {
  skills: 'skills.json',
  quizMappings: 'quiz_mappings.json',
  taskMappings: 'task_mappings.json',
  nameAliases: 'name_aliases.json',
} as const;

function lookup<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ==================== DEFINITIONS ====================

let defaultSkills: SkillDefinitions | null = null;

/** The built-in milestones and skills, used until a course saves its own */
export function defaultSkillDefinitions(): SkillDefinitions {
  if (!defaultSkills) {
    const raw = fs.readFileSync(new URL('../../data/default-skills.json', import.meta.url), 'utf-8');
    defaultSkills = skillDefinitionsSchema.parse(JSON.parse(raw));
  }
  return structuredClone(defaultSkills);
}

export function flattenSkills(skills: SkillDefinitions): FlatSkill[] {
  return skills.milestones.flatMap(milestone => milestone.skills.map(skill => ({
    id: skill.id,
    name: skill.name,
    milestoneId: milestone.id,
    milestoneName: milestone.name,
  })));
}

// ==================== STORAGE ====================

export function skillConfigDir(outputDir: string, courseId: string): string {
  return path.join(outputDir, `course_${courseId}`, 'skill_config');
}

function readConfigFile<T>(file: string, schema: z.ZodType<T>, fallback: T): T {
  if (!fs.existsSync(file)) return fallback;
  try {
    const parsed = schema.safeParse(JSON.parse(fs.readFileSync(file, 'utf-8')));
    if (parsed.success) return parsed.data;
    console.error(`[Skills] Ignoring malformed ${path.basename(file)}, using defaults`);
  } catch (error) {
    console.error(`[Skills] Failed to read ${path.basename(file)}: ${describe(error)}`);
  }
  return fallback;
}

export function loadSkillConfig(outputDir: string, courseId: string): SkillConfig {
  const dir = skillConfigDir(outputDir, courseId);
  return {
    skills: readConfigFile<SkillDefinitions>(path.join(dir, CONFIG_FILES.skills), skillDefinitionsSchema, defaultSkillDefinitions()),
    quizMappings: readConfigFile<SkillMapping>(path.join(dir, CONFIG_FILES.quizMappings), skillMappingSchema, {}),
    taskMappings: readConfigFile<SkillMapping>(path.join(dir, CONFIG_FILES.taskMappings), skillMappingSchema, {}),
    nameAliases: readConfigFile<Record<string, string>>(path.join(dir, CONFIG_FILES.nameAliases), nameAliasesSchema, {}),
  };
}

function checkConfig(config: SkillConfig): Result<void> {
  const known = new Set<string>();
  for (const skill of flattenSkills(config.skills)) {
    if (known.has(skill.id)) return fail('parse', `Duplicate skill id: ${skill.id}`);
    known.add(skill.id);
  }

  const mappings: Array<[string, SkillMapping]> = [['quiz', config.quizMappings], ['task', config.taskMappings]];
  for (const [kind, mapping] of mappings) {
    const unknown = [...new Set(Object.values(mapping).flat())].filter(skillId => !known.has(skillId));
    if (unknown.length > 0) return fail('parse', `Unknown skill ids in ${kind} mappings: ${unknown.join(', ')}`);
  }

  const badKey = Object.keys(config.taskMappings).find(key => !/^\d+$/.test(key));
  if (badKey !== undefined) {
    return fail('parse', `Task mappings are keyed by assignment module ID, got "${badKey}"`);
  }
  return ok(undefined);
}

/**
 * Merge the given parts into the stored configuration and write only those parts.
 * Mappings may only name skills that exist once the update is applied.
 */
export function saveSkillConfig(outputDir: string, courseId: string, update: Partial<SkillConfig>): Result<string[]> {
  const current = loadSkillConfig(outputDir, courseId);
  const next: SkillConfig = {
    skills: update.skills ?? current.skills,
    quizMappings: update.quizMappings ?? current.quizMappings,
    taskMappings: update.taskMappings ?? current.taskMappings,
    nameAliases: update.nameAliases ?? current.nameAliases,
  };
  const checked = checkConfig(next);
  if (!checked.ok) return checked;

  const dir = skillConfigDir(outputDir, courseId);
  fs.mkdirSync(dir, { recursive: true });
  const written: string[] = [];
  for (const key of ['skills', 'quizMappings', 'taskMappings', 'nameAliases'] as const) {
    if (update[key] === undefined) continue;
    const file = path.join(dir, CONFIG_FILES[key]);
    fs.writeFileSync(file, JSON.stringify(next[key], null, 2), 'utf-8');
    written.push(file);
  }
  return ok(written);
}

// ==================== SCORING ====================

/**
 * Collapse the spellings one student appears under: batch suffixes such as
 * "CL-SMP-CSA-14-NOV-2025-TVM" or "14-NOV-2025 ..." are dropped and the rest is title-cased.
 */
export function normalizeStudentName(name: string): string {
  const trimmed = name.trim();
  if (['', 'nan', 'none'].includes(trimmed.toLowerCase())) return '';
  const stripped = trimmed
    .replace(/\s+[A-Z]{2,}-[A-Z]{2,}-.*$/, '')
    .replace(/\s+\d{2}-[A-Z]{3}-\d{4}.*$/, '')
    .trim();
  return stripped.toLowerCase().replace(/(^|[^\p{L}])(\p{L})/gu, (_, before: string, letter: string) => before + letter.toUpperCase());
}

function parseFraction(text: string): number | null {
  const parts = text.split('/');
  if (parts.length !== 2 || !parts[0].trim() || !parts[1].trim()) return null;
  const num = Number(parts[0]);
  const denom = Number(parts[1]);
  if (!Number.isFinite(num) || !Number.isFinite(denom) || denom <= 0) return null;
  return (num / denom) * 10;
}

/** A quiz score on the 0-10 scale: values above 10 are read as percentages, "a/b" as a fraction */
export function parseScoreNormalized(score: number | string | null): number | null {
  if (score === null) return null;
  if (typeof score === 'number') return score > 10 ? score / 10 : score;

  const text = score.replace(/%/g, '').trim();
  if (!text) return null;
  const value = Number(text);
  if (Number.isFinite(value)) return value > 10 ? value / 10 : value;
  return parseFraction(text);
}

/** A task grade on the 0-10 scale, clamped. Bare numbers are read against `maxGrade` (default 15). */
export function taskGradeScore(grade: string, maxGrade: number | null): number | null {
  const text = grade.trim();
  let score: number | null;
  if (text.includes('/')) {
    score = parseFraction(text);
  } else {
    const value = Number(text);
    const max = maxGrade && maxGrade > 0 ? maxGrade : DEFAULT_TASK_MAX_GRADE;
    score = text && Number.isFinite(value) ? (value / max) * 10 : null;
  }
  return score === null ? null : Math.max(0, Math.min(10, score));
}

/** 10 for an on-time submission, 0 for a late or missing one, null when the status does not say */
export function timelinessScore(status: string): number | null {
  const lower = status.toLowerCase();
  if (lower.includes('late') || lower.includes('overdue')) return 0;
  if (lower.includes('submitted') && lower.includes('graded')) return 10;
  if (lower.includes('no submission')) return 0;
  return null;
}

/**
 * Average every mapped quiz and task score per student and skill. Names are
 * normalised and aliased first so one student's rows merge; each average is
 * rounded to a whole number with halves going to the even neighbour.
 */
export function calculateSkillScores(
  inputs: { quizScores?: QuizScoreTable | null; tasks?: TaskGrades[] },
  config: SkillConfig,
): SkillMatrix {
  const skills = flattenSkills(config.skills);
  const byStudent = new Map<string, Map<string, number[]>>();

  const add = (rawName: string, skillId: string, score: number) => {
    const normalized = normalizeStudentName(rawName);
    const student = lookup(config.nameAliases, normalized) ?? normalized;
    if (!student) return;
    const scores = byStudent.get(student) ?? new Map<string, number[]>();
    scores.set(skillId, [...(scores.get(skillId) ?? []), score]);
    byStudent.set(student, scores);
  };

  for (const row of inputs.quizScores?.rows ?? []) {
    for (const [quizName, raw] of Object.entries(row.scores)) {
      const score = parseScoreNormalized(raw);
      if (score === null) continue;
      for (const skillId of lookup(config.quizMappings, quizName) ?? []) add(row.student, skillId, score);
    }
  }

  for (const { moduleId, table } of inputs.tasks ?? []) {
    const skillIds = lookup(config.taskMappings, moduleId) ?? [];
    const graded = skillIds.filter(skillId => skillId !== TIMELINESS_SKILL);
    for (const row of table.rows) {
      if (skillIds.includes(TIMELINESS_SKILL)) {
        const onTime = timelinessScore(row.status);
        if (onTime !== null) add(row.name, TIMELINESS_SKILL, onTime);
      }
      if (graded.length === 0) continue;
      const score = taskGradeScore(effectiveGrade(row), table.maxGrade);
      if (score === null) continue;
      for (const skillId of graded) add(row.name, skillId, score);
    }
  }

  const rows = [...byStudent.keys()].sort().map(student => {
    const scores = byStudent.get(student) ?? new Map<string, number[]>();
    return {
      student,
      scores: Object.fromEntries(skills.map((skill): [string, number | null] => {
        const values = scores.get(skill.id) ?? [];
        const average = values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : null;
        return [skill.name, average === null ? null : roundHalfEven(average)];
      })),
    };
  });
  return { skills: skills.map(skill => skill.name), rows };
}

/**
 * Fetch the practice-quiz scores and the grading table of every mapped task, then
 * score them. A task whose grading table cannot be read is listed in `failedTasks`.
 */
export async function collectSkillMatrix(
  client: PaatshalaClient,
  courseId: string,
  config: SkillConfig,
  options: PoolOptions & { groupId?: string } = {},
): Promise<Result<SkillMatrix & { failedTasks: string[] }>> {
  let quizScores: QuizScoreTable | null = null;
  if (Object.keys(config.quizMappings).length > 0) {
    const fetched = await fetchQuizScores(client, courseId, options);
    if (!fetched.ok) return fetched;
    quizScores = fetched.value;
  }

  const moduleIds = Object.keys(config.taskMappings).filter(key => /^\d+$/.test(key));
  const jobs = moduleIds.map(moduleId => async (): Promise<GradingTable | null> => {
    const table = await fetchGradingTable(client.fork(), moduleId, options.groupId);
    if (table.ok) return table.value;
    console.error(`[Skills] Grading table for module ${moduleId}: ${table.error.message}`);
    return null;
  });
  const settled = await runWithConcurrency(jobs, options.concurrency ?? DEFAULT_CONCURRENCY);

  const tasks: TaskGrades[] = [];
  const failedTasks: string[] = [];
  settled.forEach((result, i) => {
    if (result.status === 'fulfilled' && result.value) {
      tasks.push({ moduleId: moduleIds[i], table: result.value });
      return;
    }
    if (result.status === 'rejected') {
      console.error(`[Skills] Grading table for module ${moduleIds[i]} failed: ${describe(result.reason)}`);
    }
    failedTasks.push(moduleIds[i]);
  });

  return ok({ ...calculateSkillScores({ quizScores, tasks }, config), failedTasks });
}
