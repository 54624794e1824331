import { z } from 'zod';
import { fail, ok } from '../paatshala-client.js';
import type { Result } from '../types/paatshala.js';

// ==================== MODEL ====================

export type RestrictionOperator = '&' | '|' | '!&' | '!|';
export type DateDirection = '>=' | '<';

export interface GroupCondition {
  type: 'group';
  /** Absent means "any group" */
  id?: number;
}

export interface DateCondition {
  type: 'date';
  d: DateDirection;
  /** Unix seconds */
  t: number;
}

export interface GradeCondition {
  type: 'grade';
  id: number;
  /** Percentages */
  min?: number;
  max?: number;
}

export interface CompletionCondition {
  type: 'completion';
  cm: number;
  /** 0 incomplete, 1 complete, 2 complete with pass, 3 complete with fail */
  e: number;
}

export type RestrictionCondition = GroupCondition | DateCondition | GradeCondition | CompletionCondition;

export interface RestrictionTree {
  op: RestrictionOperator;
  c: RestrictionNode[];
  showc?: boolean[];
  show?: boolean;
}

export type RestrictionNode = RestrictionCondition | RestrictionTree;

export const EMPTY_RESTRICTION_JSON = '{"op":"&","c":[],"showc":[]}';

// ==================== SCHEMAS ====================

const operatorSchema = z.enum(['&', '|', '!&', '!|']);

const conditionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('group'), id: z.number().int().optional() }).strict(),
  z.object({ type: z.literal('date'), d: z.enum(['>=', '<']), t: z.number().int() }).strict(),
  z.object({
    type: z.literal('grade'),
    id: z.number().int(),
    min: z.number().optional(),
    max: z.number().optional(),
  }).strict(),
  z.object({ type: z.literal('completion'), cm: z.number().int(), e: z.number().int().min(0).max(3) }).strict(),
]);

export const restrictionTreeSchema: z.ZodType<RestrictionTree> = z.lazy(() =>
  z.object({
    op: operatorSchema,
    c: z.array(z.union([conditionSchema, restrictionTreeSchema])),
    showc: z.array(z.boolean()).optional(),
    show: z.boolean().optional(),
  }).strict(),
);

export function isTree(node: RestrictionNode): node is RestrictionTree {
  return 'op' in node;
}

/**
 * Parse Moodle availability JSON. Blank input is the empty tree; condition
 * types other than group, date, grade and completion are rejected.
 */
export function parseRestrictions(json: string | null | undefined): Result<RestrictionTree> {
  if (!json || !json.trim()) return ok({ op: '&', c: [], showc: [] });
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    return fail('parse', `Invalid restriction JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  const parsed = restrictionTreeSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return fail('parse', `Unsupported restriction structure at ${issue.path.join('.') || 'root'}: ${issue.message}`);
  }
  return ok(parsed.data);
}

// ==================== SERIALIZATION ====================

type JsonNode = Record<string, unknown>;

function serializeCondition(condition: RestrictionCondition): JsonNode {
  switch (condition.type) {
    case 'group':
      return condition.id === undefined ? { type: 'group' } : { type: 'group', id: condition.id };
    case 'date':
      return { type: 'date', d: condition.d, t: condition.t };
    case 'grade': {
      const out: JsonNode = { type: 'grade', id: condition.id };
      if (condition.min !== undefined) out.min = condition.min;
      if (condition.max !== undefined) out.max = condition.max;
      return out;
    }
    case 'completion':
      return { type: 'completion', cm: condition.cm, e: condition.e };
    default: {
      const unreachable: never = condition;
      throw new Error(`Unknown condition: ${JSON.stringify(unreachable)}`);
    }
  }
}

function usesShowc(op: RestrictionOperator): boolean {
  return op === '&' || op === '!|';
}

function serializeNode(node: RestrictionNode, isRoot: boolean): JsonNode {
  if (!isTree(node)) return serializeCondition(node);
  const out: JsonNode = { op: node.op, c: node.c.map(child => serializeNode(child, false)) };
  // Only the root carries eye-icon flags; nested subtrees are plain {op, c}
  if (!isRoot) return out;
  if (usesShowc(node.op)) {
    out.showc = node.c.map((_, i) => node.showc?.[i] ?? node.show ?? true);
  } else {
    out.show = node.show ?? node.showc?.every(Boolean) ?? true;
  }
  return out;
}

export function serializeRestrictions(tree: RestrictionTree): string {
  return JSON.stringify(serializeNode(tree, true));
}

// ==================== BATCH REBUILD ====================

type Category = RestrictionCondition['type'] | 'other';

/** Removal marker: `null`, or an empty object */
export type Removal = null | Record<string, never>;

export interface RestrictionChanges {
  /** Group ids; several ids become an OR subtree. `[]` or null removes */
  groups?: number[] | null;
  date?: { direction: DateDirection; timestamp: number } | Removal;
  grade?: { id: number; min?: number; max?: number } | Removal;
  completion?: { cm: number; state: number } | Removal;
}

export interface RebuildOptions {
  operator?: RestrictionOperator;
  /** Hide the topic entirely from students who do not meet the conditions */
  hideWhenNotMet?: boolean;
}

function isRemoval(value: object | null): value is Removal {
  return value === null || Object.keys(value).length === 0;
}

function categoryOf(node: RestrictionNode): Category {
  if (!isTree(node)) return node.type;
  const leaves = node.c;
  if (leaves.length > 0 && leaves.every(child => !isTree(child) && child.type === 'group')) return 'group';
  return 'other';
}

/**
 * Apply per-category changes to an existing restriction tree. A category whose
 * change is `undefined` keeps its conditions verbatim; otherwise its conditions
 * are dropped and the new one (if any) appended.
 */
export function rebuildRestrictions(
  existing: RestrictionTree | null,
  changes: RestrictionChanges,
  options: RebuildOptions = {},
): RestrictionTree {
  const base: RestrictionTree = existing ?? { op: '&', c: [], showc: [] };
  let entries = base.c.map((node, i) => ({ node, show: base.showc?.[i] ?? base.show ?? true }));

  const replaced = new Set<Category>();
  const added: RestrictionNode[] = [];

  if (changes.groups !== undefined) {
    replaced.add('group');
    const ids = changes.groups ?? [];
    if (ids.length === 1) {
      added.push({ type: 'group', id: ids[0] });
    } else if (ids.length > 1) {
      added.push({ op: '|', c: ids.map(id => ({ type: 'group', id })) });
    }
  }
  if (changes.date !== undefined) {
    replaced.add('date');
    if (!isRemoval(changes.date)) {
      added.push({ type: 'date', d: changes.date.direction, t: changes.date.timestamp });
    }
  }
  if (changes.grade !== undefined) {
    replaced.add('grade');
    if (!isRemoval(changes.grade)) {
      const grade: GradeCondition = { type: 'grade', id: changes.grade.id };
      if (changes.grade.min !== undefined) grade.min = changes.grade.min;
      if (changes.grade.max !== undefined) grade.max = changes.grade.max;
      added.push(grade);
    }
  }
  if (changes.completion !== undefined) {
    replaced.add('completion');
    if (!isRemoval(changes.completion)) {
      added.push({ type: 'completion', cm: changes.completion.cm, e: changes.completion.state });
    }
  }

  entries = entries.filter(entry => !replaced.has(categoryOf(entry.node)));
  for (const node of added) entries.push({ node, show: true });

  const op = options.operator ?? base.op;
  const hide = options.hideWhenNotMet ?? false;
  const flags = entries.map(entry => (hide ? false : entry.show));
  const c = entries.map(entry => entry.node);

  if (usesShowc(op)) return { op, c, showc: flags };
  return { op, c, show: hide ? false : (base.show ?? true) };
}

// ==================== SUMMARY ====================

export interface SummaryLookups {
  groups?: Record<string, string>;
  gradeItems?: Record<string, string>;
  completionItems?: Record<string, string>;
}

const OPERATOR_LABELS: Record<RestrictionOperator, string> = {
  '&': 'All of',
  '|': 'Any of',
  '!&': 'Not all of',
  '!|': 'None of',
};

const COMPLETION_STATES = ['incomplete', 'complete', 'complete with pass', 'complete with fail'];

function formatTimestamp(seconds: number): string {
  return new Date(seconds * 1000).toISOString().slice(0, 16).replace('T', ' ');
}

function describeCondition(condition: RestrictionCondition, lookups: SummaryLookups): string {
  switch (condition.type) {
    case 'group':
      if (condition.id === undefined) return 'Group: any';
      return `Group: ${lookups.groups?.[String(condition.id)] ?? condition.id}`;
    case 'date':
      return `${condition.d === '>=' ? 'From' : 'Until'}: ${formatTimestamp(condition.t)} UTC`;
    case 'grade': {
      const name = lookups.gradeItems?.[String(condition.id)] ?? `item ${condition.id}`;
      const bounds = [
        condition.min !== undefined ? `>= ${condition.min}%` : '',
        condition.max !== undefined ? `< ${condition.max}%` : '',
      ].filter(Boolean).join(', ');
      return bounds ? `Grade: ${name} (${bounds})` : `Grade: ${name}`;
    }
    case 'completion': {
      const name = lookups.completionItems?.[String(condition.cm)] ?? `activity ${condition.cm}`;
      return `Completion: ${name} must be ${COMPLETION_STATES[condition.e] ?? 'complete'}`;
    }
    default: {
      const unreachable: never = condition;
      return JSON.stringify(unreachable);
    }
  }
}

function describeNode(node: RestrictionNode, lookups: SummaryLookups, indent: string, lines: string[]): void {
  if (!isTree(node)) {
    lines.push(indent + describeCondition(node, lookups));
    return;
  }
  lines.push(`${indent}${OPERATOR_LABELS[node.op]}:`);
  for (const child of node.c) describeNode(child, lookups, indent + '  ', lines);
}

/**
 * Human-readable lines for a restriction tree. Conditions of an "all of" root are
 * listed flat; any other root or nested subtree gets a header and indented children.
 */
export function summarizeRestrictions(tree: RestrictionTree, lookups: SummaryLookups = {}): string[] {
  const lines: string[] = [];
  if (tree.c.length === 0) return lines;
  if (tree.op === '&') {
    for (const child of tree.c) describeNode(child, lookups, '', lines);
  } else {
    describeNode(tree, lookups, '', lines);
  }
  if (tree.showc?.length && tree.showc.every(flag => !flag)) lines.push('Hidden when not met');
  if (tree.show === false) lines.push('Hidden when not met');
  return lines;
}
