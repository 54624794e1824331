import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getAppContext, unwrap, type AppContext } from '../context.js';
import { cacheKeys } from '../services/cache.js';
import {
  EMPTY_RESTRICTION_JSON,
  parseRestrictions,
  summarizeRestrictions,
  type RestrictionChanges,
  type RestrictionOperator,
  type SummaryLookups,
} from '../services/restrictions.js';
import { fetchGradeItems, fetchTopicRestriction } from '../services/scraper.js';
import type { GradeItems } from '../types/paatshala.js';
import { gradeItemsSchema, groupSchema } from '../types/schemas.js';
import { formatError, formatSuccess } from '../utils.js';
import { prepareEdit, requireDbId, requireTopicIndex } from './topics.js';

const courseIdSchema = z.string().regex(/^\d+$/).describe('The Paatshala course ID');
const sectionSchema = z.number().int().nonnegative().describe('Topic section number as shown by list_topics');

const OPERATORS: Record<'all' | 'any' | 'not_all' | 'none', RestrictionOperator> = {
  all: '&',
  any: '|',
  not_all: '!&',
  none: '!|',
};

const COMPLETION_STATES = {
  incomplete: 0,
  complete: 1,
  complete_pass: 2,
  complete_fail: 3,
} as const;

async function loadGradeItems(ctx: AppContext, courseId: string, refresh = false): Promise<GradeItems> {
  const key = cacheKeys.gradeItems(courseId);
  const cached = refresh ? null : ctx.cache.load(key, gradeItemsSchema);
  if (cached) return cached;
  const topics = await ctx.loadTopics(courseId);
  const items = unwrap(await fetchGradeItems(await ctx.client(), courseId, topics));
  ctx.cache.save(key, items);
  return items;
}

function summaryLookups(ctx: AppContext, courseId: string, items: GradeItems | null): SummaryLookups {
  const groups = ctx.cache.load(cacheKeys.groups(courseId), z.array(groupSchema)) ?? [];
  return {
    groups: Object.fromEntries(groups.map(g => [g.id, g.name])),
    gradeItems: items?.grade,
    completionItems: items?.completion,
  };
}

/** Unix seconds from an ISO date or date-time; a bare date means midnight UTC */
export function toTimestamp(value: string): number {
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) throw new Error(`Invalid date: "${value}". Use ISO format, e.g. 2026-03-01T09:00:00+05:30`);
  return Math.floor(ms / 1000);
}

export function registerRestrictionTools(server: McpServer) {
  const ctx = getAppContext();

  server.tool(
    'get_topic_restriction',
    'Show the access restrictions of a topic as raw Moodle JSON and as readable lines',
    {
      course_id: courseIdSchema,
      section_number: sectionSchema,
    },
    async ({ course_id, section_number }) => {
      try {
        const topics = await ctx.loadTopics(course_id);
        const topic = topics[requireTopicIndex(topics, section_number)];
        const json = unwrap(await fetchTopicRestriction(await ctx.client(), requireDbId(topic)));
        const tree = unwrap(parseRestrictions(json));
        const items = ctx.cache.load(cacheKeys.gradeItems(course_id), gradeItemsSchema);

        return formatSuccess({
          section_number,
          topic: topic.name,
          restricted: tree.c.length > 0,
          summary: summarizeRestrictions(tree, summaryLookups(ctx, course_id, items)),
          json: json || EMPTY_RESTRICTION_JSON,
        });
      } catch (error) {
        return formatError('getting topic restriction', error);
      }
    }
  );

  server.tool(
    'list_grade_items',
    'List the grade items and completion-tracked activities that topic restrictions can refer to',
    {
      course_id: courseIdSchema,
      refresh: z.boolean().optional().default(false).describe('Ignore the cached list and fetch again'),
    },
    async ({ course_id, refresh }) => {
      try {
        const items = await loadGradeItems(ctx, course_id, refresh);
        return formatSuccess({
          course_id,
          grade_items: Object.entries(items.grade).map(([id, name]) => ({ id, name })),
          completion_items: Object.entries(items.completion).map(([id, name]) => ({ id, name })),
        });
      } catch (error) {
        return formatError('listing grade items', error);
      }
    }
  );

  // Write tools: only registered when ENABLE_WRITE_TOOLS is set
  if (ctx.config.enableWriteTools) {
    server.tool(
      'update_topic_restriction',
      'Change the access restrictions of a topic. Each category (groups, date, grade, completion) is left alone when omitted, removed when null, and replaced otherwise. Conditions of other kinds are kept.',
      {
        course_id: courseIdSchema,
        section_number: sectionSchema,
        groups: z.array(z.number().int().positive()).nullable().optional()
          .describe('Group IDs that may access the topic; several become "any of these". null or [] removes the group condition'),
        date: z.object({
          direction: z.enum(['from', 'until']),
          datetime: z.string().describe('ISO date or date-time'),
        }).nullable().optional().describe('Available from / until a date. null removes'),
        grade: z.object({
          item_id: z.number().int().positive(),
          min_percent: z.number().min(0).max(100).optional(),
          max_percent: z.number().min(0).max(100).optional(),
        }).nullable().optional().describe('Require a grade range on a grade item (see list_grade_items). null removes'),
        completion: z.object({
          activity_id: z.number().int().positive(),
          state: z.enum(['incomplete', 'complete', 'complete_pass', 'complete_fail']).optional().default('complete'),
        }).nullable().optional().describe('Require an activity completion state. null removes'),
        operator: z.enum(['all', 'any', 'not_all', 'none']).optional().describe('How the conditions combine (default: keep current)'),
        hide_when_not_met: z.boolean().optional().describe('Hide the topic completely from students who do not meet the conditions'),
      },
      async ({ course_id, section_number, groups, date, grade, completion, operator, hide_when_not_met }) => {
        try {
          const changes: RestrictionChanges = {};
          if (groups !== undefined) changes.groups = groups;
          if (date !== undefined) {
            changes.date = date && { direction: date.direction === 'from' ? '>=' : '<', timestamp: toTimestamp(date.datetime) };
          }
          if (grade !== undefined) {
            changes.grade = grade && { id: grade.item_id, min: grade.min_percent, max: grade.max_percent };
          }
          if (completion !== undefined) {
            changes.completion = completion && { cm: completion.activity_id, state: COMPLETION_STATES[completion.state] };
          }

          const { mutations, sesskey, topics, state } = await prepareEdit(ctx, course_id);
          const index = requireTopicIndex(topics, section_number);
          const json = await mutations.applyRestrictionChanges(sesskey, requireDbId(topics[index]), changes, {
            operator: operator ? OPERATORS[operator] : undefined,
            hideWhenNotMet: hide_when_not_met,
          });
          if (json === null) {
            return formatError('updating topic restriction', `Paatshala did not save the restrictions of topic ${section_number}`);
          }

          const tree = unwrap(parseRestrictions(json));
          const items = ctx.cache.load(cacheKeys.gradeItems(course_id), gradeItemsSchema);
          const summary = summarizeRestrictions(tree, summaryLookups(ctx, course_id, items));
          state.updateAt(index, { restrictionSummary: summary.join('\n') });
          ctx.scheduleTopicRefresh(course_id);
          return formatSuccess({ updated: true, section_number, summary, json });
        } catch (error) {
          return formatError('updating topic restriction', error);
        }
      }
    );

    server.tool(
      'clear_topic_restriction',
      'Remove every access restriction from a topic',
      {
        course_id: courseIdSchema,
        section_number: sectionSchema,
      },
      async ({ course_id, section_number }) => {
        try {
          const { mutations, sesskey, topics, state } = await prepareEdit(ctx, course_id);
          const index = requireTopicIndex(topics, section_number);
          if (!(await mutations.updateTopicRestriction(sesskey, requireDbId(topics[index]), EMPTY_RESTRICTION_JSON))) {
            return formatError('clearing topic restriction', `Paatshala did not save the restrictions of topic ${section_number}`);
          }
          state.updateAt(index, { restrictionSummary: '' });
          ctx.scheduleTopicRefresh(course_id);
          return formatSuccess({ cleared: true, section_number });
        } catch (error) {
          return formatError('clearing topic restriction', error);
        }
      }
    );
  }
}
