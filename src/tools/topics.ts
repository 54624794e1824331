import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getAppContext, type AppContext } from '../context.js';
import { MutationClient } from '../services/mutations.js';
import type { Topic } from '../types/paatshala.js';
import { formatError, formatSuccess } from '../utils.js';

const courseIdSchema = z.string().regex(/^\d+$/).describe('The Paatshala course ID');
const sectionSchema = z.number().int().nonnegative().describe('Topic section number as shown by list_topics');

export function formatTopic(topic: Topic, includeActivities: boolean) {
  return {
    section_number: topic.sectionNumber,
    db_id: topic.dbId || null,
    name: topic.name,
    visible: topic.visible,
    summary: topic.summary || null,
    restrictions: topic.restrictionSummary || null,
    activity_count: topic.activityCount,
    ...(includeActivities
      ? {
          activities: topic.activities.map(a => ({
            id: a.id,
            name: a.name,
            type: a.type,
            visible: a.visible,
            url: a.url || null,
          })),
        }
      : {}),
  };
}

/** Index of the topic with this section number; throws when it is not on the page */
export function requireTopicIndex(topics: readonly Topic[], sectionNumber: number): number {
  const index = topics.findIndex(topic => topic.sectionNumber === sectionNumber);
  if (index === -1) {
    throw new Error(`Topic ${sectionNumber} not found. Use list_topics to see the current section numbers.`);
  }
  return index;
}

/** Section db id of a topic; edits addressed by db id cannot run without it */
export function requireDbId(topic: Topic): string {
  if (!topic.dbId) {
    throw new Error(`Topic ${topic.sectionNumber} ("${topic.name}") has no section id yet. Reload with list_topics and try again.`);
  }
  return topic.dbId;
}

/** A client, a fresh sesskey and the course's current topics, for one batch of edits */
export async function prepareEdit(ctx: AppContext, courseId: string) {
  const client = await ctx.client();
  const sesskey = await ctx.sesskey(client, courseId);
  const topics = await ctx.loadTopics(courseId);
  return { mutations: new MutationClient(client, courseId), sesskey, topics, state: ctx.topicState(courseId) };
}

export function registerTopicTools(server: McpServer) {
  const ctx = getAppContext();

  server.tool(
    'list_topics',
    'List the topics (sections) of a course with their activities. With prefer_cache the last saved list is returned at once and refreshed in the background.',
    {
      course_id: courseIdSchema,
      include_activities: z.boolean().optional().default(true).describe('Include each topic\'s activities (default: true)'),
      prefer_cache: z.boolean().optional().default(false).describe('Answer from the cache when available (default: false)'),
    },
    async ({ course_id, include_activities, prefer_cache }) => {
      try {
        const opened = ctx.topics.open(course_id);
        if (prefer_cache && opened.cached) {
          opened.refresh.catch((err) => {
            console.error(`[Topics] Background refresh for ${course_id} failed:`, err instanceof Error ? err.message : String(err));
          });
          ctx.topicState(course_id).update(opened.cached);
          return formatSuccess({
            course_id,
            cached_at: opened.cachedAt,
            refreshing: true,
            count: opened.cached.length,
            topics: opened.cached.map(t => formatTopic(t, include_activities)),
          });
        }

        const outcome = await opened.refresh;
        if (outcome.status === 'applied') {
          return formatSuccess({
            course_id,
            count: outcome.value.length,
            topics: outcome.value.map(t => formatTopic(t, include_activities)),
          });
        }
        if (outcome.status === 'failed' && opened.cached) {
          return formatSuccess({
            course_id,
            stale: true,
            cached_at: opened.cachedAt,
            refresh_error: outcome.error.message,
            count: opened.cached.length,
            topics: opened.cached.map(t => formatTopic(t, include_activities)),
          });
        }
        if (outcome.status === 'failed') {
          return formatError('listing topics', outcome.error.message);
        }
        return formatError('listing topics', `Course ${course_id} was replaced by another course while loading; try again`);
      } catch (error) {
        return formatError('listing topics', error);
      }
    }
  );

  // Write tools: only registered when ENABLE_WRITE_TOOLS is set
  if (ctx.config.enableWriteTools) {
    server.tool(
      'move_topic',
      'Move a topic to another position in the course',
      {
        course_id: courseIdSchema,
        from_section: sectionSchema,
        to_section: sectionSchema,
      },
      async ({ course_id, from_section, to_section }) => {
        try {
          const { mutations, sesskey, topics, state } = await prepareEdit(ctx, course_id);
          const from = requireTopicIndex(topics, from_section);
          const to = requireTopicIndex(topics, to_section);
          if (!(await mutations.moveTopic(sesskey, from_section, to_section))) {
            return formatError('moving topic', `Paatshala rejected moving topic ${from_section} to ${to_section}`);
          }
          state.move(from, to);
          ctx.scheduleTopicRefresh(course_id);
          return formatSuccess({ moved: true, from_section, to_section, topics: state.get().map(t => formatTopic(t, false)) });
        } catch (error) {
          return formatError('moving topic', error);
        }
      }
    );

    server.tool(
      'rename_topic',
      'Rename a topic',
      {
        course_id: courseIdSchema,
        section_number: sectionSchema,
        name: z.string().min(1).max(255).describe('New topic name'),
      },
      async ({ course_id, section_number, name }) => {
        try {
          const { mutations, sesskey, topics, state } = await prepareEdit(ctx, course_id);
          const index = requireTopicIndex(topics, section_number);
          const dbId = requireDbId(topics[index]);
          if (!(await mutations.renameTopic(sesskey, dbId, name))) {
            return formatError('renaming topic', `Paatshala rejected renaming topic ${section_number}`);
          }
          state.updateAt(index, { name });
          ctx.scheduleTopicRefresh(course_id);
          return formatSuccess({ renamed: true, section_number, name });
        } catch (error) {
          return formatError('renaming topic', error);
        }
      }
    );

    server.tool(
      'set_topic_visibility',
      'Show or hide a topic from students',
      {
        course_id: courseIdSchema,
        section_number: sectionSchema,
        visible: z.boolean().describe('true to show the topic, false to hide it'),
      },
      async ({ course_id, section_number, visible }) => {
        try {
          const { mutations, sesskey, topics, state } = await prepareEdit(ctx, course_id);
          const index = requireTopicIndex(topics, section_number);
          if (!(await mutations.setTopicVisibility(sesskey, section_number, visible))) {
            return formatError('changing topic visibility', `Paatshala rejected the change for topic ${section_number}`);
          }
          state.updateAt(index, { visible });
          ctx.scheduleTopicRefresh(course_id);
          return formatSuccess({ section_number, visible });
        } catch (error) {
          return formatError('changing topic visibility', error);
        }
      }
    );

    server.tool(
      'delete_topic',
      'Delete a topic and every activity in it. This cannot be undone.',
      {
        course_id: courseIdSchema,
        section_number: sectionSchema,
        confirm: z.literal(true).describe('Must be true to delete'),
      },
      async ({ course_id, section_number }) => {
        try {
          const { mutations, sesskey, topics, state } = await prepareEdit(ctx, course_id);
          const index = requireTopicIndex(topics, section_number);
          const topic = topics[index];
          if (!(await mutations.deleteTopic(sesskey, requireDbId(topic)))) {
            return formatError('deleting topic', `Paatshala did not confirm deleting topic ${section_number}`);
          }
          state.removeAt(index);
          ctx.scheduleTopicRefresh(course_id);
          return formatSuccess({ deleted: true, name: topic.name, activities_removed: topic.activityCount });
        } catch (error) {
          return formatError('deleting topic', error);
        }
      }
    );

    server.tool(
      'add_topics',
      'Add empty topics at the end of a course',
      {
        course_id: courseIdSchema,
        count: z.number().int().min(1).max(20).optional().default(1).describe('How many topics to add (default: 1)'),
      },
      async ({ course_id, count }) => {
        try {
          const { mutations, sesskey, state } = await prepareEdit(ctx, course_id);
          if (!(await mutations.addTopics(sesskey, count))) {
            return formatError('adding topics', 'Paatshala rejected adding topics');
          }
          // Placeholders until the refresh brings the real ids and names
          for (let i = 0; i < count; i++) {
            state.insertAt(state.get().length, {
              sectionNumber: 0,
              dbId: '',
              name: '',
              visible: true,
              summary: '',
              restrictionSummary: '',
              activities: [],
              activityCount: 0,
            });
          }
          ctx.scheduleTopicRefresh(course_id);
          return formatSuccess({ added: count, total_topics: state.get().length });
        } catch (error) {
          return formatError('adding topics', error);
        }
      }
    );
  }
}
