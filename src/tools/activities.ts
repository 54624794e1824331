import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getAppContext } from '../context.js';
import { ACTIVITY_TYPES, type Activity, type Topic } from '../types/paatshala.js';
import { formatError, formatSuccess } from '../utils.js';
import { prepareEdit, requireDbId, requireTopicIndex } from './topics.js';

const courseIdSchema = z.string().regex(/^\d+$/).describe('The Paatshala course ID');
const activityIdSchema = z.string().regex(/^\d+$/).describe('Activity course module ID (cmid) from list_activities');

interface ActivityLocation {
  topicIndex: number;
  activityIndex: number;
  activity: Activity;
}

export function locateActivity(topics: readonly Topic[], cmid: string): ActivityLocation {
  for (let topicIndex = 0; topicIndex < topics.length; topicIndex++) {
    const activityIndex = topics[topicIndex].activities.findIndex(a => a.id === cmid);
    if (activityIndex !== -1) {
      return { topicIndex, activityIndex, activity: topics[topicIndex].activities[activityIndex] };
    }
  }
  throw new Error(`Activity ${cmid} not found in this course. Use list_activities to see current IDs.`);
}

/** `activities` with `activity` inserted before `beforeCmid`, or appended */
function insertBefore(activities: Activity[], activity: Activity, beforeCmid?: string): Activity[] {
  const next = activities.filter(a => a.id !== activity.id);
  const at = beforeCmid ? next.findIndex(a => a.id === beforeCmid) : -1;
  if (at === -1) next.push(activity);
  else next.splice(at, 0, activity);
  return next;
}

export function registerActivityTools(server: McpServer) {
  const ctx = getAppContext();

  server.tool(
    'list_activities',
    'List the activities of a course, optionally only one topic or one activity type',
    {
      course_id: courseIdSchema,
      section_number: z.number().int().nonnegative().optional().describe('Only this topic'),
      type: z.enum(ACTIVITY_TYPES).optional().describe('Only this activity type, e.g. "assign" or "quiz"'),
    },
    async ({ course_id, section_number, type }) => {
      try {
        const topics = await ctx.loadTopics(course_id);
        const scoped = section_number === undefined ? topics : [topics[requireTopicIndex(topics, section_number)]];
        const activities = scoped.flatMap(topic =>
          topic.activities
            .filter(a => !type || a.type === type)
            .map(a => ({
              id: a.id,
              name: a.name,
              type: a.type,
              visible: a.visible,
              section_number: topic.sectionNumber,
              topic: topic.name,
              url: a.url || null,
            }))
        );
        return formatSuccess({ course_id, count: activities.length, activities });
      } catch (error) {
        return formatError('listing activities', error);
      }
    }
  );

  // Write tools: only registered when ENABLE_WRITE_TOOLS is set
  if (ctx.config.enableWriteTools) {
    server.tool(
      'move_activity',
      'Move an activity into another topic, before a given activity or at the end',
      {
        course_id: courseIdSchema,
        activity_id: activityIdSchema,
        target_section: z.number().int().nonnegative().describe('Section number of the destination topic'),
        before_activity_id: z.string().regex(/^\d+$/).optional().describe('Place before this activity (default: at the end)'),
      },
      async ({ course_id, activity_id, target_section, before_activity_id }) => {
        try {
          const { mutations, sesskey, topics, state } = await prepareEdit(ctx, course_id);
          const from = locateActivity(topics, activity_id);
          const targetIndex = requireTopicIndex(topics, target_section);
          const targetDbId = requireDbId(topics[targetIndex]);

          if (!(await mutations.moveActivity(sesskey, activity_id, targetDbId, before_activity_id))) {
            return formatError('moving activity', `Paatshala rejected moving activity ${activity_id}`);
          }

          if (from.topicIndex !== targetIndex) {
            state.updateAt(from.topicIndex, {
              activities: topics[from.topicIndex].activities.filter(a => a.id !== activity_id),
            });
          }
          state.updateAt(targetIndex, {
            activities: insertBefore(topics[targetIndex].activities, from.activity, before_activity_id),
          });
          ctx.scheduleTopicRefresh(course_id);
          return formatSuccess({ moved: true, activity: from.activity.name, target_section });
        } catch (error) {
          return formatError('moving activity', error);
        }
      }
    );

    server.tool(
      'reorder_activity',
      'Move an activity within its own topic, before a given activity or to the end',
      {
        course_id: courseIdSchema,
        activity_id: activityIdSchema,
        before_activity_id: z.string().regex(/^\d+$/).optional().describe('Place before this activity (default: at the end)'),
      },
      async ({ course_id, activity_id, before_activity_id }) => {
        try {
          const { mutations, sesskey, topics, state } = await prepareEdit(ctx, course_id);
          const at = locateActivity(topics, activity_id);
          const topic = topics[at.topicIndex];
          if (before_activity_id && !topic.activities.some(a => a.id === before_activity_id)) {
            return formatError('reordering activity', `Activity ${before_activity_id} is not in the same topic`);
          }

          if (!(await mutations.reorderActivity(sesskey, activity_id, requireDbId(topic), before_activity_id))) {
            return formatError('reordering activity', `Paatshala rejected reordering activity ${activity_id}`);
          }
          state.updateAt(at.topicIndex, { activities: insertBefore(topic.activities, at.activity, before_activity_id) });
          ctx.scheduleTopicRefresh(course_id);
          return formatSuccess({ reordered: true, activity: at.activity.name });
        } catch (error) {
          return formatError('reordering activity', error);
        }
      }
    );

    server.tool(
      'duplicate_activity',
      'Duplicate an activity; the copy appears right after the original',
      {
        course_id: courseIdSchema,
        activity_id: activityIdSchema,
      },
      async ({ course_id, activity_id }) => {
        try {
          const { mutations, sesskey, topics } = await prepareEdit(ctx, course_id);
          const at = locateActivity(topics, activity_id);
          if (!(await mutations.duplicateActivity(sesskey, activity_id))) {
            return formatError('duplicating activity', `Paatshala rejected duplicating activity ${activity_id}`);
          }
          ctx.scheduleTopicRefresh(course_id);
          return formatSuccess({ duplicated: true, activity: at.activity.name });
        } catch (error) {
          return formatError('duplicating activity', error);
        }
      }
    );

    server.tool(
      'delete_activity',
      'Delete an activity and its student data. This cannot be undone.',
      {
        course_id: courseIdSchema,
        activity_id: activityIdSchema,
        confirm: z.literal(true).describe('Must be true to delete'),
      },
      async ({ course_id, activity_id }) => {
        try {
          const { mutations, sesskey, topics, state } = await prepareEdit(ctx, course_id);
          const at = locateActivity(topics, activity_id);
          if (!(await mutations.deleteActivity(sesskey, activity_id))) {
            return formatError('deleting activity', `Paatshala rejected deleting activity ${activity_id}`);
          }
          state.updateAt(at.topicIndex, {
            activities: topics[at.topicIndex].activities.filter(a => a.id !== activity_id),
          });
          ctx.scheduleTopicRefresh(course_id);
          return formatSuccess({ deleted: true, activity: at.activity.name });
        } catch (error) {
          return formatError('deleting activity', error);
        }
      }
    );

    server.tool(
      'rename_activity',
      'Rename an activity',
      {
        course_id: courseIdSchema,
        activity_id: activityIdSchema,
        name: z.string().min(1).max(255).describe('New activity name'),
      },
      async ({ course_id, activity_id, name }) => {
        try {
          const { mutations, sesskey, topics, state } = await prepareEdit(ctx, course_id);
          const at = locateActivity(topics, activity_id);
          if (!(await mutations.renameActivity(sesskey, activity_id, name))) {
            return formatError('renaming activity', `Paatshala rejected renaming activity ${activity_id}`);
          }
          state.updateAt(at.topicIndex, {
            activities: topics[at.topicIndex].activities.map(a => (a.id === activity_id ? { ...a, name } : a)),
          });
          ctx.scheduleTopicRefresh(course_id);
          return formatSuccess({ renamed: true, activity_id, name });
        } catch (error) {
          return formatError('renaming activity', error);
        }
      }
    );

    server.tool(
      'set_activity_visibility',
      'Show or hide an activity from students',
      {
        course_id: courseIdSchema,
        activity_id: activityIdSchema,
        visible: z.boolean().describe('true to show, false to hide'),
      },
      async ({ course_id, activity_id, visible }) => {
        try {
          const { mutations, sesskey, topics, state } = await prepareEdit(ctx, course_id);
          const at = locateActivity(topics, activity_id);
          if (!(await mutations.setActivityVisibility(sesskey, activity_id, visible))) {
            return formatError('changing activity visibility', `Paatshala rejected the change for activity ${activity_id}`);
          }
          state.updateAt(at.topicIndex, {
            activities: topics[at.topicIndex].activities.map(a => (a.id === activity_id ? { ...a, visible } : a)),
          });
          ctx.scheduleTopicRefresh(course_id);
          return formatSuccess({ activity_id, visible });
        } catch (error) {
          return formatError('changing activity visibility', error);
        }
      }
    );
  }
}
