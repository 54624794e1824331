import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getAppContext, unwrap } from '../context.js';
import { cacheKeys } from '../services/cache.js';
import { fetchCourseGroups, fetchCourses } from '../services/scraper.js';
import { courseSchema, groupSchema } from '../types/schemas.js';
import { formatError, formatSuccess } from '../utils.js';

export function registerCourseTools(server: McpServer) {
  const ctx = getAppContext();

  server.tool(
    'list_courses',
    'List your Paatshala courses (starred first, then by name). Falls back to the last cached list when Paatshala cannot be reached.',
    {
      use_cache: z.boolean().optional().describe('Return the cached list without contacting Paatshala (default: false)'),
    },
    async ({ use_cache }) => {
      try {
        const cached = ctx.cache.loadEntry(cacheKeys.courses, z.array(courseSchema));
        if (use_cache && cached) {
          return formatSuccess({ count: cached.data.length, cached_at: cached.timestamp, courses: cached.data });
        }

        const live = await fetchCourses(await ctx.client());
        if (!live.ok) {
          if (cached) {
            return formatSuccess({
              count: cached.data.length,
              stale: true,
              cached_at: cached.timestamp,
              refresh_error: live.error.message,
              courses: cached.data,
            });
          }
          return formatError('listing courses', live.error.message);
        }

        ctx.cache.save(cacheKeys.courses, live.value);
        return formatSuccess({ count: live.value.length, courses: live.value });
      } catch (error) {
        return formatError('listing courses', error);
      }
    }
  );

  server.tool(
    'select_course',
    'Remember a course as the one you are working on. Its cached topics are returned right away and refreshed in the background.',
    {
      course_id: z.string().regex(/^\d+$/).describe('The Paatshala course ID'),
    },
    async ({ course_id }) => {
      try {
        ctx.cache.saveLastSession({ last_course_id: course_id });
        const opened = ctx.topics.open(course_id);
        opened.refresh.catch((err) => {
          console.error(`[Courses] Background refresh for ${course_id} failed:`, err instanceof Error ? err.message : String(err));
        });
        if (opened.cached) ctx.topicState(course_id).update(opened.cached);
        return formatSuccess({
          course_id,
          cached_topics: opened.cached?.length ?? 0,
          cached_at: opened.cachedAt,
          refreshing: true,
        });
      } catch (error) {
        return formatError('selecting course', error);
      }
    }
  );

  server.tool(
    'get_last_session',
    'Show what was saved from the previous session, such as the last selected course.',
    {},
    async () => {
      try {
        return formatSuccess(ctx.cache.loadLastSession());
      } catch (error) {
        return formatError('reading last session', error);
      }
    }
  );

  server.tool(
    'list_course_groups',
    'List the groups (batches) defined in a course.',
    {
      course_id: z.string().regex(/^\d+$/).describe('The Paatshala course ID'),
      refresh: z.boolean().optional().describe('Ignore the cached list and fetch again (default: false)'),
    },
    async ({ course_id, refresh }) => {
      try {
        const key = cacheKeys.groups(course_id);
        const cached = refresh ? null : ctx.cache.load(key, z.array(groupSchema));
        if (cached) return formatSuccess({ course_id, count: cached.length, cached: true, groups: cached });

        const groups = unwrap(await fetchCourseGroups(await ctx.client(), course_id));
        ctx.cache.save(key, groups);
        return formatSuccess({ course_id, count: groups.length, groups });
      } catch (error) {
        return formatError('listing course groups', error);
      }
    }
  );

  server.tool(
    'clear_cache',
    'Delete cached Paatshala data. Without a key every cache entry is removed.',
    {
      key: z.string().regex(/^[\w.-]+$/).optional().describe('Cache key such as "courses" or "course_123_topics"'),
    },
    async ({ key }) => {
      try {
        const removed = ctx.cache.clear(key);
        return formatSuccess({ removed });
      } catch (error) {
        return formatError('clearing cache', error);
      }
    }
  );
}
