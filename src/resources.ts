import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getAppContext, unwrap } from './context.js';
import { cacheKeys } from './services/cache.js';
import { fetchCourses } from './services/scraper.js';
import type { Course } from './types/paatshala.js';
import { courseSchema } from './types/schemas.js';

function jsonContents(uri: URL, data: unknown) {
  return {
    contents: [{
      uri: uri.href,
      mimeType: 'application/json',
      text: JSON.stringify(data, null, 2),
    }],
  };
}

function errorContents(uri: URL, what: string, error: unknown) {
  return jsonContents(uri, {
    error: `Failed to load ${what}: ${error instanceof Error ? error.message : String(error)}`,
    fetched_at: new Date().toISOString(),
  });
}

/**
 * Register MCP Resources.
 *
 * Resources serve the cached course data so a client can read it without a
 * tool call. Topics go through the reconciler, so reading one also refreshes it.
 */
export function registerResources(server: McpServer) {
  const ctx = getAppContext();

  async function courses(): Promise<Course[]> {
    const cached = ctx.cache.load(cacheKeys.courses, z.array(courseSchema));
    if (cached) return cached;
    const live = unwrap(await fetchCourses(await ctx.client()));
    ctx.cache.save(cacheKeys.courses, live);
    return live;
  }

  // Static resource: course list
  server.resource(
    'courses',
    'paatshala://courses',
    {
      description: 'Your Paatshala courses (cached, starred first)',
      mimeType: 'application/json',
    },
    async (uri) => {
      try {
        return jsonContents(uri, { courses: await courses(), fetched_at: new Date().toISOString() });
      } catch (error) {
        return errorContents(uri, 'courses', error);
      }
    }
  );

  // Static resource: what was saved from the previous session
  server.resource(
    'last-session',
    'paatshala://session/last',
    {
      description: 'Last selected course and other state saved between runs',
      mimeType: 'application/json',
    },
    async (uri) => {
      try {
        return jsonContents(uri, ctx.cache.loadLastSession());
      } catch (error) {
        return errorContents(uri, 'last session', error);
      }
    }
  );

  // Dynamic resource template: topics of a course
  server.resource(
    'course-topics',
    new ResourceTemplate('paatshala://courses/{courseId}/topics', {
      list: async () => {
        try {
          return {
            resources: (await courses()).map(c => ({
              uri: `paatshala://courses/${c.id}/topics`,
              name: `${c.name} topics`,
              mimeType: 'application/json' as const,
            })),
          };
        } catch (error) {
          console.error('[Resources] Could not list courses:', error instanceof Error ? error.message : String(error));
          return { resources: [] };
        }
      },
    }),
    {
      description: 'Topics and activities of a course, served from the cache and refreshed in the background',
      mimeType: 'application/json',
    },
    async (uri, variables) => {
      try {
        const courseId = String(variables.courseId);
        if (!/^\d+$/.test(courseId)) {
          return jsonContents(uri, { error: 'Invalid course ID' });
        }

        const opened = ctx.topics.open(courseId);
        if (opened.cached) {
          opened.refresh.catch((err) => {
            console.error(`[Resources] Topic refresh for ${courseId} failed:`, err instanceof Error ? err.message : String(err));
          });
          return jsonContents(uri, { course_id: courseId, cached_at: opened.cachedAt, topics: opened.cached });
        }

        const outcome = await opened.refresh;
        if (outcome.status === 'applied') {
          return jsonContents(uri, { course_id: courseId, fetched_at: new Date().toISOString(), topics: outcome.value });
        }
        return jsonContents(uri, {
          error: outcome.status === 'failed' ? outcome.error.message : 'Another course was opened while loading',
        });
      } catch (error) {
        return errorContents(uri, 'topics', error);
      }
    }
  );
}
