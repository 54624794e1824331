import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getAppContext } from '../context.js';
import {
  IMPORT_EMBED_HEIGHT,
  IMPORT_EMBED_WIDTH,
  autoSelectTopic,
  generateEmbedHtml,
  groupVideosBySession,
} from '../services/video-import.js';
import type { Topic } from '../types/paatshala.js';
import { formatError, formatSuccess } from '../utils.js';
import { prepareEdit, requireTopicIndex } from './topics.js';

const courseIdSchema = z.string().regex(/^\d+$/).describe('The Paatshala course ID');

interface PlannedPage {
  file: string;
  title: string;
  file_id: string;
  section_number: number;
  topic: string;
}

interface SkippedVideo {
  file: string;
  reason: string;
}

export function registerPageTools(server: McpServer) {
  const ctx = getAppContext();

  // Every page tool creates content, so none is registered read-only
  if (!ctx.config.enableWriteTools) return;

  server.tool(
    'add_page',
    'Create a Page activity in a topic. Give either HTML content or a Google Drive file ID to embed as a video player.',
    {
      course_id: courseIdSchema,
      section_number: z.number().int().nonnegative().describe('Topic section number as shown by list_topics'),
      title: z.string().min(1).max(255).describe('Page title'),
      content_html: z.string().optional().describe('Page body as HTML'),
      drive_file_id: z.string().regex(/^[\w-]+$/).optional().describe('Google Drive file ID to embed instead of content_html'),
      visible: z.boolean().optional().default(true).describe('Visible to students (default: true)'),
    },
    async ({ course_id, section_number, title, content_html, drive_file_id, visible }) => {
      try {
        const html = drive_file_id ? generateEmbedHtml(drive_file_id) : content_html;
        if (!html) {
          return formatError('adding page', 'Give content_html or drive_file_id');
        }

        const { mutations, sesskey, topics } = await prepareEdit(ctx, course_id);
        const topic = topics[requireTopicIndex(topics, section_number)];
        if (!(await mutations.addPageWithEmbed(sesskey, section_number, title, html, visible))) {
          return formatError('adding page', `Paatshala did not create "${title}"`);
        }
        ctx.scheduleTopicRefresh(course_id);
        return formatSuccess({ created: true, title, topic: topic.name, section_number });
      } catch (error) {
        return formatError('adding page', error);
      }
    }
  );

  server.tool(
    'import_videos',
    'Create one embedded video page per recording. Files named like "#3.2_-_topic_name.mp4" go to the topic called "Session 3" or "Day 3". Runs as a dry run unless dry_run is false.',
    {
      course_id: courseIdSchema,
      videos: z.array(z.object({
        name: z.string().min(1).describe('Video file name'),
        file_id: z.string().regex(/^[\w-]+$/).describe('Google Drive file ID'),
      })).min(1).describe('Videos to import'),
      section_number: z.number().int().nonnegative().optional()
        .describe('Put every video in this topic instead of matching by session number'),
      dry_run: z.boolean().optional().default(true).describe('Only show the plan (default: true)'),
      visible: z.boolean().optional().default(true).describe('Visible to students (default: true)'),
    },
    async ({ course_id, videos, section_number, dry_run, visible }) => {
      try {
        const topics = await ctx.loadTopics(course_id);
        const fixedTopic: Topic | null = section_number === undefined
          ? null
          : topics[requireTopicIndex(topics, section_number)];

        const planned: PlannedPage[] = [];
        const skipped: SkippedVideo[] = [];
        const grouped = groupVideosBySession(videos);
        for (const session of [...grouped.keys()].sort((a, b) => a - b)) {
          for (const video of grouped.get(session) ?? []) {
            const topic = fixedTopic ?? autoSelectTopic(topics, session);
            if (!topic) {
              skipped.push({
                file: video.name,
                reason: session > 0 ? `No topic named "Session ${session}" or "Day ${session}"` : 'No session number in file name',
              });
              continue;
            }
            planned.push({
              file: video.name,
              title: video.title || video.name,
              file_id: video.file_id,
              section_number: topic.sectionNumber,
              topic: topic.name,
            });
          }
        }

        if (dry_run || planned.length === 0) {
          return formatSuccess({ dry_run, planned, skipped });
        }

        const { mutations, sesskey } = await prepareEdit(ctx, course_id);
        const created: PlannedPage[] = [];
        const failed: PlannedPage[] = [];
        // One at a time so pages keep the planned order within a topic
        for (const page of planned) {
          const html = generateEmbedHtml(page.file_id, IMPORT_EMBED_WIDTH, IMPORT_EMBED_HEIGHT);
          const okay = await mutations.addPageWithEmbed(sesskey, page.section_number, page.title, html, visible);
          (okay ? created : failed).push(page);
        }
        ctx.scheduleTopicRefresh(course_id);
        return formatSuccess({ dry_run: false, created, failed, skipped });
      } catch (error) {
        return formatError('importing videos', error);
      }
    }
  );
}
