import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getAppContext, unwrap } from '../context.js';
import { parseAssignView } from '../parsers/assignments.js';
import { fetchTasks } from '../services/scraper.js';
import { formatError, formatSuccess } from '../utils.js';

const TASK_HEADERS = [
  'Task Name',
  'Module ID',
  'Description',
  'Due Date',
  'Time Remaining',
  'Max Grade',
  'Participants',
  'Submitted',
  'Needs Grading',
  'Late Submissions',
  'URL',
];

export function registerAssignmentTools(server: McpServer) {
  const ctx = getAppContext();

  server.tool(
    'list_tasks',
    'List the assignments ("tasks") of a course with due dates, submission counts and grading backlog. Also saves tasks_<course>.csv in the course output folder.',
    {
      course_id: z.string().regex(/^\d+$/).describe('The Paatshala course ID'),
      save_csv: z.boolean().optional().default(true).describe('Write the CSV snapshot (default: true)'),
    },
    async ({ course_id, save_csv }) => {
      try {
        const client = await ctx.client();
        const tasks = unwrap(await fetchTasks(client, course_id, { concurrency: ctx.config.concurrency }));

        let csvFile: string | null = null;
        if (save_csv) {
          csvFile = ctx.cache.saveCsv(
            course_id,
            `tasks_${course_id}.csv`,
            TASK_HEADERS,
            tasks.map(t => [
              t.name,
              t.moduleId,
              t.description,
              t.dueDate,
              t.timeRemaining,
              t.maxGrade,
              t.participants,
              t.submitted,
              t.needsGrading,
              t.lateSubmissions,
              t.url,
            ]),
          );
        }

        return formatSuccess({
          course_id,
          count: tasks.length,
          csv_file: csvFile,
          tasks: tasks.map(t => ({
            name: t.name,
            module_id: t.moduleId,
            due_date: t.dueDate || null,
            time_remaining: t.timeRemaining || null,
            max_grade: t.maxGrade || null,
            participants: t.participants || null,
            submitted: t.submitted || null,
            needs_grading: t.needsGrading || null,
            late_submissions: t.lateSubmissions || null,
            url: t.url,
          })),
        });
      } catch (error) {
        return formatError('listing tasks', error);
      }
    }
  );

  server.tool(
    'get_assignment',
    'Get the full details of one assignment: description, due date, grading summary and your own submission status',
    {
      module_id: z.string().regex(/^\d+$/).describe('The assignment course module ID (the id= in mod/assign/view.php)'),
    },
    async ({ module_id }) => {
      try {
        const client = await ctx.client();
        const page = unwrap(await client.getHtml(`/mod/assign/view.php?id=${encodeURIComponent(module_id)}`));
        const details = parseAssignView(page.html);

        return formatSuccess({
          module_id,
          url: page.url,
          description: details.description || null,
          due_date: details.dueDate || null,
          time_remaining: details.timeRemaining || null,
          max_grade: details.maxGrade || null,
          grading_summary: {
            participants: details.participants || null,
            drafts: details.drafts || null,
            submitted: details.submitted || null,
            needs_grading: details.needsGrading || null,
            late_submissions: details.latePolicy || null,
          },
          submission_status: details.submissionStatus || null,
          grading_status: details.gradingStatus || null,
          last_modified: details.lastModified || null,
          comments: details.commentCount || null,
        });
      } catch (error) {
        return formatError('getting assignment', error);
      }
    }
  );
}
