import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getAppContext, unwrap } from '../context.js';
import { fetchQuizScores } from '../services/scraper.js';
import { formatError, formatSuccess } from '../utils.js';

export function registerQuizTools(server: McpServer) {
  const ctx = getAppContext();

  server.tool(
    'quiz_scores',
    'Best score per student on every practice quiz in a course, one row per student. Missing attempts are reported as null. Also saves quiz_scores_<course>.csv.',
    {
      course_id: z.string().regex(/^\d+$/).describe('The Paatshala course ID'),
      group_id: z.string().regex(/^\d+$/).optional().describe('Only include students of this group'),
      save_csv: z.boolean().optional().default(true).describe('Write the CSV snapshot (default: true)'),
    },
    async ({ course_id, group_id, save_csv }) => {
      try {
        const client = await ctx.client();
        const table = unwrap(await fetchQuizScores(client, course_id, {
          concurrency: ctx.config.concurrency,
          groupId: group_id,
        }));

        let csvFile: string | null = null;
        if (save_csv) {
          const name = group_id ? `quiz_scores_${course_id}_grp${group_id}.csv` : `quiz_scores_${course_id}.csv`;
          csvFile = ctx.cache.saveCsv(
            course_id,
            name,
            ['Student', ...table.quizNames],
            table.rows.map(row => [row.student, ...table.quizNames.map(quiz => row.scores[quiz] ?? null)]),
          );
        }

        return formatSuccess({
          course_id,
          quizzes: table.quizNames,
          students: table.rows.length,
          csv_file: csvFile,
          // formatSuccess drops nulls, so missing attempts are spelled out
          rows: table.rows.map(row => ({
            student: row.student,
            scores: Object.fromEntries(table.quizNames.map(quiz => [quiz, row.scores[quiz] ?? 'not attempted'])),
          })),
        });
      } catch (error) {
        return formatError('getting quiz scores', error);
      }
    }
  );
}
