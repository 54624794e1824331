import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getAppContext, unwrap } from '../context.js';
import { cleanGradeValue, effectiveGrade, parseMoodleGrade } from '../parsers/grading.js';
import { fetchGradingTable, fetchGroups } from '../services/scraper.js';
import type { Submission, SubmissionRow } from '../types/paatshala.js';
import { formatError, formatSuccess } from '../utils.js';

const SUBMISSION_HEADERS = [
  'Name',
  'User ID',
  'Email',
  'Status',
  'Last Modified',
  'Submission',
  'Feedback',
  'Grade',
  'Final Grade',
];

/** One-line form of a submission for CSV cells */
function submissionText(submission: Submission): string {
  switch (submission.type) {
    case 'file':
      return submission.files.map(f => `${f.name} (${f.url})`).join('; ');
    case 'link':
    case 'text':
      return submission.text;
    case 'empty':
      return '';
  }
}

function formatRow(row: SubmissionRow) {
  const grade = parseMoodleGrade(effectiveGrade(row));
  return {
    name: row.name,
    user_id: row.userId || null,
    email: row.email || null,
    status: row.status || null,
    last_modified: row.lastModified || null,
    submission: row.submission,
    feedback: row.feedback || null,
    grade: cleanGradeValue(row.grade),
    final_grade: cleanGradeValue(row.finalGrade),
    score: grade.score,
  };
}

export function registerSubmissionTools(server: McpServer) {
  const ctx = getAppContext();

  server.tool(
    'list_submissions',
    'List every student row of an assignment grading table: status, submitted files or links, feedback and final grade. Optionally restricted to one group. Also saves a CSV snapshot.',
    {
      course_id: z.string().regex(/^\d+$/).describe('The Paatshala course ID (used for the CSV location)'),
      module_id: z.string().regex(/^\d+$/).describe('The assignment course module ID'),
      group_id: z.string().regex(/^\d+$/).optional().describe('Only show this group (see list_groups)'),
      status_filter: z.enum(['all', 'submitted', 'not_submitted', 'ungraded']).optional().default('all')
        .describe('Filter rows by submission state'),
      save_csv: z.boolean().optional().default(true).describe('Write the CSV snapshot (default: true)'),
    },
    async ({ course_id, module_id, group_id, status_filter, save_csv }) => {
      try {
        const client = await ctx.client();
        const table = unwrap(await fetchGradingTable(client, module_id, group_id));

        const rows = table.rows.filter(row => {
          if (status_filter === 'submitted') return row.submission.type !== 'empty';
          if (status_filter === 'not_submitted') return row.submission.type === 'empty';
          if (status_filter === 'ungraded') return row.submission.type !== 'empty' && effectiveGrade(row) === '-';
          return true;
        });

        let csvFile: string | null = null;
        if (save_csv) {
          const name = group_id
            ? `submissions_${course_id}_mod${module_id}_grp${group_id}.csv`
            : `submissions_${course_id}_mod${module_id}.csv`;
          csvFile = ctx.cache.saveCsv(
            course_id,
            name,
            SUBMISSION_HEADERS,
            table.rows.map(row => [
              row.name,
              row.userId,
              row.email,
              row.status,
              row.lastModified,
              submissionText(row.submission),
              row.feedback,
              cleanGradeValue(row.grade),
              cleanGradeValue(row.finalGrade),
            ]),
          );
        }

        return formatSuccess({
          module_id,
          group_id: group_id ?? null,
          assignment_kind: table.rows[0]?.assignmentKind ?? null,
          max_grade: table.maxGrade,
          total: table.rows.length,
          count: rows.length,
          csv_file: csvFile,
          submissions: rows.map(formatRow),
        });
      } catch (error) {
        return formatError('listing submissions', error);
      }
    }
  );

  server.tool(
    'list_groups',
    'List the groups offered in the group selector of an assignment grading page or a quiz report',
    {
      module_id: z.string().regex(/^\d+$/).describe('The assignment or quiz course module ID'),
      kind: z.enum(['assign', 'quiz']).optional().default('assign').describe('Which kind of activity the module is'),
    },
    async ({ module_id, kind }) => {
      try {
        const groups = unwrap(await fetchGroups(await ctx.client(), module_id, kind));
        return formatSuccess({ module_id, count: groups.length, groups });
      } catch (error) {
        return formatError('listing groups', error);
      }
    }
  );
}
