import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getAppContext, unwrap } from '../context.js';
import { fetchGradingTable } from '../services/scraper.js';
import { downloadSubmissionFile, readSubmissionText } from '../services/submission-files.js';
import type { SubmissionFile } from '../types/paatshala.js';
import { DEFAULT_MAX_TEXT_LENGTH, formatError, formatFileSize, formatSuccess } from '../utils.js';

export function registerFileTools(server: McpServer) {
  const ctx = getAppContext();

  /** The student's submitted files for one assignment */
  async function studentFiles(moduleId: string, userId: string): Promise<{ student: string; files: SubmissionFile[] }> {
    const table = unwrap(await fetchGradingTable(await ctx.client(), moduleId));
    const row = table.rows.find(r => r.userId === userId);
    if (!row) throw new Error(`Student ${userId} not found in the grading table of module ${moduleId}`);
    if (row.submission.type !== 'file') throw new Error(`${row.name} has no file submission`);
    return { student: row.name, files: row.submission.files };
  }

  server.tool(
    'read_submission_file',
    'Download a student\'s submitted file and return its text. Supports PDF and text-based files (code, HTML, CSV, JSON, Markdown).',
    {
      course_id: z.string().regex(/^\d+$/).describe('The Paatshala course ID'),
      module_id: z.string().regex(/^\d+$/).describe('Assignment module ID'),
      user_id: z.string().regex(/^\d+$/).describe('Student user ID from list_submissions'),
      file_name: z.string().optional().describe('Which file to read when there are several (default: the first)'),
      max_length: z.number().int().min(1000).max(200000).optional().default(DEFAULT_MAX_TEXT_LENGTH)
        .describe('Maximum characters of text to return'),
    },
    async ({ course_id, module_id, user_id, file_name, max_length }) => {
      try {
        const { student, files } = await studentFiles(module_id, user_id);
        const file = file_name ? files.find(f => f.name === file_name) : files[0];
        if (!file) {
          return formatError('reading submission file', `No file named "${file_name}". Files: ${files.map(f => f.name).join(', ')}`);
        }

        const client = await ctx.client();
        const result = unwrap(await readSubmissionText(client, ctx.config.outputDir, course_id, student, file, max_length));
        return formatSuccess({
          student,
          file: file.name,
          other_files: files.filter(f => f !== file).map(f => f.name),
          pages: result.pages,
          truncated: result.truncated,
          text: result.text,
        });
      } catch (error) {
        return formatError('reading submission file', error);
      }
    }
  );

  server.tool(
    'download_submission_files',
    'Save every file a student submitted for an assignment into the course output folder',
    {
      course_id: z.string().regex(/^\d+$/).describe('The Paatshala course ID'),
      module_id: z.string().regex(/^\d+$/).describe('Assignment module ID'),
      user_id: z.string().regex(/^\d+$/).describe('Student user ID from list_submissions'),
    },
    async ({ course_id, module_id, user_id }) => {
      try {
        const { student, files } = await studentFiles(module_id, user_id);
        const client = await ctx.client();
        const saved: Array<Record<string, string | boolean>> = [];
        for (const file of files) {
          const result = await downloadSubmissionFile(client, ctx.config.outputDir, course_id, student, file);
          saved.push(result.ok
            ? { file: file.name, size: formatFileSize(result.value.size), reused: result.value.cached }
            : { file: file.name, error: result.error.message });
        }
        return formatSuccess({ student, files: saved });
      } catch (error) {
        return formatError('downloading submission files', error);
      }
    }
  );
}
