import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getAppContext, unwrap } from '../context.js';
import { deleteRubric, loadRubric, saveRubric, validateRubric } from '../services/rubric.js';
import { formatError, formatSuccess } from '../utils.js';

const idSchema = z.string().regex(/^\d+$/);

export function registerRubricTools(server: McpServer) {
  const ctx = getAppContext();

  server.tool(
    'validate_rubric',
    'Check a grading rubric: a JSON array (code fences allowed) of { criterion, description, weight_percent }. Weights are scaled to sum to 100. Optionally saves it for an assignment.',
    {
      rubric: z.string().min(1).describe('Rubric JSON text'),
      course_id: idSchema.optional().describe('Course ID, required to save'),
      module_id: idSchema.optional().describe('Assignment module ID, required to save'),
      group_id: idSchema.optional().describe('Save as the rubric for this group only'),
      save: z.boolean().optional().default(false).describe('Save the validated rubric (default: false)'),
    },
    async ({ rubric, course_id, module_id, group_id, save }) => {
      try {
        const criteria = unwrap(validateRubric(rubric));
        let savedTo: string | null = null;
        if (save) {
          if (!course_id || !module_id) {
            return formatError('saving rubric', 'course_id and module_id are required to save');
          }
          savedTo = saveRubric(ctx.config.outputDir, course_id, module_id, criteria, group_id);
          if (!savedTo) return formatError('saving rubric', 'Could not write the rubric file');
        }
        return formatSuccess({
          valid: true,
          criteria_count: criteria.length,
          total_weight: criteria.reduce((sum, c) => sum + c.weight_percent, 0),
          criteria,
          saved_to: savedTo,
        });
      } catch (error) {
        return formatError('validating rubric', error);
      }
    }
  );

  server.tool(
    'get_rubric',
    'Get the saved rubric of an assignment; a group rubric wins over the default one',
    {
      course_id: idSchema.describe('The Paatshala course ID'),
      module_id: idSchema.describe('Assignment module ID'),
      group_id: idSchema.optional().describe('Group ID'),
    },
    async ({ course_id, module_id, group_id }) => {
      try {
        const doc = loadRubric(ctx.config.outputDir, course_id, module_id, group_id);
        if (!doc) return formatError('getting rubric', `No rubric saved for module ${module_id}`);
        return formatSuccess(doc);
      } catch (error) {
        return formatError('getting rubric', error);
      }
    }
  );

  server.tool(
    'delete_rubric',
    'Delete the saved rubric of an assignment (or of one group)',
    {
      course_id: idSchema.describe('The Paatshala course ID'),
      module_id: idSchema.describe('Assignment module ID'),
      group_id: idSchema.optional().describe('Group ID'),
    },
    async ({ course_id, module_id, group_id }) => {
      try {
        return formatSuccess({ deleted: deleteRubric(ctx.config.outputDir, course_id, module_id, group_id) });
      } catch (error) {
        return formatError('deleting rubric', error);
      }
    }
  );
}
