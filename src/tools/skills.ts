import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getAppContext, unwrap } from '../context.js';
import {
  collectSkillMatrix,
  flattenSkills,
  loadSkillConfig,
  saveSkillConfig,
  skillConfigDir,
} from '../services/skill-matrix.js';
import { formatError, formatSuccess } from '../utils.js';

const courseIdSchema = z.string().regex(/^\d+$/).describe('The Paatshala course ID');

const skillIdsSchema = z.array(z.string().min(1));

export function registerSkillTools(server: McpServer) {
  const ctx = getAppContext();

  server.tool(
    'get_skill_config',
    'Show the skill definitions (milestones and skills), which practice quizzes and tasks count towards each skill, and the student name aliases used by skill_matrix',
    {
      course_id: courseIdSchema,
    },
    async ({ course_id }) => {
      try {
        const config = loadSkillConfig(ctx.config.outputDir, course_id);
        return formatSuccess({
          config_dir: skillConfigDir(ctx.config.outputDir, course_id),
          skills: flattenSkills(config.skills).map(skill => ({
            id: skill.id,
            name: skill.name,
            milestone: `${skill.milestoneId} ${skill.milestoneName}`,
          })),
          quiz_mappings: config.quizMappings,
          task_mappings: config.taskMappings,
          name_aliases: config.nameAliases,
        });
      } catch (error) {
        return formatError('getting skill config', error);
      }
    }
  );

  server.tool(
    'update_skill_config',
    'Replace parts of the skill configuration. Quiz mappings are keyed by practice quiz name, task mappings by assignment module ID; both map to skill IDs such as "S06". Parts left out stay as they are.',
    {
      course_id: courseIdSchema,
      milestones: z.array(z.object({
        id: z.string().min(1),
        name: z.string().min(1),
        skills: z.array(z.object({ id: z.string().min(1), name: z.string().min(1) })),
      })).optional().describe('New skill definitions, replacing the current ones'),
      quiz_mappings: z.record(skillIdsSchema).optional().describe('Practice quiz name -> skill IDs'),
      task_mappings: z.record(skillIdsSchema).optional().describe('Assignment module ID -> skill IDs (S25 scores timeliness)'),
      name_aliases: z.record(z.string()).optional().describe('Student name as scraped -> name to merge it into'),
    },
    async ({ course_id, milestones, quiz_mappings, task_mappings, name_aliases }) => {
      try {
        const written = unwrap(saveSkillConfig(ctx.config.outputDir, course_id, {
          skills: milestones ? { milestones } : undefined,
          quizMappings: quiz_mappings,
          taskMappings: task_mappings,
          nameAliases: name_aliases,
        }));
        return formatSuccess({ saved: written });
      } catch (error) {
        return formatError('updating skill config', error);
      }
    }
  );

  server.tool(
    'skill_matrix',
    'Score every student 0-10 per skill by averaging the mapped practice quiz scores and task grades. Also saves skill_matrix_<course>.csv.',
    {
      course_id: courseIdSchema,
      group_id: z.string().regex(/^\d+$/).optional().describe('Only include students of this group'),
      save_csv: z.boolean().optional().default(true).describe('Write the CSV snapshot (default: true)'),
    },
    async ({ course_id, group_id, save_csv }) => {
      try {
        const config = loadSkillConfig(ctx.config.outputDir, course_id);
        if (Object.keys(config.quizMappings).length === 0 && Object.keys(config.taskMappings).length === 0) {
          return formatError('building skill matrix', 'No quiz or task is mapped to a skill yet; map them with update_skill_config');
        }

        const client = await ctx.client();
        const matrix = unwrap(await collectSkillMatrix(client, course_id, config, {
          concurrency: ctx.config.concurrency,
          groupId: group_id,
        }));

        let csvFile: string | null = null;
        if (save_csv) {
          const name = group_id ? `skill_matrix_${course_id}_grp${group_id}.csv` : `skill_matrix_${course_id}.csv`;
          csvFile = ctx.cache.saveCsv(
            course_id,
            name,
            ['Student Name', ...matrix.skills],
            matrix.rows.map(row => [row.student, ...matrix.skills.map(skill => row.scores[skill] ?? null)]),
          );
        }

        return formatSuccess({
          course_id,
          students: matrix.rows.length,
          failed_tasks: matrix.failedTasks.length > 0 ? matrix.failedTasks : null,
          csv_file: csvFile,
          // Skills without a score are dropped by formatSuccess
          rows: matrix.rows,
        });
      } catch (error) {
        return formatError('building skill matrix', error);
      }
    }
  );
}
