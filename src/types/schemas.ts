import { z } from 'zod';
import { ACTIVITY_TYPES } from './paatshala.js';

// Shapes read back from the disk cache; anything that fails these is treated as a miss.

export const courseSchema = z.object({
  id: z.string(),
  name: z.string(),
  category: z.string(),
  starred: z.boolean(),
});

export const activitySchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.enum(ACTIVITY_TYPES),
  url: z.string(),
  visible: z.boolean(),
});

export const topicSchema = z.object({
  sectionNumber: z.number().int(),
  dbId: z.string(),
  name: z.string(),
  visible: z.boolean(),
  summary: z.string(),
  restrictionSummary: z.string(),
  activities: z.array(activitySchema),
  activityCount: z.number().int(),
});

export const groupSchema = z.object({ id: z.string(), name: z.string() });

export const gradeItemsSchema = z.object({
  grade: z.record(z.string()),
  completion: z.record(z.string()),
});

export const lastSessionSchema = z.record(z.unknown());
