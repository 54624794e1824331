import { z } from 'zod';
import type { Course, Group, QuizLink } from '../types/paatshala.js';
import { loadHtml, nodeText } from './html.js';
import { cleanActivityName } from './topics.js';

const ajaxCourseSchema = z.object({
  id: z.union([z.number(), z.string()]),
  fullname: z.string().default(''),
  coursecategory: z.string().nullish(),
  isfavourite: z.boolean().nullish(),
}).passthrough();

/** `core_course_get_enrolled_courses_by_timeline_classification` payload */
export const timelineCoursesSchema = z.object({
  courses: z.array(ajaxCourseSchema).default([]),
}).passthrough();

/** `core_course_get_recent_courses` payload */
export const recentCoursesSchema = z.array(ajaxCourseSchema);

export function toCourse(raw: z.infer<typeof ajaxCourseSchema>): Course {
  return {
    id: String(raw.id),
    name: raw.fullname,
    category: raw.coursecategory ?? '',
    starred: raw.isfavourite ?? false,
  };
}

/** Starred courses first, then by name ignoring case */
export function sortCourses(courses: Course[]): Course[] {
  return [...courses].sort((a, b) => {
    if (a.starred !== b.starred) return a.starred ? -1 : 1;
    const left = a.name.toLowerCase();
    const right = b.name.toLowerCase();
    return left < right ? -1 : left > right ? 1 : 0;
  });
}

/** Courses linked from the page navigation; used when the AJAX services return nothing */
export function parseCourseLinks(html: string): Course[] {
  const $ = loadHtml(html);
  const seen = new Map<string, Course>();
  $('a[href*="/course/view.php?id="]').each((_, a) => {
    const match = (a.attribs.href ?? '').match(/\/course\/view\.php\?id=(\d+)/);
    if (!match || seen.has(match[1])) return;
    const name = nodeText($(a));
    if (name) seen.set(match[1], { id: match[1], name, category: '', starred: false });
  });
  return [...seen.values()];
}

/** Options of the `group` selector on a grading or quiz report page */
export function parseGroupOptions(html: string): Group[] {
  const $ = loadHtml(html);
  const groups: Group[] = [];
  $('select[name="group"] option').each((_, option) => {
    const id = option.attribs.value ?? '';
    const name = nodeText($(option));
    if (id && name) groups.push({ id, name });
  });
  return groups;
}

/** Groups listed on the course group management page, member counts stripped */
export function parseCourseGroups(html: string): Group[] {
  const $ = loadHtml(html);
  const groups: Group[] = [];
  $('select#groups option, select[name="groups"] option').each((_, option) => {
    const id = option.attribs.value ?? '';
    const name = nodeText($(option)).replace(/\s*\(\d+\)$/, '');
    if (id && name && !groups.some(group => group.id === id)) groups.push({ id, name });
  });
  return groups;
}

/** Practice quizzes on a course page, in page order */
export function parsePracticeQuizLinks(html: string): QuizLink[] {
  const $ = loadHtml(html);
  const quizzes: QuizLink[] = [];
  $('li.modtype_quiz').each((_, item) => {
    const link = $(item).find('a[href*="mod/quiz/view.php?id="]').first();
    const match = (link.attr('href') ?? '').match(/[?&]id=(\d+)/);
    if (!match) return;
    const name = cleanActivityName(link, 'quiz');
    if (name.toLowerCase().includes('practice quiz')) {
      quizzes.push({ name, moduleId: match[1] });
    }
  });
  return quizzes;
}
