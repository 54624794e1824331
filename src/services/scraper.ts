import { PaatshalaClient, fail, ok } from '../paatshala-client.js';
import { parseAssignmentLinks, parseAssignView } from '../parsers/assignments.js';
import {
  parseCourseGroups,
  parseCourseLinks,
  parseGroupOptions,
  parsePracticeQuizLinks,
  recentCoursesSchema,
  sortCourses,
  timelineCoursesSchema,
  toCourse,
} from '../parsers/courses.js';
import { getField, parseAvailabilityOptions, parseForm } from '../parsers/forms.js';
import { parseGradingTable } from '../parsers/grading.js';
import { extractSesskey } from '../parsers/html.js';
import { parseQuizReport } from '../parsers/quiz-report.js';
import { parseTopics } from '../parsers/topics.js';
import type {
  AssignmentDetails,
  AssignmentLink,
  Course,
  GradeItems,
  GradingTable,
  Group,
  QuizScoreTable,
  Result,
  TaskRow,
  Topic,
} from '../types/paatshala.js';
import { DEFAULT_CONCURRENCY } from '../config.js';
import { runWithConcurrency } from '../utils.js';

export interface PoolOptions {
  concurrency?: number;
}

const id = encodeURIComponent;

// ==================== COURSES ====================

/**
 * Enrolled and recent courses from the dashboard AJAX services, falling back to
 * course links in the page navigation. Starred courses sort first.
 */
export async function fetchCourses(client: PaatshalaClient): Promise<Result<Course[]>> {
  const dashboard = await client.getHtml('/my/', { timeoutMs: 15_000 });
  if (!dashboard.ok) return dashboard;

  const byId = new Map<string, Course>();
  const sesskey = extractSesskey(dashboard.value.html);

  if (sesskey) {
    const timeline = await client.callAjax(sesskey, 'core_course_get_enrolled_courses_by_timeline_classification', {
      offset: 0,
      limit: 0,
      classification: 'all',
      sort: 'fullname',
      customfieldname: '',
      customfieldvalue: '',
    });
    if (timeline.ok) {
      const parsed = timelineCoursesSchema.safeParse(timeline.value);
      if (parsed.success) {
        for (const raw of parsed.data.courses) {
          const course = toCourse(raw);
          if (!byId.has(course.id)) byId.set(course.id, course);
        }
      }
    } else {
      console.error(`[Scraper] Enrolled courses lookup failed: ${timeline.error.message}`);
    }

    const recent = await client.callAjax(sesskey, 'core_course_get_recent_courses', {
      userid: 0,
      limit: 0,
      offset: 0,
      sort: 'fullname',
    });
    if (recent.ok) {
      const parsed = recentCoursesSchema.safeParse(recent.value);
      if (parsed.success) {
        for (const raw of parsed.data) {
          const course = toCourse(raw);
          if (!byId.has(course.id)) byId.set(course.id, course);
        }
      }
    } else {
      console.error(`[Scraper] Recent courses lookup failed: ${recent.error.message}`);
    }
  }

  if (byId.size === 0) {
    for (const course of parseCourseLinks(dashboard.value.html)) byId.set(course.id, course);
  }

  return ok(sortCourses([...byId.values()]));
}

// ==================== TASKS ====================

function emptyDetails(): AssignmentDetails {
  return {
    participants: '',
    drafts: '',
    submitted: '',
    needsGrading: '',
    latePolicy: '',
    dueDate: '',
    timeRemaining: '',
    submissionStatus: '',
    gradingStatus: '',
    lastModified: '',
    commentCount: '',
    maxGrade: '',
    description: '',
  };
}

function toTaskRow(link: AssignmentLink, details: AssignmentDetails): TaskRow {
  return {
    name: link.name,
    moduleId: link.moduleId,
    url: link.url,
    description: details.description,
    dueDate: details.dueDate,
    timeRemaining: details.timeRemaining,
    maxGrade: details.maxGrade,
    participants: details.participants,
    submitted: details.submitted,
    needsGrading: details.needsGrading,
    lateSubmissions: details.latePolicy,
  };
}

export async function fetchAssignmentLinks(client: PaatshalaClient, courseId: string): Promise<Result<AssignmentLink[]>> {
  const page = await client.getHtml(`/course/view.php?id=${id(courseId)}`);
  if (!page.ok) return page;
  return ok(parseAssignmentLinks(page.value.html, client.base));
}

/**
 * Assignment list with details. Each detail page is fetched by its own forked
 * client in a bounded pool; rows come back in course-page order and a failed
 * detail fetch leaves that row's detail fields empty.
 */
export async function fetchTasks(
  client: PaatshalaClient,
  courseId: string,
  options: PoolOptions = {},
): Promise<Result<TaskRow[]>> {
  const links = await fetchAssignmentLinks(client, courseId);
  if (!links.ok) return links;
  if (links.value.length === 0) return ok([]);

  const tasks = links.value.map(link => async (): Promise<AssignmentDetails> => {
    const worker = client.fork();
    const page = await worker.getHtml(link.url);
    if (!page.ok) {
      console.error(`[Scraper] Task "${link.name}" (${link.moduleId}): ${page.error.message}`);
      return emptyDetails();
    }
    return parseAssignView(page.value.html);
  });

  const settled = await runWithConcurrency(tasks, options.concurrency ?? DEFAULT_CONCURRENCY);
  const rows = settled.map((result, i) => {
    if (result.status === 'fulfilled') return toTaskRow(links.value[i], result.value);
    console.error(`[Scraper] Task "${links.value[i].name}" failed:`, result.reason instanceof Error ? result.reason.message : String(result.reason));
    return toTaskRow(links.value[i], emptyDetails());
  });
  return ok(rows);
}

// ==================== TOPICS ====================

/**
 * Topics with their activities. When the normal page hides any section db id,
 * the page is fetched once more with editing on and that second parse is used
 * as-is. Network failures are retried with backoff; HTTP errors are not.
 */
export async function fetchTopics(client: PaatshalaClient, courseId: string): Promise<Result<Topic[]>> {
  const first = await client.getHtml(`/course/view.php?id=${id(courseId)}`, { retryNetwork: true });
  if (!first.ok) return first;

  const parsed = parseTopics(first.value.html, client.base);
  if (!parsed.needsEditMode) return ok(parsed.topics);

  const sesskey = extractSesskey(first.value.html);
  const editUrl = `/course/view.php?id=${id(courseId)}&edit=on${sesskey ? `&sesskey=${id(sesskey)}` : ''}`;
  const second = await client.getHtml(editUrl, { retryNetwork: true });
  if (!second.ok) {
    console.error(`[Scraper] Edit-mode reload for course ${courseId} failed: ${second.error.message}`);
    return ok(parsed.topics);
  }

  const retried = parseTopics(second.value.html, client.base);
  if (retried.needsEditMode) {
    console.error(`[Scraper] Course ${courseId}: some topics still have no section id after edit-mode reload`);
  }
  return ok(retried.topics);
}

// ==================== SUBMISSIONS & GROUPS ====================

export async function fetchGradingTable(
  client: PaatshalaClient,
  moduleId: string,
  groupId?: string,
): Promise<Result<GradingTable>> {
  let path = `/mod/assign/view.php?id=${id(moduleId)}&action=grading`;
  if (groupId) path += `&group=${id(groupId)}`;
  const page = await client.getHtml(path);
  if (!page.ok) return page;
  return ok(parseGradingTable(page.value.html));
}

export async function fetchGroups(
  client: PaatshalaClient,
  moduleId: string,
  kind: 'assign' | 'quiz' = 'assign',
): Promise<Result<Group[]>> {
  const path = kind === 'quiz'
    ? `/mod/quiz/report.php?id=${id(moduleId)}&mode=overview`
    : `/mod/assign/view.php?id=${id(moduleId)}&action=grading`;
  const page = await client.getHtml(path);
  if (!page.ok) return page;
  return ok(parseGroupOptions(page.value.html));
}

export async function fetchCourseGroups(client: PaatshalaClient, courseId: string): Promise<Result<Group[]>> {
  const page = await client.getHtml(`/group/index.php?id=${id(courseId)}`);
  if (!page.ok) return page;
  return ok(parseCourseGroups(page.value.html));
}

// ==================== QUIZZES ====================

/**
 * Best practice-quiz score per student across every "practice quiz" in the course.
 * Students are sorted by name; a quiz the student never attempted scores null.
 */
export async function fetchQuizScores(
  client: PaatshalaClient,
  courseId: string,
  options: PoolOptions & { groupId?: string } = {},
): Promise<Result<QuizScoreTable>> {
  const page = await client.getHtml(`/course/view.php?id=${id(courseId)}`);
  if (!page.ok) return page;
  const quizzes = parsePracticeQuizLinks(page.value.html);
  if (quizzes.length === 0) return ok({ quizNames: [], rows: [] });

  const tasks = quizzes.map(quiz => async (): Promise<Record<string, number>> => {
    const worker = client.fork();
    let path = `/mod/quiz/report.php?id=${id(quiz.moduleId)}&mode=overview`;
    if (options.groupId) path += `&group=${id(options.groupId)}`;
    const report = await worker.getHtml(path);
    if (!report.ok) {
      console.error(`[Scraper] Quiz "${quiz.name}" report: ${report.error.message}`);
      return {};
    }
    return parseQuizReport(report.value.html).best;
  });

  const settled = await runWithConcurrency(tasks, options.concurrency ?? DEFAULT_CONCURRENCY);
  const byStudent = new Map<string, Record<string, number>>();
  settled.forEach((result, i) => {
    if (result.status !== 'fulfilled') return;
    for (const [student, score] of Object.entries(result.value)) {
      const scores = byStudent.get(student) ?? {};
      scores[quizzes[i].name] = score;
      byStudent.set(student, scores);
    }
  });

  const quizNames = quizzes.map(quiz => quiz.name);
  const rows = [...byStudent.keys()].sort().map(student => {
    const scores = byStudent.get(student) ?? {};
    return {
      student,
      scores: Object.fromEntries(quizNames.map(name => [name, scores[name] ?? null])),
    };
  });
  return ok({ quizNames, rows });
}

// ==================== RESTRICTIONS ====================

/**
 * Current availability JSON of a topic, read from its edit form. '' when the topic has none.
 */
export async function fetchTopicRestriction(client: PaatshalaClient, dbId: string): Promise<Result<string>> {
  if (!dbId) return fail('parse', 'Topic has no section id; reload topics first');
  const page = await client.getHtml(`/course/editsection.php?id=${id(dbId)}`);
  if (!page.ok) return page;
  const form = parseForm(page.value.html);
  if (!form) return fail('parse', `No edit form found for section ${dbId}`);
  return ok(getField(form.fields, 'availabilityconditionsjson') ?? '');
}

/**
 * Grade items and completion-trackable activities usable in restriction conditions,
 * read from a topic's edit form. Completion options fall back to the topics' activities.
 */
export async function fetchGradeItems(
  client: PaatshalaClient,
  courseId: string,
  topics?: Topic[],
): Promise<Result<GradeItems>> {
  let knownTopics = topics;
  if (!knownTopics) {
    const loaded = await fetchTopics(client, courseId);
    if (!loaded.ok) return loaded;
    knownTopics = loaded.value;
  }

  const withId = knownTopics.find(topic => topic.dbId !== '');
  let grade: Record<string, string> = {};
  let completion: Record<string, string> = {};
  if (withId) {
    const page = await client.getHtml(`/course/editsection.php?id=${id(withId.dbId)}`);
    if (page.ok) {
      grade = parseAvailabilityOptions(page.value.html, 'grade');
      completion = parseAvailabilityOptions(page.value.html, 'completion');
    } else {
      console.error(`[Scraper] Grade items for course ${courseId}: ${page.error.message}`);
    }
  }

  if (Object.keys(completion).length === 0) {
    for (const topic of knownTopics) {
      for (const activity of topic.activities) {
        if (activity.type !== 'label') completion[activity.id] = activity.name;
      }
    }
  }
  return ok({ grade, completion });
}
