// Domain types for the Paatshala (Moodle) scraper.
// Field names are camelCase; the MCP tool layer reshapes them for output.

// ==================== RESULT ====================

export type ScrapeErrorKind = 'network' | 'auth' | 'http' | 'parse' | 'rejected';

export interface ScrapeError {
  kind: ScrapeErrorKind;
  message: string;
  status?: number;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: ScrapeError };

// ==================== COURSES ====================

export interface Course {
  id: string;
  name: string;
  category: string;
  starred: boolean;
}

// ==================== TOPICS & ACTIVITIES ====================

export const ACTIVITY_TYPES = [
  'quiz',
  'assign',
  'page',
  'url',
  'forum',
  'folder',
  'book',
  'lesson',
  'scorm',
  'certificate',
  'label',
  'resource',
  'unknown',
] as const;

export type ActivityType = typeof ACTIVITY_TYPES[number];

export interface Activity {
  /** Course module id (cmid), stable across moves */
  id: string;
  name: string;
  type: ActivityType;
  url: string;
  visible: boolean;
}

export interface Topic {
  /** Ordinal position on the course page; used by reorder/visibility endpoints */
  sectionNumber: number;
  /** Persistent section id; used by edit/restriction endpoints. '' when the page did not expose it */
  dbId: string;
  name: string;
  visible: boolean;
  summary: string;
  restrictionSummary: string;
  activities: Activity[];
  activityCount: number;
}

export interface ParsedTopics {
  topics: Topic[];
  /** True when at least one topic is missing its db id (Moodle only emits it in edit mode) */
  needsEditMode: boolean;
}

// ==================== ASSIGNMENTS ====================

export interface AssignmentLink {
  name: string;
  moduleId: string;
  url: string;
}

export interface AssignmentDetails {
  participants: string;
  drafts: string;
  submitted: string;
  needsGrading: string;
  latePolicy: string;
  dueDate: string;
  timeRemaining: string;
  submissionStatus: string;
  gradingStatus: string;
  lastModified: string;
  commentCount: string;
  maxGrade: string;
  description: string;
}

export interface TaskRow {
  name: string;
  moduleId: string;
  url: string;
  description: string;
  dueDate: string;
  timeRemaining: string;
  maxGrade: string;
  participants: string;
  submitted: string;
  needsGrading: string;
  lateSubmissions: string;
}

// ==================== SUBMISSIONS ====================

export interface SubmissionFile {
  name: string;
  url: string;
}

export type Submission =
  | { type: 'file'; files: SubmissionFile[] }
  | { type: 'link'; text: string }
  | { type: 'text'; text: string }
  | { type: 'empty' };

export type AssignmentKind = 'file' | 'link';

export interface SubmissionRow {
  name: string;
  userId: string;
  email: string;
  status: string;
  lastModified: string;
  submission: Submission;
  feedback: string;
  /** Raw "Grade" column cell; quick-grading layouts fill this and leave the final grade blank */
  grade: string;
  /** Raw "12.00 / 15.00" style grade, see cleanGradeValue */
  finalGrade: string;
  assignmentKind: AssignmentKind;
}

export interface GradingTable {
  rows: SubmissionRow[];
  maxGrade: number | null;
}

// ==================== GROUPS, QUIZZES, GRADE ITEMS ====================

export interface Group {
  id: string;
  name: string;
}

export interface QuizLink {
  name: string;
  moduleId: string;
}

export interface QuizScoreRow {
  student: string;
  scores: Record<string, number | null>;
}

export interface QuizScoreTable {
  quizNames: string[];
  rows: QuizScoreRow[];
}

export interface GradeItems {
  /** Grade item id → name, for grade conditions */
  grade: Record<string, string>;
  /** Course module id → name, for completion conditions */
  completion: Record<string, string>;
}

// ==================== FORMS ====================

/** Field name → values, in document order. Multi-valued fields (checkbox arrays, multi-selects) keep every value. */
export type FormFields = Array<[string, string]>;

export interface ScrapedForm {
  action: string;
  fields: FormFields;
}
