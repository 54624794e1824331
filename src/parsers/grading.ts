import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import type { AssignmentKind, GradingTable, Submission, SubmissionFile, SubmissionRow } from '../types/paatshala.js';
import { loadHtml, nodeText, type CheerioAPI } from './html.js';

const GRADE_PAIR = /(\d+(?:\.\d+)?)\s*\/\s*(\d+(?:\.\d+)?)/;

/**
 * Normalise a grade cell: "-" when unattempted, the "a / b" text when graded,
 * otherwise the trimmed input.
 */
export function cleanGradeValue(text: string): string {
  const trimmed = text.trim();
  if (!trimmed || /^-\s*(\/.*)?$/.test(trimmed)) return '-';
  const match = trimmed.match(GRADE_PAIR);
  if (match) return match[0];
  if (trimmed.includes('-') && !/\d/.test(trimmed)) return '-';
  return trimmed;
}

export function parseMoodleGrade(text: string): { score: number | null; max: number | null } {
  const match = text.match(GRADE_PAIR);
  if (!match) return { score: null, max: null };
  return { score: parseFloat(match[1]), max: parseFloat(match[2]) };
}

/** The cleaned final grade, or the cleaned "Grade" column when the final grade is blank */
export function effectiveGrade(row: Pick<SubmissionRow, 'grade' | 'finalGrade'>): string {
  const finalGrade = cleanGradeValue(row.finalGrade);
  return finalGrade !== '-' ? finalGrade : cleanGradeValue(row.grade);
}

interface ColumnMap {
  name: number;
  email: number;
  status: number;
  grade: number;
  lastModified: number;
  submission: number;
  feedback: number;
  finalGrade: number;
}

// Positions in Moodle's default grading table, used when a header cannot be matched
const DEFAULT_COLUMNS: ColumnMap = {
  name: 2,
  email: 3,
  status: 4,
  grade: 5,
  lastModified: 7,
  submission: 8,
  feedback: 11,
  finalGrade: 13,
};

function discoverColumns(headers: string[]): ColumnMap {
  const find = (predicate: (header: string) => boolean, fallback: number): number => {
    const index = headers.findIndex(predicate);
    return index >= 0 ? index : fallback;
  };
  return {
    name: find(h => h.includes('first name') || h.includes('surname') || h.includes('full name'), DEFAULT_COLUMNS.name),
    email: find(h => h.includes('email'), DEFAULT_COLUMNS.email),
    status: find(h => h.startsWith('status'), DEFAULT_COLUMNS.status),
    grade: find(h => h.startsWith('grade') && !h.startsWith('final grade'), DEFAULT_COLUMNS.grade),
    lastModified: find(
      h => h.includes('last modified (submission)'),
      find(h => h.startsWith('last modified'), DEFAULT_COLUMNS.lastModified),
    ),
    submission: find(h => h.includes('file submissions') || h.includes('online text'), DEFAULT_COLUMNS.submission),
    feedback: find(h => h.includes('feedback comments'), DEFAULT_COLUMNS.feedback),
    finalGrade: find(h => h.startsWith('final grade'), DEFAULT_COLUMNS.finalGrade),
  };
}

function findMaxGrade($: CheerioAPI, table: Cheerio<Element>, gradeHeader: string): number | null {
  const fromHeader = gradeHeader.match(/\/\s*(\d+(?:\.\d+)?)/);
  if (fromHeader) return parseFloat(fromHeader[1]);

  let fromDesc: number | null = null;
  table.find('[data-gradedesc]').each((_, el) => {
    const match = ($(el).attr('data-gradedesc') ?? '').match(/out of\s*(\d+(?:\.\d+)?)/i);
    if (match) {
      fromDesc = parseFloat(match[1]);
      return false;
    }
    return undefined;
  });
  return fromDesc;
}

function userIdOf($: CheerioAPI, row: Cheerio<Element>): string {
  const classMatch = (row.attr('class') ?? '').match(/\buser(\d+)\b/);
  if (classMatch) return classMatch[1];
  const selected = row.find('input[name="selectedusers"]').first().attr('value');
  if (selected) return selected;
  const profile = row.find('a[href*="user/view.php?id="]').first().attr('href') ?? '';
  const idMatch = profile.match(/[?&]id=(\d+)/);
  return idMatch ? idMatch[1] : '';
}

function parseSubmission($: CheerioAPI, cell: Cheerio<Element>): Submission {
  const files: SubmissionFile[] = [];
  cell.find('div.fileuploadsubmission').each((_, div) => {
    const link = $(div).find('a[href*="pluginfile.php"]').first();
    const url = link.attr('href');
    if (url) files.push({ name: nodeText(link), url });
  });
  if (files.length > 0) return { type: 'file', files };

  const noOverflow = cell.find('div.no-overflow').first();
  const text = nodeText(noOverflow.length > 0 ? noOverflow : cell);
  if (!text) return { type: 'empty' };
  return text.includes('http') ? { type: 'link', text } : { type: 'text', text };
}

/**
 * Parse the assignment grading table. Columns are located by header text since
 * file and online-text assignments order them differently; a missing cell reads as ''.
 */
export function parseGradingTable(html: string): GradingTable {
  const $ = loadHtml(html);
  let table = $('table.flexible.generaltable.generalbox').first();
  if (table.length === 0) table = $('table.generaltable').first();
  if (table.length === 0) return { rows: [], maxGrade: null };

  const headerCells = table.find('thead th');
  const headers = headerCells.toArray().map(th => nodeText($(th)).toLowerCase());
  const columns = discoverColumns(headers);
  const gradeHeader = headerCells.length > columns.grade ? nodeText(headerCells.eq(columns.grade)) : '';
  const maxGrade = findMaxGrade($, table, gradeHeader);

  const assignmentKind: AssignmentKind = headers.some(h => h.includes('file submissions')) ? 'file' : 'link';

  const rows: SubmissionRow[] = [];
  table.find('tbody tr').each((_, tr) => {
    const row = $(tr);
    if (row.hasClass('emptyrow')) return;
    const cells = row.children('th, td');
    if (cells.length === 0) return;

    const cellAt = (index: number): Cheerio<Element> => cells.eq(index);
    const textAt = (index: number): string => (index < cells.length ? nodeText(cellAt(index)) : '');

    const nameCell = cellAt(columns.name);
    const nameLink = nameCell.find('a').first();
    const name = nodeText(nameLink.length > 0 ? nameLink : nameCell);
    if (!name) return;

    const statusCell = cellAt(columns.status);
    const statusParts = statusCell.find('div').toArray().map(div => nodeText($(div))).filter(Boolean);

    rows.push({
      name,
      userId: userIdOf($, row),
      email: textAt(columns.email),
      status: statusParts.length > 0 ? statusParts.join(' | ') : textAt(columns.status),
      lastModified: textAt(columns.lastModified),
      submission: columns.submission < cells.length ? parseSubmission($, cellAt(columns.submission)) : { type: 'empty' },
      feedback: textAt(columns.feedback),
      grade: textAt(columns.grade),
      finalGrade: textAt(columns.finalGrade),
      assignmentKind,
    });
  });

  return { rows, maxGrade };
}
