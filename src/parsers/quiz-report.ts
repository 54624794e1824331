import { loadHtml, nodeText } from './html.js';

export interface QuizReport {
  /** Best grade per student name */
  best: Record<string, number>;
  attemptCount: number;
}

/**
 * Read the quiz overview report. Each student keeps their highest attempt;
 * rows without a numeric grade are skipped.
 */
export function parseQuizReport(html: string): QuizReport {
  const $ = loadHtml(html);
  const table = $('table.generaltable').first();
  const best: Record<string, number> = {};
  let attemptCount = 0;
  if (table.length === 0) return { best, attemptCount };

  const headers = table.find('thead th').toArray().map(th => nodeText($(th)).toLowerCase());
  const nameIndex = headers.findIndex(h => h.includes('first name') || h.includes('surname'));
  const gradeIndex = headers.findIndex(h => h.startsWith('grade'));
  const nameCol = nameIndex >= 0 ? nameIndex : 2;
  const gradeCol = gradeIndex >= 0 ? gradeIndex : 8;

  table.find('tbody tr').each((_, tr) => {
    const row = $(tr);
    if (row.hasClass('emptyrow')) return;
    const cells = row.children('th, td');
    if (cells.length <= Math.max(nameCol, gradeCol)) return;

    const link = cells.eq(nameCol).find('a[href*="user/view.php"]').first();
    if (link.length === 0) return;
    const name = nodeText(link);
    const grade = nodeText(cells.eq(gradeCol)).match(/(\d+(?:\.\d+)?)/);
    if (!name || !grade) return;

    const value = parseFloat(grade[1]);
    best[name] = Math.max(best[name] ?? 0, value);
    attemptCount++;
  });

  return { best, attemptCount };
}
