import type { AnyNode } from 'domhandler';
import { isTag, isText } from 'domhandler';
import type { AssignmentDetails, AssignmentLink } from '../types/paatshala.js';
import { absoluteUrl, findTableLabelValues, loadHtml, nodeText, type CheerioAPI } from './html.js';
import { cleanActivityName } from './topics.js';

const OVERVIEW_LABELS = ['participants', 'drafts', 'submitted', 'needs grading', 'due date', 'time remaining', 'late submissions'] as const;
const STATUS_LABELS = ['submission status', 'grading status', 'due date', 'time remaining', 'last modified'] as const;

/**
 * Flatten the assignment intro into plain text: one line per paragraph,
 * ordered lists numbered, unordered lists bulleted.
 */
function describeIntro($: CheerioAPI): string {
  const intro = $('#intro').first();
  if (intro.length === 0) return '';
  const noOverflow = intro.find('div.no-overflow').first();
  const content = noOverflow.length > 0 ? noOverflow : intro;

  const parts: string[] = [];
  content.contents().each((_, child: AnyNode) => {
    if (isText(child)) {
      const text = child.data.replace(/\s+/g, ' ').trim();
      if (text) parts.push(text);
      return;
    }
    if (!isTag(child) || child.name === 'br') return;
    if (child.name === 'ol' || child.name === 'ul') {
      $(child).find('li').each((i, li) => {
        const text = nodeText($(li));
        parts.push(child.name === 'ol' ? `${i + 1}. ${text}` : `• ${text}`);
      });
      return;
    }
    const text = nodeText($(child));
    if (text) parts.push(text);
  });
  return parts.join('\n');
}

export function parseAssignView(html: string): AssignmentDetails {
  const $ = loadHtml(html);
  const overview = findTableLabelValues($, OVERVIEW_LABELS);
  const status = findTableLabelValues($, STATUS_LABELS);
  const grade = findTableLabelValues($, ['maximum grade', 'max grade']);

  let commentCount = '';
  $('a').each((_, a) => {
    const match = nodeText($(a)).match(/Comments\s*\((\d+)\)/i);
    if (match) {
      commentCount = match[1];
      return false;
    }
    return undefined;
  });

  return {
    participants: overview.get('participants') ?? '',
    drafts: overview.get('drafts') ?? '',
    submitted: overview.get('submitted') ?? '',
    needsGrading: overview.get('needs grading') ?? '',
    latePolicy: overview.get('late submissions') ?? '',
    dueDate: status.get('due date') || overview.get('due date') || '',
    timeRemaining: status.get('time remaining') || overview.get('time remaining') || '',
    submissionStatus: status.get('submission status') ?? '',
    gradingStatus: status.get('grading status') ?? '',
    lastModified: status.get('last modified') ?? '',
    commentCount,
    maxGrade: grade.get('maximum grade') || grade.get('max grade') || '',
    description: describeIntro($),
  };
}

/** Assignment modules listed on a course page, in page order */
export function parseAssignmentLinks(html: string, baseUrl: string): AssignmentLink[] {
  const $ = loadHtml(html);
  const links: AssignmentLink[] = [];
  $('li[class*="modtype_assign"]').each((_, item) => {
    let link = $(item).find('a[href*="mod/assign/view.php?id="]').first();
    if (link.length === 0) link = $(item).find('a[href*="/mod/assign/"]').first();
    const href = link.attr('href');
    if (!href) return;
    const idMatch = href.match(/[?&]id=(\d+)/);
    links.push({
      name: cleanActivityName(link, 'assign'),
      moduleId: idMatch ? idMatch[1] : '',
      url: absoluteUrl(href, baseUrl),
    });
  });
  return links;
}
