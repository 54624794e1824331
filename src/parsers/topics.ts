import type { Cheerio } from 'cheerio';
import type { AnyNode, Element } from 'domhandler';
import { ACTIVITY_TYPES, type Activity, type ActivityType, type ParsedTopics, type Topic } from '../types/paatshala.js';
import { absoluteUrl, loadHtml, nodeText } from './html.js';

/** Type label Moodle appends to an activity's visible name */
const TYPE_SUFFIXES: Partial<Record<ActivityType, string>> = {
  quiz: 'Quiz',
  assign: 'Assignment',
  page: 'Page',
  url: 'URL',
  forum: 'Forum',
  folder: 'Folder',
  book: 'Book',
  lesson: 'Lesson',
  scorm: 'SCORM package',
  certificate: 'Certificate',
  resource: 'File',
};

function toActivityType(value: string): ActivityType {
  const match = ACTIVITY_TYPES.find(type => type === value);
  return match ?? 'unknown';
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Visible activity name without the hidden type label and without a trailing
 * type token such as " Quiz".
 */
export function cleanActivityName(link: Cheerio<AnyNode>, type: ActivityType): string {
  const instance = link.find('.instancename').first();
  const source = (instance.length > 0 ? instance : link).clone();
  source.find('.accesshide').remove();
  let name = nodeText(source);
  const suffix = TYPE_SUFFIXES[type];
  if (suffix) {
    name = name.replace(new RegExp(`\\s+${escapeRegExp(suffix)}$`, 'i'), '');
  }
  return name.trim();
}

function parseActivity(item: Cheerio<Element>, baseUrl: string): Activity | null {
  const idAttr = item.attr('id') ?? '';
  const idMatch = idAttr.match(/^module-(\d+)$/);
  const id = idMatch ? idMatch[1] : (item.attr('data-id') ?? '');
  if (!id) return null;

  const typeMatch = (item.attr('class') ?? '').match(/\bmodtype_(\w+)/);
  const type = toActivityType(typeMatch ? typeMatch[1] : '');

  const link = item.find('a[href*="/mod/"]').first();
  const href = link.attr('href');

  let name = link.length > 0 ? cleanActivityName(link, type) : '';
  if (!name) {
    name = item.find('[data-activityname]').first().attr('data-activityname') ?? '';
  }
  if (!name) {
    // Labels have no link; their text is the content
    name = nodeText(item.find('.contentwithoutlink, .activity-altcontent').first()).slice(0, 80);
  }

  const hidden = item.hasClass('hidden')
    || item.find('a.dimmed, .dimmed_text, .activity-item.hiddenactivity').length > 0;

  return {
    id,
    name,
    type,
    url: href ? absoluteUrl(href, baseUrl) : '',
    visible: !hidden,
  };
}

function sectionNumberOf(section: Cheerio<Element>, index: number): number {
  for (const attr of ['data-number', 'data-sectionid']) {
    const value = section.attr(attr);
    if (value !== undefined && /^\d+$/.test(value)) return parseInt(value, 10);
  }
  const idMatch = (section.attr('id') ?? '').match(/^section-(\d+)$/);
  return idMatch ? parseInt(idMatch[1], 10) : index;
}

function dbIdOf(section: Cheerio<Element>): string {
  const dataId = section.attr('data-id');
  if (dataId && /^\d+$/.test(dataId)) return dataId;

  const editable = section.find('span.inplaceeditable[data-itemtype="sectionname"]').first().attr('data-itemid');
  if (editable) return editable;

  let fromLink = '';
  section.find('a[href*="editsection.php?id="]').each((_, a) => {
    const href = a.attribs.href ?? '';
    if (href.includes('delete')) return undefined;
    const match = href.match(/editsection\.php\?id=(\d+)/);
    if (match) {
      fromLink = match[1];
      return false;
    }
    return undefined;
  });
  return fromLink;
}

/**
 * Parse the course page into topics. `needsEditMode` is set when any topic is
 * missing its db id, which Moodle only renders reliably with editing turned on.
 */
export function parseTopics(html: string, baseUrl: string): ParsedTopics {
  const $ = loadHtml(html);
  let sections = $('li.section.main');
  if (sections.length === 0) sections = $('li.section');

  const topics: Topic[] = [];
  sections.each((index, el) => {
    const section = $(el);
    const nameNode = section.find('.sectionname').first();
    const name = nameNode.length > 0 ? nodeText(nameNode) : (section.attr('aria-label') ?? '');

    const restrictionLines: string[] = [];
    section.find('.availabilityinfo').each((_, info) => {
      if ($(info).closest('li.activity').length > 0) return;
      const text = nodeText($(info));
      if (text) restrictionLines.push(text);
    });

    const activities: Activity[] = [];
    section.find('li.activity').each((_, item) => {
      const activity = parseActivity($(item), baseUrl);
      if (activity) activities.push(activity);
    });

    topics.push({
      sectionNumber: sectionNumberOf(section, index),
      dbId: dbIdOf(section),
      name,
      visible: !section.hasClass('hidden'),
      summary: nodeText(section.find('.summary').first()),
      restrictionSummary: restrictionLines.join('\n'),
      activities,
      activityCount: activities.length,
    });
  });

  return { topics, needsEditMode: topics.some(topic => topic.dbId === '') };
}
