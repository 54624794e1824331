import type { PaatshalaClient } from '../paatshala-client.js';
import { formTarget, parseForm, setField } from '../parsers/forms.js';
import type { Result } from '../types/paatshala.js';
import {
  parseRestrictions,
  rebuildRestrictions,
  serializeRestrictions,
  type RebuildOptions,
  type RestrictionChanges,
} from './restrictions.js';
import { fetchTopicRestriction } from './scraper.js';

const id = encodeURIComponent;

export type ModuleAction = 'duplicate' | 'delete' | 'hide' | 'show';

/**
 * Course-editing calls against Moodle's web endpoints. Every method needs a
 * fresh sesskey, returns true on success and logs the reason on failure.
 *
 * Topics are addressed two ways: `sectionNumber` (position on the page) for
 * moves and visibility, `dbId` (persistent section id) for editing, deleting
 * and restrictions. Activities are always addressed by course module id.
 */
export class MutationClient {
  constructor(private readonly client: PaatshalaClient, private readonly courseId: string) {}

  private report<T>(action: string, result: Result<T>): boolean {
    if (result.ok) return true;
    console.error(`[Mutations] ${action} failed: ${result.error.message}`);
    return false;
  }

  // ==================== TOPICS ====================

  /** Move the topic at `fromSectionNumber` so it ends up at `toSectionNumber` */
  async moveTopic(sesskey: string, fromSectionNumber: number, toSectionNumber: number): Promise<boolean> {
    if (fromSectionNumber === toSectionNumber) return true;
    const result = await this.client.callCourseRest({
      sesskey,
      courseId: this.courseId,
      class: 'section',
      field: 'move',
      id: fromSectionNumber,
      value: toSectionNumber,
    });
    return this.report(`move topic ${fromSectionNumber} -> ${toSectionNumber}`, result);
  }

  async renameTopic(sesskey: string, dbId: string, name: string): Promise<boolean> {
    const result = await this.client.callAjax(sesskey, 'core_update_inplace_editable', {
      component: 'format_topics',
      itemtype: 'sectionname',
      itemid: dbId,
      value: name,
    });
    return this.report(`rename topic ${dbId}`, result);
  }

  async setTopicVisibility(sesskey: string, sectionNumber: number, visible: boolean): Promise<boolean> {
    const toggle = visible ? 'show' : 'hide';
    const page = await this.client.getHtml(
      `/course/view.php?id=${id(this.courseId)}&sesskey=${id(sesskey)}&${toggle}=${sectionNumber}`,
    );
    return this.report(`${toggle} topic ${sectionNumber}`, page);
  }

  async deleteTopic(sesskey: string, dbId: string): Promise<boolean> {
    const page = await this.client.getHtml(
      `/course/editsection.php?id=${id(dbId)}&sr=0&delete=1&confirm=1&sesskey=${id(sesskey)}`,
    );
    if (!page.ok) return this.report(`delete topic ${dbId}`, page);
    if (!page.value.url.includes('/course/view.php')) {
      console.error(`[Mutations] delete topic ${dbId} failed: no redirect back to the course (ended at ${this.client.sanitize(page.value.url)})`);
      return false;
    }
    return true;
  }

  /** Append `count` empty topics at the end of the course */
  async addTopics(sesskey: string, count = 1): Promise<boolean> {
    const page = await this.client.getHtml(
      `/course/changenumsections.php?courseid=${id(this.courseId)}&insertsection=0&sesskey=${id(sesskey)}&sectionreturn=0&numsections=${count}`,
    );
    return this.report(`add ${count} topic(s)`, page);
  }

  // ==================== ACTIVITIES ====================

  /**
   * Move an activity into the section with `targetDbId`, before `beforeCmid`
   * or at the end of the section when omitted.
   */
  async moveActivity(sesskey: string, cmid: string, targetDbId: string, beforeCmid?: string): Promise<boolean> {
    const fields: Record<string, string> = {
      sesskey,
      courseId: this.courseId,
      class: 'resource',
      field: 'move',
      id: cmid,
      sectionId: targetDbId,
    };
    if (beforeCmid) fields.beforeId = beforeCmid;
    const result = await this.client.callCourseRest(fields);
    return this.report(`move activity ${cmid} to section ${targetDbId}`, result);
  }

  /** Reorder within the activity's own section */
  async reorderActivity(sesskey: string, cmid: string, sectionDbId: string, beforeCmid?: string): Promise<boolean> {
    return this.moveActivity(sesskey, cmid, sectionDbId, beforeCmid);
  }

  private async editModule(sesskey: string, cmid: string, action: ModuleAction): Promise<boolean> {
    const result = await this.client.callAjax(sesskey, 'core_course_edit_module', {
      action,
      id: cmid,
      sectionreturn: 0,
    });
    return this.report(`${action} activity ${cmid}`, result);
  }

  async duplicateActivity(sesskey: string, cmid: string): Promise<boolean> {
    return this.editModule(sesskey, cmid, 'duplicate');
  }

  async deleteActivity(sesskey: string, cmid: string): Promise<boolean> {
    return this.editModule(sesskey, cmid, 'delete');
  }

  async setActivityVisibility(sesskey: string, cmid: string, visible: boolean): Promise<boolean> {
    return this.editModule(sesskey, cmid, visible ? 'show' : 'hide');
  }

  async renameActivity(sesskey: string, cmid: string, name: string): Promise<boolean> {
    const result = await this.client.callAjax(sesskey, 'core_update_inplace_editable', {
      component: 'core_course',
      itemtype: 'activityname',
      itemid: cmid,
      value: name,
    });
    return this.report(`rename activity ${cmid}`, result);
  }

  // ==================== FORMS ====================

  /**
   * Replace a topic's availability JSON. The edit form is scraped so every other
   * field keeps its current value; success is a redirect back to the course page.
   */
  async updateTopicRestriction(sesskey: string, dbId: string, restrictionJson: string): Promise<boolean> {
    const page = await this.client.getHtml(`/course/editsection.php?id=${id(dbId)}`);
    if (!page.ok) return this.report(`load section ${dbId} form`, page);

    const form = parseForm(page.value.html);
    if (!form) {
      console.error(`[Mutations] update restriction for section ${dbId} failed: edit form not found`);
      return false;
    }

    let fields = setField(form.fields, 'availabilityconditionsjson', restrictionJson);
    fields = setField(fields, 'sesskey', sesskey);
    fields = setField(fields, 'submitbutton', 'Save changes');

    const submitted = await this.client.postForm(formTarget(form.action, page.value.url, '/course/editsection.php'), fields);
    if (!submitted.ok) return this.report(`update restriction for section ${dbId}`, submitted);
    if (!submitted.value.url.includes('course/view.php')) {
      console.error(`[Mutations] update restriction for section ${dbId} rejected: form was redisplayed`);
      return false;
    }
    return true;
  }

  /**
   * Create a Page activity holding `html` in the topic at `sectionNumber`.
   * Judged by where the submission lands: the course or the new page, never the form again.
   */
  async addPageWithEmbed(
    sesskey: string,
    sectionNumber: number,
    title: string,
    html: string,
    visible = true,
  ): Promise<boolean> {
    const formPath = `/course/modedit.php?add=page&type=&course=${id(this.courseId)}&section=${sectionNumber}&return=0&sr=0`;
    const page = await this.client.getHtml(formPath);
    if (!page.ok) return this.report(`load page form for "${title}"`, page);

    const form = parseForm(page.value.html);
    if (!form) {
      console.error(`[Mutations] add page "${title}" failed: creation form not found`);
      return false;
    }

    let fields = setField(form.fields, 'name', title);
    fields = setField(fields, 'page[text]', html);
    fields = setField(fields, 'page[format]', '1');
    fields = setField(fields, 'visible', visible ? '1' : '0');
    fields = setField(fields, 'sesskey', sesskey);
    fields = setField(fields, 'submitbutton2', 'Save and return to course');

    const submitted = await this.client.postForm(formTarget(form.action, page.value.url, '/course/modedit.php'), fields);
    if (!submitted.ok) return this.report(`add page "${title}"`, submitted);

    const finalUrl = submitted.value.url;
    if (finalUrl.includes('modedit.php') || !/course\/view\.php|mod\/page\/view\.php/.test(finalUrl)) {
      console.error(`[Mutations] add page "${title}" rejected: form was redisplayed`);
      return false;
    }
    return true;
  }

  /**
   * Read a topic's current restrictions, apply per-category changes and save.
   * Returns the JSON that was written, or null when any step failed.
   */
  async applyRestrictionChanges(
    sesskey: string,
    dbId: string,
    changes: RestrictionChanges,
    options: RebuildOptions = {},
  ): Promise<string | null> {
    const current = await fetchTopicRestriction(this.client, dbId);
    if (!current.ok) {
      this.report(`read restrictions of section ${dbId}`, current);
      return null;
    }
    const tree = parseRestrictions(current.value);
    if (!tree.ok) {
      this.report(`parse restrictions of section ${dbId}`, tree);
      return null;
    }
    const json = serializeRestrictions(rebuildRestrictions(tree.value, changes, options));
    return (await this.updateTopicRestriction(sesskey, dbId, json)) ? json : null;
  }
}
