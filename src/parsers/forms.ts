import { z } from 'zod';
import type { FormFields, ScrapedForm } from '../types/paatshala.js';
import { loadHtml } from './html.js';

const SKIPPED_INPUT_TYPES = new Set(['submit', 'button', 'image', 'file', 'reset']);

/**
 * Collect the values a browser would submit for a form: enabled inputs (checked
 * boxes and radios only), textareas and selected options. Submit buttons are
 * left out so the caller can add the one it means to press.
 */
export function parseForm(html: string, selector = 'form.mform'): ScrapedForm | null {
  const $ = loadHtml(html);
  let form = $(selector).first();
  if (form.length === 0) form = $('form').first();
  if (form.length === 0) return null;

  const fields: FormFields = [];
  form.find('input, textarea, select').each((_, el) => {
    const name = el.attribs.name;
    if (!name || el.attribs.disabled !== undefined) return;

    if (el.name === 'input') {
      const type = (el.attribs.type ?? 'text').toLowerCase();
      if (SKIPPED_INPUT_TYPES.has(type)) return;
      if ((type === 'checkbox' || type === 'radio') && el.attribs.checked === undefined) return;
      fields.push([name, el.attribs.value ?? (type === 'checkbox' ? '1' : '')]);
      return;
    }

    if (el.name === 'textarea') {
      fields.push([name, $(el).text()]);
      return;
    }

    const options = $(el).find('option');
    const selected = options.filter((_, option) => option.attribs.selected !== undefined);
    if (selected.length > 0) {
      selected.each((_, option) => {
        fields.push([name, option.attribs.value ?? $(option).text()]);
      });
    } else if (el.attribs.multiple === undefined && options.length > 0) {
      const first = options.first();
      fields.push([name, first.attr('value') ?? first.text()]);
    }
  });

  return { action: form.attr('action') ?? '', fields };
}

/** Replace every value of `name`, appending the field when absent */
export function setField(fields: FormFields, name: string, value: string): FormFields {
  const kept = fields.filter(([key]) => key !== name);
  return [...kept, [name, value]];
}

export function getField(fields: FormFields, name: string): string | undefined {
  return fields.find(([key]) => key === name)?.[1];
}

// ==================== AVAILABILITY OPTIONS ====================

const optionListSchema = z.array(z.object({
  id: z.union([z.number(), z.string()]),
  name: z.string(),
}).passthrough());

/**
 * Pull the option list passed to an availability plugin's form init, e.g.
 * `M.availability_grade.form.init(..., [[{"id":5,"name":"Quiz 1"}]])`.
 */
export function parseAvailabilityOptions(html: string, plugin: 'grade' | 'completion'): Record<string, string> {
  const marker = `M.availability_${plugin}.form.init(`;
  const start = html.indexOf(marker);
  if (start < 0) return {};
  const end = html.indexOf(');', start);
  const args = html.slice(start + marker.length, end < 0 ? undefined : end);

  const listStart = args.lastIndexOf('[[');
  const listEnd = args.lastIndexOf(']]');
  if (listStart < 0 || listEnd < listStart) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(args.slice(listStart, listEnd + 2));
  } catch {
    return {};
  }
  const outer = z.array(z.unknown()).safeParse(parsed);
  if (!outer.success || outer.data.length === 0) return {};
  const list = optionListSchema.safeParse(outer.data[0]);
  if (!list.success) return {};

  const options: Record<string, string> = {};
  for (const item of list.data) {
    options[String(item.id)] = item.name;
  }
  return options;
}

/** Absolute URL a form posts to, resolved against the page it was read from */
export function formTarget(action: string, pageUrl: string, fallback: string): string {
  if (!action) return fallback;
  try {
    return new URL(action, pageUrl).href;
  } catch {
    return fallback;
  }
}
