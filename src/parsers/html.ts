import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';
import { hasChildren, isTag, isText } from 'domhandler';

export type { CheerioAPI };

export function loadHtml(html: string): CheerioAPI {
  return cheerio.load(html);
}

/**
 * Text content with each text node trimmed and joined by a single space.
 * Script and style bodies are skipped.
 */
export function nodeText(nodes: Cheerio<AnyNode>): string {
  const parts: string[] = [];
  const walk = (node: AnyNode): void => {
    if (isText(node)) {
      const text = node.data.replace(/\s+/g, ' ').trim();
      if (text) parts.push(text);
      return;
    }
    if (isTag(node) && (node.name === 'script' || node.name === 'style')) return;
    if (hasChildren(node)) node.children.forEach(walk);
  };
  nodes.each((_, node) => walk(node));
  return parts.join(' ');
}

/**
 * Scan every table for `<th>`/`<td>` rows and pick the value of the first row whose
 * label contains each wanted key (case-insensitive). Keys never found are absent.
 */
export function findTableLabelValues($: CheerioAPI, wanted: readonly string[]): Map<string, string> {
  const found = new Map<string, string>();
  $('table').each((_, table) => {
    $(table).find('tr').each((_, row) => {
      const th = $(row).find('th').first();
      const td = $(row).find('td').first();
      if (th.length === 0 || td.length === 0) return;
      const label = nodeText(th).toLowerCase();
      const value = nodeText(td);
      for (const key of wanted) {
        if (!found.has(key) && value && label.includes(key.toLowerCase())) {
          found.set(key, value);
        }
      }
    });
  });
  return found;
}

export function absoluteUrl(href: string, baseUrl: string): string {
  try {
    return new URL(href, baseUrl + '/').href;
  } catch {
    return href;
  }
}

/**
 * The anti-CSRF key Moodle embeds in M.cfg, falling back to any `sesskey=` link parameter.
 */
export function extractSesskey(html: string): string | null {
  const fromConfig = html.match(/"sesskey":"([^"]+)"/);
  if (fromConfig) return fromConfig[1];
  const fromLink = html.match(/sesskey=([A-Za-z0-9]+)/);
  return fromLink ? fromLink[1] : null;
}
