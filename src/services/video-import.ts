import type { Topic } from '../types/paatshala.js';

export interface VideoFile {
  name: string;
  file_id: string;
}

export interface ParsedVideo extends VideoFile {
  /** 0 when the file name carries no `#N` marker */
  session: number;
  title: string;
}

export const IMPORT_EMBED_WIDTH = 800;
export const IMPORT_EMBED_HEIGHT = 600;

function titleCase(text: string): string {
  return text.replace(/[A-Za-z]+/g, word => word[0].toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * Session number and display title from a lecture recording's file name.
 *
 * @example parseVideoFilename('#1.1_-_what_is_cyber_security_v30 (720p).mp4')
 * // { session: 1, title: 'What Is Cyber Security' }
 */
export function parseVideoFilename(filename: string): { session: number | null; title: string } {
  const sessionMatch = filename.match(/#(\d+)/);
  const session = sessionMatch ? parseInt(sessionMatch[1], 10) : null;

  const title = filename
    .replace(/\.(mp4|mkv|avi|mov|webm)$/i, '')
    .replace(/#\d+\.?\d*/g, '')
    .replace(/\(?\d{3,4}p\)?/gi, '')
    .replace(/v\d+\.?\d*/gi, '')
    .replace(/^[_\-\s]+|[_\-\s]+$/g, '')
    .replace(/_+/g, ' ')
    .replace(/-+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  return { session, title: titleCase(title) };
}

export function generateEmbedHtml(fileId: string, width = 640, height = 480): string {
  return `<iframe src="https://drive.google.com/file/d/${encodeURIComponent(fileId)}/preview" width="${width}" height="${height}" allow="autoplay"></iframe>`;
}

/** Videos keyed by session number (0 for unnumbered), each list sorted by file name */
export function groupVideosBySession(videos: VideoFile[]): Map<number, ParsedVideo[]> {
  const grouped = new Map<number, ParsedVideo[]>();
  for (const video of videos) {
    const { session, title } = parseVideoFilename(video.name);
    const parsed: ParsedVideo = { ...video, session: session ?? 0, title };
    const list = grouped.get(parsed.session) ?? [];
    list.push(parsed);
    grouped.set(parsed.session, list);
  }
  for (const list of grouped.values()) {
    list.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }
  return grouped;
}

/** First topic named "Session N" or "Day N" (zero padding allowed) */
export function autoSelectTopic(topics: readonly Topic[], session: number): Topic | null {
  if (session <= 0) return null;
  const pattern = new RegExp(`\\b(?:Session|Day)\\s+0*${session}\\b`, 'i');
  return topics.find(topic => pattern.test(topic.name)) ?? null;
}
