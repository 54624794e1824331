// Shared utilities for the Paatshala MCP server

import path from 'path';

/**
 * Parse a PDF buffer into text content.
 * Uses pdf-parse v2 class-based API.
 */
export async function parsePdf(buffer: Buffer): Promise<{ text: string; numpages: number }> {
  try {
    // Race against a 30-second timeout to prevent hangs on corrupted PDFs
    const result = await Promise.race([
      (async () => {
        const { PDFParse } = await import('pdf-parse');
        const parser = new PDFParse({ data: new Uint8Array(buffer) });
        const parsed = await parser.getText();
        await parser.destroy();
        return { text: parsed.text, numpages: parsed.total };
      })(),
      new Promise<never>((_, reject) =>
        setTimeout(() => reject(new Error('PDF parsing timed out after 30 seconds')), 30_000)
      ),
    ]);
    return result;
  } catch (error) {
    throw new Error(`PDF parsing failed: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
  }
}

/** Round to the nearest integer, with exact halves going to the even neighbour */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Strip HTML tags and decode common HTML entities.
 */
export function stripHtmlTags(html: string): string {
  return html
    .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, '')
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, '')
    // Preserve line breaks from block elements
    .replace(/<\/?(p|div|br|h[1-6]|li|tr|blockquote|pre|hr)[^>]*\/?>/gi, '\n')
    .replace(/<[^>]+>/g, ' ')
    .replace(/&nbsp;/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&#(\d+);/g, (_match, code: string) => {
      const num = parseInt(code, 10);
      return num >= 0 && num <= 0x10FFFF ? String.fromCodePoint(num) : '';
    })
    .replace(/&amp;/g, '&')
    .replace(/[ \t]+/g, ' ')
    .replace(/\n[ \t]+/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Format a byte count into a human-readable size string.
 */
export function formatFileSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Format an error into a consistent MCP error response.
 */
export function formatError(context: string, error: unknown): {
  content: [{ type: 'text'; text: string }];
  isError: true;
} {
  const message = error instanceof Error ? error.message : String(error);

  let hint = '';
  if (/not authenticated|invalidsesskey|servicerequireslogin/i.test(message)) {
    hint = ' Hint: The Paatshala session has expired. Log in again with paatshala_login.';
  } else if (/\b403\b/.test(message)) {
    hint = ' Hint: Access denied. Editing tools need a teacher or manager role in the course.';
  } else if (/\b404\b/.test(message)) {
    hint = ' Hint: Not found. The course, module or topic may have been deleted.';
  } else if (/\b5\d{2}\b/.test(message)) {
    hint = ' Hint: Paatshala server error. This is usually temporary; try again in a minute.';
  }

  // Session tokens and local paths never go back to the caller
  const sanitized = (message + hint)
    .replace(/MoodleSession=[^\s;&"']+/gi, 'MoodleSession=[REDACTED]')
    .replace(/sesskey=[^\s&"']+/gi, 'sesskey=[REDACTED]')
    .replace(/\/(Users|home)\/[^\s:]+/g, '<path>');

  return {
    content: [{
      type: 'text' as const,
      text: `Error ${context}: ${sanitized}`,
    }],
    isError: true,
  };
}

/**
 * Create a successful MCP tool response from a JSON-serializable value.
 */
export function formatSuccess(data: unknown): {
  content: [{ type: 'text'; text: string }];
} {
  return {
    content: [{
      type: 'text' as const,
      text: JSON.stringify(data != null && typeof data === 'object' ? stripNulls(data) : data, null, 2),
    }],
  };
}

const CONTENT_TYPES: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.html': 'text/html',
  '.htm': 'text/html',
  '.txt': 'text/plain',
  '.md': 'text/markdown',
  '.csv': 'text/csv',
  '.json': 'application/json',
  '.py': 'text/x-python',
  '.js': 'text/javascript',
  '.ts': 'text/plain',
  '.java': 'text/plain',
  '.c': 'text/plain',
  '.cpp': 'text/plain',
  '.sh': 'text/plain',
  '.sql': 'text/plain',
  '.xml': 'application/xml',
  '.yml': 'text/plain',
  '.yaml': 'text/plain',
};

/** Content type from a file name; submissions are served as octet-stream so the extension decides */
export function contentTypeFor(filename: string): string {
  return CONTENT_TYPES[path.extname(filename).toLowerCase()] ?? 'application/octet-stream';
}

/**
 * Extract text content from a file buffer based on its content type.
 * Returns the extracted text or null if the type is not supported.
 */
export async function extractTextFromFile(
  buffer: Buffer,
  contentType: string,
  maxLength: number = DEFAULT_MAX_TEXT_LENGTH,
): Promise<{ text: string; truncated: boolean; pages?: number } | null> {
  let extractedText = '';
  let pages: number | undefined;

  if (contentType === 'application/pdf') {
    const pdfData = await parsePdf(buffer);
    extractedText = pdfData.text;
    pages = pdfData.numpages;
  } else if (contentType === 'text/html') {
    extractedText = stripHtmlTags(buffer.toString('utf-8'));
  } else if (
    contentType === 'application/json' ||
    contentType === 'application/xml' ||
    contentType.startsWith('text/')
  ) {
    extractedText = buffer.toString('utf-8');
  } else {
    return null; // Unsupported type
  }

  const truncated = extractedText.length > maxLength;
  if (truncated) {
    extractedText = extractedText.substring(0, maxLength);
  }

  return { text: extractedText, truncated, pages };
}

/**
 * Recursively strip null and undefined values from an object.
 * Preserves 0, empty strings, and false.
 */
export function stripNulls(obj: unknown): unknown {
  if (obj === null || obj === undefined) return undefined;
  if (Array.isArray(obj)) {
    return obj.map(stripNulls).filter(v => v !== undefined);
  }
  if (typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const stripped = stripNulls(value);
      if (stripped !== undefined) {
        result[key] = stripped;
      }
    }
    return result;
  }
  return obj;
}

/**
 * CSV text with a header row. Values containing commas, quotes or newlines are quoted.
 */
export function toCsv(headers: string[], rows: Array<Array<string | number | boolean | null>>): string {
  const escape = (value: string | number | boolean | null): string => {
    const text = value === null ? '' : String(value);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
  };
  return [headers, ...rows].map(row => row.map(escape).join(',')).join('\n') + '\n';
}

/** Maximum file size for text extraction (25 MB) */
export const MAX_FILE_SIZE = 25 * 1024 * 1024;

/** Default max characters for text extraction */
export const DEFAULT_MAX_TEXT_LENGTH = 50000;

/**
 * Run async tasks with a concurrency limit to avoid overwhelming Paatshala.
 * Returns results in the same order as the input tasks.
 */
export async function runWithConcurrency<T>(
  tasks: (() => Promise<T>)[],
  limit: number = 4
): Promise<PromiseSettledResult<T>[]> {
  const results: PromiseSettledResult<T>[] = new Array(tasks.length);
  let nextIndex = 0;

  async function worker() {
    while (nextIndex < tasks.length) {
      const index = nextIndex++;
      try {
        results[index] = { status: 'fulfilled', value: await tasks[index]() };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  }

  const workers = Array.from({ length: Math.min(Math.max(limit, 1), tasks.length) }, () => worker());
  await Promise.all(workers);
  return results;
}
