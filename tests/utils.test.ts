import { describe, it, expect } from 'vitest';
import {
  stripHtmlTags,
  formatFileSize,
  formatError,
  formatSuccess,
  contentTypeFor,
  extractTextFromFile,
  toCsv,
  runWithConcurrency,
  roundHalfEven,
  MAX_FILE_SIZE,
  DEFAULT_MAX_TEXT_LENGTH,
} from '../src/utils.js';

// ==================== stripHtmlTags ====================

describe('stripHtmlTags', () => {
  it('removes basic HTML tags', () => {
    expect(stripHtmlTags('<p>Hello <b>world</b></p>')).toBe('Hello world');
  });

  it('strips style and script blocks entirely', () => {
    const html = '<style>.foo { color: red; }</style><p>Content</p><script>alert("x")</script>';
    expect(stripHtmlTags(html)).toBe('Content');
  });

  it('decodes entities after removing tags', () => {
    expect(stripHtmlTags('&lt;b&gt; &quot;x&quot; &#39;y&#39;')).toBe('<b> "x" \'y\'');
    expect(stripHtmlTags('hello&nbsp;world')).toBe('hello world');
    expect(stripHtmlTags('&#65;')).toBe('A');
  });

  it('decodes &amp; last so escaped entities stay literal', () => {
    expect(stripHtmlTags('&amp;lt;')).toBe('&lt;');
  });

  it('drops out-of-range numeric entities', () => {
    expect(stripHtmlTags('a&#1114112;b')).toBe('ab');
  });

  it('handles empty string', () => {
    expect(stripHtmlTags('')).toBe('');
  });
});

// ==================== formatFileSize ====================

describe('formatFileSize', () => {
  it('formats bytes, kilobytes and megabytes', () => {
    expect(formatFileSize(500)).toBe('500 B');
    expect(formatFileSize(1536)).toBe('1.5 KB');
    expect(formatFileSize(5 * 1024 * 1024)).toBe('5.0 MB');
  });
});

// ==================== formatError ====================

describe('formatError', () => {
  it('formats Error instances', () => {
    const result = formatError('listing courses', new Error('boom'));
    expect(result.isError).toBe(true);
    expect(result.content[0].text).toBe('Error listing courses: boom');
  });

  it('formats string errors', () => {
    expect(formatError('x', 'plain').content[0].text).toBe('Error x: plain');
  });

  it('adds a hint for expired sessions', () => {
    expect(formatError('listing tasks', 'Not authenticated: no cookie').content[0].text).toBe(
      'Error listing tasks: Not authenticated: no cookie Hint: The Paatshala session has expired. Log in again with paatshala_login.',
    );
  });

  it('adds a hint for forbidden responses', () => {
    expect(formatError('moving topic', new Error('HTTP 403 Forbidden')).content[0].text).toBe(
      'Error moving topic: HTTP 403 Forbidden Hint: Access denied. Editing tools need a teacher or manager role in the course.',
    );
  });

  it('redacts session cookies and sesskeys', () => {
    const text = formatError('loading', new Error('GET /x?sesskey=abc123&id=4 with MoodleSession=test-secret; path=/')).content[0].text;
    expect(text).toBe('Error loading: GET /x?sesskey=[REDACTED]&id=4 with MoodleSession=[REDACTED]; path=/');
  });
});

// ==================== formatSuccess ====================

describe('formatSuccess', () => {
  it('formats objects as pretty JSON without nulls', () => {
    const result = formatSuccess({ a: 1, b: null, c: { d: undefined, e: 0 } });
    expect(result.content[0].text).toBe(JSON.stringify({ a: 1, c: { e: 0 } }, null, 2));
  });

  it('drops nulls from arrays', () => {
    expect(formatSuccess([1, null, 2]).content[0].text).toBe(JSON.stringify([1, 2], null, 2));
  });

  it('does not have isError property', () => {
    expect('isError' in formatSuccess({})).toBe(false);
  });
});

// ==================== files ====================

describe('contentTypeFor', () => {
  it('maps known extensions case-insensitively', () => {
    expect(contentTypeFor('Report.PDF')).toBe('application/pdf');
    expect(contentTypeFor('main.py')).toBe('text/x-python');
  });

  it('falls back to octet-stream', () => {
    expect(contentTypeFor('archive.zip')).toBe('application/octet-stream');
  });
});

describe('extractTextFromFile', () => {
  it('strips HTML files', async () => {
    const result = await extractTextFromFile(Buffer.from('<p>Hi</p>'), 'text/html');
    expect(result).toEqual({ text: 'Hi', truncated: false });
  });

  it('truncates long text', async () => {
    const result = await extractTextFromFile(Buffer.from('abcdef'), 'text/plain', 3);
    expect(result).toEqual({ text: 'abc', truncated: true });
  });

  it('returns null for unsupported types', async () => {
    expect(await extractTextFromFile(Buffer.from('PK'), 'application/zip')).toBeNull();
  });
});

// ==================== toCsv ====================

describe('toCsv', () => {
  it('quotes values with commas and quotes', () => {
    expect(toCsv(['a', 'b'], [['x,y', 'say "hi"'], [null, 3]])).toBe('a,b\n"x,y","say ""hi"""\n,3\n');
  });
});

// ==================== runWithConcurrency ====================

describe('runWithConcurrency', () => {
  it('runs all tasks and returns results in order', async () => {
    const tasks = [
      () => Promise.resolve('a'),
      () => Promise.resolve('b'),
      () => Promise.resolve('c'),
    ];
    const results = await runWithConcurrency(tasks, 2);
    expect(results).toEqual([
      { status: 'fulfilled', value: 'a' },
      { status: 'fulfilled', value: 'b' },
      { status: 'fulfilled', value: 'c' },
    ]);
  });

  it('captures rejected tasks without failing the batch', async () => {
    const tasks = [
      () => Promise.resolve('ok'),
      () => Promise.reject(new Error('fail')),
      () => Promise.resolve('also ok'),
    ];
    const results = await runWithConcurrency(tasks, 2);
    expect(results.map(r => r.status)).toEqual(['fulfilled', 'rejected', 'fulfilled']);
  });

  it('respects concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    const tasks = Array.from({ length: 6 }, () => async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise(resolve => setTimeout(resolve, 5));
      active--;
    });
    await runWithConcurrency(tasks, 2);
    expect(peak).toBe(2);
  });

  it('handles empty task list', async () => {
    expect(await runWithConcurrency([], 4)).toEqual([]);
  });
});

// ==================== roundHalfEven ====================

describe('roundHalfEven', () => {
  it('sends exact halves to the even neighbour', () => {
    expect([0.5, 1.5, 2.5, 3.5, -2.5].map(roundHalfEven)).toEqual([0, 2, 2, 4, -2]);
  });

  it('rounds everything else to the nearest integer', () => {
    expect([2.49, 2.51, 7].map(roundHalfEven)).toEqual([2, 3, 7]);
  });
});

describe('constants', () => {
  it('MAX_FILE_SIZE is 25MB', () => {
    expect(MAX_FILE_SIZE).toBe(25 * 1024 * 1024);
  });

  it('DEFAULT_MAX_TEXT_LENGTH is 50000', () => {
    expect(DEFAULT_MAX_TEXT_LENGTH).toBe(50000);
  });
});
