import { describe, it, expect, vi, afterEach } from 'vitest';
import { PaatshalaClient, encodeForm } from '../src/paatshala-client.js';
import { BASE_URL, makeClient, reply, routeFetch } from './helpers.js';

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

// ==================== URLs ====================

describe('PaatshalaClient URLs', () => {
  it('resolves site-relative paths against the base URL', () => {
    const client = new PaatshalaClient({ baseUrl: `${BASE_URL}/`, sessionCookie: 'test-cookie' });
    expect(client.resolve('/course/view.php?id=7')).toBe(`${BASE_URL}/course/view.php?id=7`);
    expect(client.resolve('my/')).toBe(`${BASE_URL}/my/`);
  });

  it('forks a client bound to the same session', () => {
    const client = makeClient();
    const worker = client.fork();
    expect(worker).not.toBe(client);
    expect(worker.token).toBe('test-cookie');
    expect(worker.base).toBe(BASE_URL);
  });

  it('blocks requests to other hosts without calling fetch', async () => {
    const fetchMock = routeFetch([]);
    vi.stubGlobal('fetch', fetchMock);
    const result = await makeClient().getHtml('https://elsewhere.example.test/steal');
    expect(result.ok).toBe(false);
    expect(result.ok ? null : result.error.kind).toBe('rejected');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

// ==================== Requests ====================

describe('request', () => {
  it('sends the session cookie and returns the final URL', async () => {
    const fetchMock = routeFetch([
      ['/my/', () => reply({ body: '<html>dash</html>', url: `${BASE_URL}/my/index.php` })],
    ]);
    vi.stubGlobal('fetch', fetchMock);

    const result = await makeClient().getHtml('/my/');
    expect(result).toEqual({ ok: true, value: { status: 200, url: `${BASE_URL}/my/index.php`, html: '<html>dash</html>' } });

    const init = fetchMock.mock.calls[0][1];
    expect(init?.headers).toEqual({ 'Cookie': 'MoodleSession=test-cookie', 'User-Agent': 'Mozilla/5.0' });
  });

  it('reports non-2xx responses as http errors with the status', async () => {
    vi.stubGlobal('fetch', routeFetch([['/course/', () => reply({ status: 503 })]]));
    const result = await makeClient().getHtml('/course/view.php?id=1');
    expect(result.ok ? null : result.error).toEqual({ kind: 'http', message: expect.stringContaining('503'), status: 503 });
  });

  it('retries network failures with backoff when asked', async () => {
    const fetchMock = vi.fn()
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockImplementation(async () => reply({ body: 'ok' }));
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'error').mockImplementation(() => {});

    const result = await makeClient().getHtml('/course/view.php?id=1', { retryNetwork: true });
    expect(result.ok).toBe(true);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('gives up after three attempts in total', async () => {
    const fetchMock = vi.fn().mockRejectedValue(new TypeError('fetch failed'));
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'error').mockImplementation(() => {});

    const result = await makeClient().getHtml('/course/view.php?id=1', { retryNetwork: true });
    expect(result.ok ? null : result.error.kind).toBe('network');
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('does not retry by default', async () => {
    const fetchMock = vi.fn().mockRejectedValue(new TypeError('fetch failed'));
    vi.stubGlobal('fetch', fetchMock);

    const result = await makeClient().getHtml('/course/view.php?id=1');
    expect(result.ok).toBe(false);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('does not retry HTTP errors', async () => {
    const fetchMock = routeFetch([['/course/', () => reply({ status: 500 })]]);
    vi.stubGlobal('fetch', fetchMock);

    await makeClient().getHtml('/course/view.php?id=1', { retryNetwork: true });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

// ==================== Sanitizing ====================

describe('sanitize', () => {
  it('redacts the session token and sesskeys', () => {
    expect(makeClient().sanitize('token test-cookie and sesskey=abc123')).toBe('token [REDACTED] and sesskey=[REDACTED]');
  });

  it('truncates long text', () => {
    const text = makeClient().sanitize('x'.repeat(400));
    expect(text).toBe('x'.repeat(300) + '... (truncated)');
  });
});

describe('encodeForm', () => {
  it('keeps repeated fields in order', () => {
    expect(encodeForm([['a', '1'], ['a', '2'], ['b', 'x y']])).toBe('a=1&a=2&b=x+y');
  });
});

// ==================== AJAX ====================

describe('callAjax', () => {
  function ajaxWith(body: unknown) {
    const fetchMock = routeFetch([['/lib/ajax/service.php', () => reply({ body: JSON.stringify(body) })]]);
    vi.stubGlobal('fetch', fetchMock);
    return fetchMock;
  }

  it('returns the data of a successful call', async () => {
    const fetchMock = ajaxWith([{ error: false, data: { courses: [] } }]);
    const result = await makeClient().callAjax('key1', 'core_course_get_recent_courses', { limit: 0 });

    expect(result).toEqual({ ok: true, value: { courses: [] } });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(`${BASE_URL}/lib/ajax/service.php?sesskey=key1&info=core_course_get_recent_courses`);
    expect(init?.body).toBe(JSON.stringify([{ index: 0, methodname: 'core_course_get_recent_courses', args: { limit: 0 } }]));
  });

  it('reports an error envelope as rejected with the exception message', async () => {
    ajaxWith([{ error: true, exception: { message: 'Invalid parameter value detected' } }]);
    const result = await makeClient().callAjax('key1', 'core_course_edit_module', {});
    expect(result.ok ? null : result.error).toEqual({
      kind: 'rejected',
      message: 'core_course_edit_module failed: Invalid parameter value detected',
    });
  });

  it('reports an invalid sesskey as an auth error', async () => {
    ajaxWith({ error: 'Your session has most likely timed out', errorcode: 'invalidsesskey' });
    const result = await makeClient().callAjax('stale', 'core_course_edit_module', {});
    expect(result.ok ? null : result.error.kind).toBe('auth');
  });

  it('reports non-JSON bodies as parse errors', async () => {
    vi.stubGlobal('fetch', routeFetch([['/lib/ajax/service.php', () => reply({ body: '<html>login</html>' })]]));
    const result = await makeClient().callAjax('key1', 'core_course_edit_module', {});
    expect(result.ok ? null : result.error.kind).toBe('parse');
  });
});

describe('callCourseRest', () => {
  it('treats a JSON error key as a rejection', async () => {
    vi.stubGlobal('fetch', routeFetch([['/course/rest.php', () => reply({ body: '{"error":"Permission denied"}' })]]));
    const result = await makeClient().callCourseRest({ class: 'section', field: 'move', id: 2, value: 3 });
    expect(result.ok ? null : result.error).toEqual({
      kind: 'rejected',
      message: 'course/rest.php rejected the request: Permission denied',
    });
  });

  it('posts form-encoded fields', async () => {
    const fetchMock = routeFetch([['/course/rest.php', () => reply({ body: '{}' })]]);
    vi.stubGlobal('fetch', fetchMock);
    const result = await makeClient().callCourseRest({ class: 'section', field: 'move', id: 2, value: 3 });

    expect(result).toEqual({ ok: true, value: {} });
    expect(fetchMock.mock.calls[0][1]?.body).toBe('class=section&field=move&id=2&value=3');
  });
});

describe('downloadFile', () => {
  it('rejects files on other hosts', async () => {
    const result = await makeClient().downloadFile('https://elsewhere.example.test/pluginfile.php/1/a.pdf');
    expect(result.ok ? null : result.error.kind).toBe('rejected');
  });
});
