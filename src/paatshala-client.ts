import { z } from 'zod';
import type { FormFields, Result, ScrapeError } from './types/paatshala.js';

export const SESSION_COOKIE_NAME = 'MoodleSession';

interface PaatshalaClientConfig {
  baseUrl: string;
  sessionCookie: string;
  /** Base delay for network retries; doubled on each attempt */
  retryBaseDelayMs?: number;
}

export interface PageResponse {
  status: number;
  /** Final URL after redirects */
  url: string;
  html: string;
}

export interface RequestOptions {
  method?: 'GET' | 'POST';
  body?: string;
  contentType?: string;
  timeoutMs?: number;
  /** Retry on network-level failures (never on HTTP status) */
  retryNetwork?: boolean;
}

/** Envelope returned by /lib/ajax/service.php for a single call */
const ajaxEnvelopeSchema = z.array(
  z.object({
    error: z.union([z.boolean(), z.string()]).optional(),
    data: z.unknown().optional(),
    exception: z.object({ message: z.string().optional(), errorcode: z.string().optional() }).passthrough().optional(),
  }).passthrough(),
);

/** Top-level error object Moodle returns for a bad sesskey or an expired session */
const ajaxFatalSchema = z.object({
  error: z.string(),
  errorcode: z.string().optional(),
}).passthrough();

export function encodeForm(fields: FormFields | Record<string, string | number>): string {
  const params = new URLSearchParams();
  const entries = Array.isArray(fields) ? fields : Object.entries(fields);
  for (const [key, value] of entries) {
    params.append(key, String(value));
  }
  return params.toString();
}

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(kind: ScrapeError['kind'], message: string, status?: number): Result<T> {
  return { ok: false, error: status === undefined ? { kind, message } : { kind, message, status } };
}

export class PaatshalaClient {
  private baseUrl: string;
  private baseOrigin: string;
  private sessionCookie: string;
  private retryBaseDelayMs: number;

  /** Default request timeout in milliseconds (30 seconds) */
  static readonly REQUEST_TIMEOUT_MS = 30_000;
  /** Retries after the first attempt for network failures (1s, 2s, 4s) */
  /** Total attempts for a request sent with `retryNetwork` */
  static readonly MAX_ATTEMPTS = 3;
  static readonly USER_AGENT = 'Mozilla/5.0';

  constructor(config: PaatshalaClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.sessionCookie = config.sessionCookie;
    this.retryBaseDelayMs = config.retryBaseDelayMs ?? 1000;
    try {
      this.baseOrigin = new URL(this.baseUrl).origin;
    } catch {
      this.baseOrigin = this.baseUrl;
    }
  }

  get base(): string {
    return this.baseUrl;
  }

  get token(): string {
    return this.sessionCookie;
  }

  /**
   * New client bound to the same session token. Each concurrent worker gets its own
   * instance so no request state is shared between them.
   */
  fork(): PaatshalaClient {
    return new PaatshalaClient({
      baseUrl: this.baseUrl,
      sessionCookie: this.sessionCookie,
      retryBaseDelayMs: this.retryBaseDelayMs,
    });
  }

  /** Resolve a site-relative path ("/course/view.php?id=1") to an absolute URL */
  resolve(pathOrUrl: string): string {
    if (/^https?:\/\//i.test(pathOrUrl)) return pathOrUrl;
    return `${this.baseUrl}/${pathOrUrl.replace(/^\//, '')}`;
  }

  /**
   * Only follow URLs on the configured Moodle host; the session cookie must never leave it.
   */
  isAllowedUrl(url: string): boolean {
    try {
      return new URL(url).origin === this.baseOrigin;
    } catch {
      return false;
    }
  }

  /**
   * Remove session cookies and sesskeys from text that may end up in error messages.
   */
  sanitize(text: string): string {
    const redacted = text
      .split(this.sessionCookie).join('[REDACTED]')
      .replace(/MoodleSession=[^\s;&"']+/gi, 'MoodleSession=[REDACTED]')
      .replace(/sesskey=[^\s&"']+/gi, 'sesskey=[REDACTED]');
    return redacted.length > 300 ? redacted.substring(0, 300) + '... (truncated)' : redacted;
  }

  private headers(contentType?: string): Record<string, string> {
    return {
      'Cookie': `${SESSION_COOKIE_NAME}=${this.sessionCookie}`,
      'User-Agent': PaatshalaClient.USER_AGENT,
      ...(contentType ? { 'Content-Type': contentType } : {}),
    };
  }

  // ==================== RETRY ====================

  /**
   * Fetch with exponential backoff on network failures only.
   * HTTP status codes are returned as-is; callers decide what a non-200 means.
   */
  private async fetchWithRetry(url: string, init: RequestInit, attempts: number, timeoutMs: number): Promise<Response> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt < attempts; attempt++) {
      try {
        return await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        if (attempt === attempts - 1) break;
        const delayMs = this.retryBaseDelayMs * Math.pow(2, attempt); // 1s, 2s
        console.error(`[Client] Network error: ${this.sanitize(lastError.message)}; retrying in ${delayMs}ms (attempt ${attempt + 1}/${attempts})`);
        await new Promise(resolve => setTimeout(resolve, delayMs));
      }
    }

    throw lastError ?? new Error('Request failed after retries');
  }

  // ==================== REQUESTS ====================

  /**
   * Authenticated request returning the page body. Never throws: network errors,
   * foreign hosts and non-2xx statuses come back as Result errors.
   */
  async request(pathOrUrl: string, options: RequestOptions = {}): Promise<Result<PageResponse>> {
    const url = this.resolve(pathOrUrl);
    if (!this.isAllowedUrl(url)) {
      return fail('rejected', 'Request blocked: URL does not match configured Paatshala instance');
    }

    let response: Response;
    try {
      response = await this.fetchWithRetry(
        url,
        {
          method: options.method ?? 'GET',
          headers: this.headers(options.contentType),
          body: options.body,
          redirect: 'follow',
        },
        options.retryNetwork ? PaatshalaClient.MAX_ATTEMPTS : 1,
        options.timeoutMs ?? PaatshalaClient.REQUEST_TIMEOUT_MS,
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return fail('network', this.sanitize(`Network error for ${url}: ${message}`));
    }

    let html: string;
    try {
      html = await response.text();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return fail('network', this.sanitize(`Could not read response body: ${message}`));
    }

    if (!response.ok) {
      return fail('http', this.sanitize(`Paatshala error: ${response.status} ${response.statusText} for ${url}`), response.status);
    }

    const finalUrl = response.url || url;
    return ok({ status: response.status, url: finalUrl, html });
  }

  async getHtml(pathOrUrl: string, options: Omit<RequestOptions, 'method' | 'body' | 'contentType'> = {}): Promise<Result<PageResponse>> {
    return this.request(pathOrUrl, { ...options, method: 'GET' });
  }

  async postForm(
    pathOrUrl: string,
    fields: FormFields | Record<string, string | number>,
    options: Pick<RequestOptions, 'timeoutMs'> = {},
  ): Promise<Result<PageResponse>> {
    return this.request(pathOrUrl, {
      ...options,
      method: 'POST',
      body: encodeForm(fields),
      contentType: 'application/x-www-form-urlencoded',
    });
  }

  /**
   * Call a Moodle AJAX web service function through /lib/ajax/service.php.
   */
  async callAjax(sesskey: string, methodname: string, args: Record<string, unknown>): Promise<Result<unknown>> {
    const endpoint = `/lib/ajax/service.php?sesskey=${encodeURIComponent(sesskey)}&info=${encodeURIComponent(methodname)}`;
    const page = await this.request(endpoint, {
      method: 'POST',
      body: JSON.stringify([{ index: 0, methodname, args }]),
      contentType: 'application/json',
      timeoutMs: 15_000,
    });
    if (!page.ok) return page;

    let json: unknown;
    try {
      json = JSON.parse(page.value.html);
    } catch {
      return fail('parse', `Non-JSON response from ${methodname}: ${this.sanitize(page.value.html.substring(0, 200))}`);
    }

    const fatal = ajaxFatalSchema.safeParse(json);
    if (fatal.success) {
      const kind = fatal.data.errorcode === 'invalidsesskey' || fatal.data.errorcode === 'servicerequireslogin' ? 'auth' : 'rejected';
      return fail(kind, `${methodname} failed: ${fatal.data.error}`);
    }

    const envelope = ajaxEnvelopeSchema.safeParse(json);
    if (!envelope.success || envelope.data.length === 0) {
      return fail('parse', `Unexpected response shape from ${methodname}`);
    }

    const first = envelope.data[0];
    if (first.error) {
      const reason = first.exception?.message ?? (typeof first.error === 'string' ? first.error : 'unknown error');
      return fail('rejected', `${methodname} failed: ${reason}`);
    }
    return ok(first.data);
  }

  /**
   * POST to /course/rest.php, the legacy endpoint behind drag-and-drop moves.
   * Success is a JSON body without an `error` key.
   */
  async callCourseRest(fields: Record<string, string | number>): Promise<Result<unknown>> {
    const page = await this.postForm('/course/rest.php', fields, { timeoutMs: 15_000 });
    if (!page.ok) return page;

    let json: unknown;
    try {
      json = JSON.parse(page.value.html);
    } catch {
      return fail('parse', `Non-JSON response from course/rest.php: ${this.sanitize(page.value.html.substring(0, 200))}`);
    }

    if (json && typeof json === 'object' && 'error' in json) {
      const error: unknown = json.error;
      return fail('rejected', `course/rest.php rejected the request: ${typeof error === 'string' ? error : JSON.stringify(error)}`);
    }
    return ok(json);
  }

  // ==================== FILES ====================

  async downloadFile(fileUrl: string): Promise<Result<ArrayBuffer>> {
    const url = this.resolve(fileUrl);
    if (!this.isAllowedUrl(url)) {
      return fail('rejected', 'Download URL rejected: host does not match configured Paatshala instance');
    }

    try {
      const response = await fetch(url, {
        headers: this.headers(),
        redirect: 'follow',
        signal: AbortSignal.timeout(60_000), // 60s timeout for file downloads
      });
      if (!response.ok) {
        return fail('http', `File download error: ${response.status} ${response.statusText}`, response.status);
      }
      return ok(await response.arrayBuffer());
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return fail('network', this.sanitize(`File download failed: ${message}`));
    }
  }
}
