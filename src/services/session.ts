import { writeCredentialsFile, type PaatshalaConfig } from '../config.js';
import { PaatshalaClient, SESSION_COOKIE_NAME, encodeForm, fail, ok } from '../paatshala-client.js';
import { extractSesskey } from '../parsers/html.js';
import type { Result } from '../types/paatshala.js';

const LOGIN_TIMEOUT_MS = 15_000;

export type AuthSource = 'cookie' | 'credentials' | 'login';

function cookieValue(setCookies: string[], name: string): string | null {
  for (const header of setCookies) {
    const match = header.match(new RegExp(`(?:^|\\s|,)${name}=([^;,\\s]+)`));
    if (match && match[1] !== 'deleted') return match[1];
  }
  return null;
}

function setCookieHeaders(response: Response): string[] {
  const all = response.headers.getSetCookie();
  if (all.length > 0) return all;
  const joined = response.headers.get('set-cookie');
  return joined ? [joined] : [];
}

/**
 * Log in with a username and password and return the MoodleSession token.
 * The login page is fetched first for its `logintoken` and pre-login cookie;
 * the credential POST is sent without following the redirect.
 */
export async function login(baseUrl: string, username: string, password: string): Promise<Result<string>> {
  const loginUrl = `${baseUrl.replace(/\/$/, '')}/login/index.php`;
  const fields: Record<string, string> = { username, password };
  let preLoginCookie: string | null = null;

  try {
    const page = await fetch(loginUrl, {
      headers: { 'User-Agent': PaatshalaClient.USER_AGENT },
      signal: AbortSignal.timeout(LOGIN_TIMEOUT_MS),
    });
    preLoginCookie = cookieValue(setCookieHeaders(page), SESSION_COOKIE_NAME);
    const html = await page.text();
    const token = html.match(/name="logintoken"\s+value="([^"]+)"/);
    if (token) fields.logintoken = token[1];
  } catch (error) {
    console.error('[Session] Could not load login page:', error instanceof Error ? error.message : String(error));
  }

  let response: Response;
  try {
    response = await fetch(loginUrl, {
      method: 'POST',
      headers: {
        'User-Agent': PaatshalaClient.USER_AGENT,
        'Content-Type': 'application/x-www-form-urlencoded',
        ...(preLoginCookie ? { Cookie: `${SESSION_COOKIE_NAME}=${preLoginCookie}` } : {}),
      },
      body: encodeForm(fields),
      redirect: 'manual',
      signal: AbortSignal.timeout(LOGIN_TIMEOUT_MS),
    });
  } catch (error) {
    return fail('network', `Login request failed: ${error instanceof Error ? error.message : String(error)}`);
  }

  const location = response.headers.get('location') ?? '';
  if (!location) {
    return fail('auth', `Login rejected: no redirect after posting credentials (status ${response.status})`);
  }
  if (location.includes('/login/index.php') && !location.includes('testsession=')) {
    return fail('auth', 'Login rejected: invalid username or password');
  }

  const session = cookieValue(setCookieHeaders(response), SESSION_COOKIE_NAME);
  if (!session) {
    return fail('auth', `Login did not return a ${SESSION_COOKIE_NAME} cookie (status ${response.status})`);
  }
  return ok(session);
}

/**
 * True when the token still opens the dashboard without bouncing to the login page.
 */
export async function validateSession(client: PaatshalaClient): Promise<boolean> {
  const page = await client.getHtml('/my/', { timeoutMs: LOGIN_TIMEOUT_MS });
  if (!page.ok) return false;
  return !page.value.url.toLowerCase().includes('login');
}

/**
 * Scrape a fresh sesskey from the course page. Call right before each batch of mutations.
 */
export async function deriveSesskey(client: PaatshalaClient, courseId: string): Promise<string | null> {
  const page = await client.getHtml(`/course/view.php?id=${encodeURIComponent(courseId)}`);
  if (!page.ok) {
    console.error(`[Session] Could not load course ${courseId} for sesskey: ${page.error.message}`);
    return null;
  }
  return extractSesskey(page.value.html);
}

// ==================== SESSION MANAGER ====================

interface SessionManagerOptions {
  /** Passed to every client; tests use 0 */
  retryBaseDelayMs?: number;
}

/**
 * Resolves a working session token from the configured cookie, then stored credentials,
 * and hands out clients bound to it.
 */
export class SessionManager {
  private token: string | null = null;
  private source: AuthSource | null = null;
  private pending: Promise<PaatshalaClient> | null = null;

  constructor(private readonly config: PaatshalaConfig, private readonly options: SessionManagerOptions = {}) {}

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  get authSource(): AuthSource | null {
    return this.source;
  }

  get isAuthenticated(): boolean {
    return this.token !== null;
  }

  private makeClient(token: string): PaatshalaClient {
    return new PaatshalaClient({
      baseUrl: this.config.baseUrl,
      sessionCookie: token,
      retryBaseDelayMs: this.options.retryBaseDelayMs,
    });
  }

  /** Client for the current session, authenticating on first use */
  async getClient(): Promise<PaatshalaClient> {
    if (this.token) return this.makeClient(this.token);
    if (!this.pending) {
      this.pending = this.authenticate().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async authenticate(): Promise<PaatshalaClient> {
    if (this.config.cookie) {
      const client = this.makeClient(this.config.cookie);
      if (await validateSession(client)) {
        this.token = this.config.cookie;
        this.source = 'cookie';
        return client;
      }
      console.error('[Session] Configured cookie is no longer valid');
    }

    if (this.config.username && this.config.password) {
      const result = await login(this.config.baseUrl, this.config.username, this.config.password);
      if (result.ok) {
        this.token = result.value;
        this.source = 'credentials';
        writeCredentialsFile(this.config.configFile, { cookie: result.value });
        return this.makeClient(result.value);
      }
      console.error(`[Session] Login with stored credentials failed: ${result.error.message}`);
    }

    throw new Error(
      'Not authenticated: set PAATSHALA_COOKIE, or PAATSHALA_USERNAME and PAATSHALA_PASSWORD, or use the paatshala_login tool',
    );
  }

  /** Interactive login; optionally saves the credentials alongside the new cookie */
  async loginWith(username: string, password: string, remember = false): Promise<Result<string>> {
    const result = await login(this.config.baseUrl, username, password);
    if (!result.ok) return result;
    this.token = result.value;
    this.source = 'login';
    writeCredentialsFile(
      this.config.configFile,
      remember ? { cookie: result.value, username, password } : { cookie: result.value },
    );
    return result;
  }

  logout(): void {
    this.token = null;
    this.source = null;
  }
}
