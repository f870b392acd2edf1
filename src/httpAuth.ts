/**
 * HTTP-based Portal Authentication Module
 *
 * 1. GET /auth/login → csrf-token meta + session cookies
 * 2. POST /auth/login with {_token, Username, password}
 * 3. Reuse the cookie jar for every later request
 */

import * as cheerio from 'cheerio';
import type { PortalCredentials, ScraperConfig } from './config.js';
import { AuthenticationError, PortalRequestError } from './errors.js';
import { logger } from './logger.js';

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export interface PortalSession {
  baseUrl: string;
  cookies: string;
  csrfToken: string;
  authenticated: boolean;
}

export function portalUrls(baseUrl: string) {
  return {
    LOGIN: `${baseUrl}/auth/login`,
    ENROLLMENT: `${baseUrl}/enrollment/actions`,
    TRANSCRIPT: `${baseUrl}/registrar/transcript/event`,
  };
}

/**
 * Name=value pairs from every Set-Cookie header
 */
export function parseSetCookies(headers: Headers): string {
  return headers
    .getSetCookie()
    .map(cookie => cookie.split(';')[0].trim())
    .filter(c => c.includes('='))
    .join('; ');
}

/**
 * Merge existing cookies with new ones; later values win per cookie name
 */
export function mergeCookies(existing: string, newCookies: string): string {
  const cookieMap = new Map<string, string>();

  for (const cookie of [...existing.split('; '), ...newCookies.split('; ')]) {
    if (!cookie) continue;
    const [name] = cookie.split('=');
    if (name) cookieMap.set(name.trim(), cookie);
  }

  return Array.from(cookieMap.values()).join('; ');
}

export function extractCsrfToken(html: string): string | null {
  const $ = cheerio.load(html);
  const token = $('meta[name="csrf-token"]').attr('content')?.trim();
  return token ? token : null;
}

function absorbCookies(session: PortalSession, response: Response): void {
  session.cookies = mergeCookies(session.cookies, parseSetCookies(response.headers));
}

async function ensureOk(response: Response, url: string): Promise<void> {
  if (response.ok) return;
  // drain body so the connection can be reused
  await response.text();
  throw new PortalRequestError(`HTTP ${response.status} from ${url}`, url, response.status);
}

/**
 * Authenticate with the portal using plain HTTP
 */
export async function login(config: ScraperConfig, credentials: PortalCredentials): Promise<PortalSession> {
  logger.info('Auth', 'Logging in...');
  const urls = portalUrls(config.baseUrl);

  const loginPageRes = await fetch(urls.LOGIN, {
    method: 'GET',
    headers: { 'User-Agent': USER_AGENT, 'Accept': 'text/html,application/xhtml+xml' },
    redirect: 'manual',
  });
  await ensureOk(loginPageRes, urls.LOGIN);

  const session: PortalSession = {
    baseUrl: config.baseUrl,
    cookies: parseSetCookies(loginPageRes.headers),
    csrfToken: '',
    authenticated: false,
  };

  const csrfToken = extractCsrfToken(await loginPageRes.text());
  if (!csrfToken) {
    throw new AuthenticationError('No CSRF token on login page');
  }
  session.csrfToken = csrfToken;
  logger.debug('Auth', `Got CSRF token: ${csrfToken.substring(0, 8)}...`);

  const loginRes = await fetch(urls.LOGIN, {
    method: 'POST',
    headers: {
      'User-Agent': USER_AGENT,
      'Content-Type': 'application/x-www-form-urlencoded',
      'Cookie': session.cookies,
      'Referer': urls.LOGIN,
      'X-CSRF-TOKEN': csrfToken,
    },
    body: new URLSearchParams({
      _token: csrfToken,
      Username: credentials.username,
      password: credentials.password,
    }).toString(),
    redirect: 'manual',
  });
  absorbCookies(session, loginRes);

  // Success is a redirect away from the login page, or a page without the login form
  const location = loginRes.headers.get('location') ?? '';
  const body = await loginRes.text();
  const redirected = loginRes.status >= 300 && loginRes.status < 400;
  session.authenticated = redirected
    ? !location.includes('/auth/login')
    : loginRes.ok && !/name=["']?password["']?/i.test(body);

  if (!session.authenticated) {
    throw new AuthenticationError('Login failed - invalid credentials or session');
  }

  logger.info('Auth', 'Login successful!');
  return session;
}

/**
 * Re-read the login page for a fresh CSRF token (the portal rotates it)
 */
export async function getFreshCsrf(session: PortalSession): Promise<string> {
  const url = portalUrls(session.baseUrl).LOGIN;
  const html = await httpGet(url, session);
  const token = extractCsrfToken(html);
  if (!token) {
    throw new PortalRequestError('No CSRF token in portal response', url);
  }
  session.csrfToken = token;
  return token;
}

export async function httpGet(
  url: string,
  session: PortalSession,
  headers: Record<string, string> = {}
): Promise<string> {
  const response = await fetch(url, {
    method: 'GET',
    headers: {
      'User-Agent': USER_AGENT,
      'Accept': 'text/html,application/xhtml+xml,application/json;q=0.9,*/*;q=0.8',
      'Cookie': session.cookies,
      ...headers,
    },
    redirect: 'follow',
  });
  absorbCookies(session, response);
  await ensureOk(response, url);
  return response.text();
}

/**
 * Make an authenticated POST request (for form submissions)
 */
export async function httpPost(
  url: string,
  session: PortalSession,
  formData: Record<string, string>,
  headers: Record<string, string> = {}
): Promise<string> {
  const response = await fetch(url, {
    method: 'POST',
    headers: {
      'User-Agent': USER_AGENT,
      'Content-Type': 'application/x-www-form-urlencoded',
      'Accept': 'application/json, text/html;q=0.9, */*;q=0.8',
      'Cookie': session.cookies,
      ...headers,
    },
    body: new URLSearchParams(formData).toString(),
    redirect: 'follow',
  });
  absorbCookies(session, response);
  await ensureOk(response, url);
  return response.text();
}

function decodeJson(text: string, url: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new PortalRequestError('Expected JSON from portal (session expired?)', url);
  }
}

export async function httpGetJson(
  url: string,
  session: PortalSession,
  headers: Record<string, string> = {}
): Promise<unknown> {
  return decodeJson(await httpGet(url, session, headers), url);
}

export async function httpPostJson(
  url: string,
  session: PortalSession,
  formData: Record<string, string>,
  headers: Record<string, string> = {}
): Promise<unknown> {
  return decodeJson(await httpPost(url, session, formData, headers), url);
}

/**
 * Headers the portal's XHR endpoints expect
 */
export function ajaxHeaders(csrfToken: string): Record<string, string> {
  return {
    'X-CSRF-TOKEN': csrfToken,
    'X-Requested-With': 'XMLHttpRequest',
  };
}
