import fs from 'fs-extra';
import { z } from 'zod';
import { CredentialError, errorMessage } from './errors.js';
import type { ResilientFetcher } from './fetcher.js';
import type { Logger } from './logger.js';
import type { Cookie, Session } from './types.js';

export const TOKEN_COOKIE = 'access_token';
export const TOKEN_LENGTH = 32;

const USER_AGENT = 'Mozilla/5.0 (X11; Linux x86_64; rv:141.0) Gecko/20100101 Firefox/141.0';
const HTTP_ONLY_PREFIX = '#HttpOnly_';

const profileSchema = z.object({
  result: z
    .object({
      is_prime: z.boolean().optional(),
    })
    .passthrough(),
});

/**
 * Parses a Netscape-format cookies.txt as exported by browser extensions.
 * Malformed lines are ignored.
 */
export const parseNetscapeCookies = (raw: string): Cookie[] => {
  const cookies: Cookie[] = [];
  for (const rawLine of raw.split(/\r?\n/)) {
    let line = rawLine;
    let httpOnly = false;
    if (line.startsWith(HTTP_ONLY_PREFIX)) {
      httpOnly = true;
      line = line.slice(HTTP_ONLY_PREFIX.length);
    } else if (line.trim().length === 0 || line.startsWith('#')) {
      continue;
    }

    // domain, subdomains flag, path, secure, expiry, name, value
    const fields = line.split('\t');
    if (fields.length < 7) {
      continue;
    }
    const [domain, includeSubdomains, cookiePath, secure, expires, name, ...valueParts] = fields;
    cookies.push({
      domain,
      includeSubdomains: includeSubdomains.toUpperCase() === 'TRUE',
      path: cookiePath,
      secure: secure.toUpperCase() === 'TRUE',
      expires: Number.parseInt(expires, 10) || 0,
      name,
      value: valueParts.join('\t'),
      httpOnly,
    });
  }
  return cookies;
};

const matchesHost = (cookie: Cookie, host: string): boolean => {
  const domain = cookie.domain.replace(/^\./, '').toLowerCase();
  return host === domain || host.endsWith(`.${domain}`);
};

/**
 * Builds the read-only session used by every request of the run.
 *
 * @throws {CredentialError} when the token cookie is missing or malformed
 */
export const buildSession = (cookies: readonly Cookie[], baseUrl: string): Session => {
  if (cookies.length === 0) {
    throw new CredentialError('The cookies file contains no cookies.');
  }

  const host = new URL(baseUrl).hostname.toLowerCase();
  const relevant = cookies.filter((cookie) => matchesHost(cookie, host));
  const token = relevant.find((cookie) => cookie.name === TOKEN_COOKIE)?.value;
  if (!token || token.length !== TOKEN_LENGTH) {
    throw new CredentialError(
      `Could not extract the ${TOKEN_COOKIE} token from cookies. The cookies may be out of date.`,
    );
  }

  const origin = new URL(baseUrl).origin;
  const headers: Record<string, string> = {
    'x-auth-token': token,
    'User-Agent': USER_AGENT,
    Accept: 'application/json',
    Origin: origin,
    Referer: `${origin}/`,
    Cookie: relevant.map((cookie) => `${cookie.name}=${cookie.value}`).join('; '),
  };

  return Object.freeze({
    authToken: token,
    headers: Object.freeze(headers),
    cookies: Object.freeze([...relevant]),
  });
};

export const loadCookies = async (cookiesFile: string): Promise<Cookie[]> => {
  if (!(await fs.pathExists(cookiesFile))) {
    throw new CredentialError(`Cookies file not found: ${cookiesFile}`);
  }
  try {
    return parseNetscapeCookies(await fs.readFile(cookiesFile, 'utf-8'));
  } catch (error) {
    throw new CredentialError(`Could not read cookies file ${cookiesFile}: ${errorMessage(error)}`);
  }
};

/**
 * Confirms the account behind the session has an active subscription.
 * The profile is always fetched live, never from the response cache.
 */
export const verifyEntitlement = async (
  fetcher: ResilientFetcher,
  session: Session,
  baseUrl: string,
): Promise<void> => {
  let payload: unknown;
  try {
    payload = await fetcher.fetchJson(`${baseUrl}/api/v2/tiny/profile`, {
      headers: session.headers,
      cache: false,
    });
  } catch (error) {
    throw new CredentialError(`Could not load the account profile: ${errorMessage(error)}`);
  }

  const parsed = profileSchema.safeParse(payload);
  if (!parsed.success) {
    throw new CredentialError('Unexpected profile response; the token may be invalid.');
  }
  if (parsed.data.result.is_prime !== true) {
    throw new CredentialError('The account has no active subscription (is_prime = false).');
  }
};

export interface SessionSource {
  readonly cookiesFile: string;
  readonly baseUrl: string;
}

/**
 * Reads credentials and checks the subscription. Any failure is a
 * CredentialError and must stop the run before downloads are scheduled.
 */
export const createSession = async (
  source: SessionSource,
  fetcher: ResilientFetcher,
  logger: Logger,
): Promise<Session> => {
  const cookies = await loadCookies(source.cookiesFile);
  const session = buildSession(cookies, source.baseUrl);
  await verifyEntitlement(fetcher, session, source.baseUrl);
  logger.info('Token is valid. Subscription is active.');
  return session;
};
