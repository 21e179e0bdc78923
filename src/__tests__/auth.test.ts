import path from 'node:path';
import fs from 'fs-extra';
import { describe, expect, it } from 'vitest';
import { buildSession, createSession, parseNetscapeCookies, verifyEntitlement } from '../auth.js';
import { ResponseCache } from '../cache.js';
import { CredentialError } from '../errors.js';
import { ResilientFetcher, type Transport } from '../fetcher.js';
import { silentLogger } from '../logger.js';
import type { Cookie } from '../types.js';
import { BASE_URL, TEST_TOKEN, makeTempDir, routeTransport } from './helpers.js';

const COOKIES_TXT = [
  '# Netscape HTTP Cookie File',
  '# comment line',
  '',
  `.catalog.test\tTRUE\t/\tTRUE\t1999999999\taccess_token\t${TEST_TOKEN}`,
  '#HttpOnly_.catalog.test\tTRUE\t/\tTRUE\t0\tsid\tsession-1',
  '.other.test\tTRUE\t/\tFALSE\t0\ttracker\tabc',
  'not\ta\tcookie',
].join('\n');

const cookie = (overrides: Partial<Cookie>): Cookie => ({
  domain: '.catalog.test',
  includeSubdomains: true,
  path: '/',
  secure: true,
  expires: 0,
  name: 'access_token',
  value: TEST_TOKEN,
  httpOnly: false,
  ...overrides,
});

const makeFetcher = (transport: Transport) =>
  new ResilientFetcher({ cache: ResponseCache.inMemory(), logger: silentLogger, transport, retryDelayMs: 0 });

describe('parseNetscapeCookies', () => {
  it('parses cookie lines, including HttpOnly ones', () => {
    const cookies = parseNetscapeCookies(COOKIES_TXT);
    expect(cookies.map((entry) => entry.name)).toEqual(['access_token', 'sid', 'tracker']);
    expect(cookies[0]).toEqual({
      domain: '.catalog.test',
      includeSubdomains: true,
      path: '/',
      secure: true,
      expires: 1999999999,
      name: 'access_token',
      value: TEST_TOKEN,
      httpOnly: false,
    });
    expect(cookies[1].httpOnly).toBe(true);
    expect(cookies[2].secure).toBe(false);
  });
});

describe('buildSession', () => {
  it('extracts the token and builds request headers for the catalog host', () => {
    const session = buildSession(parseNetscapeCookies(COOKIES_TXT), BASE_URL);

    expect(session.authToken).toBe(TEST_TOKEN);
    expect(session.headers['x-auth-token']).toBe(TEST_TOKEN);
    expect(session.headers.Origin).toBe('https://catalog.test');
    expect(session.headers.Referer).toBe('https://catalog.test/');
    expect(session.headers.Cookie).toBe(`access_token=${TEST_TOKEN}; sid=session-1`);
    expect(session.cookies).toHaveLength(2);
    expect(Object.isFrozen(session)).toBe(true);
    expect(Object.isFrozen(session.headers)).toBe(true);
  });

  it('rejects an empty cookie jar', () => {
    expect(() => buildSession([], BASE_URL)).toThrow(CredentialError);
  });

  it('rejects a token of the wrong length', () => {
    expect(() => buildSession([cookie({ value: 'short' })], BASE_URL)).toThrow(CredentialError);
  });

  it('ignores tokens set for other hosts', () => {
    expect(() => buildSession([cookie({ domain: '.other.test' })], BASE_URL)).toThrow(
      'Could not extract the access_token token from cookies',
    );
  });
});

describe('verifyEntitlement', () => {
  const session = buildSession([cookie({})], BASE_URL);

  it('accepts an active subscription', async () => {
    const transport = routeTransport({ '/api/v2/tiny/profile': { result: { is_prime: true } } });
    await expect(verifyEntitlement(makeFetcher(transport), session, BASE_URL)).resolves.toBeUndefined();
    expect(transport).toHaveBeenCalledWith(`${BASE_URL}/api/v2/tiny/profile`, { headers: session.headers });
  });

  it('rejects an account without a subscription', async () => {
    const transport = routeTransport({ '/api/v2/tiny/profile': { result: { is_prime: false } } });
    await expect(verifyEntitlement(makeFetcher(transport), session, BASE_URL)).rejects.toThrow(
      'The account has no active subscription (is_prime = false).',
    );
  });

  it('reports an unreachable profile as a credential problem', async () => {
    const transport = routeTransport({});
    await expect(verifyEntitlement(makeFetcher(transport), session, BASE_URL)).rejects.toBeInstanceOf(CredentialError);
    expect(transport).toHaveBeenCalledTimes(3);
  });
});

describe('createSession', () => {
  it('fails when the cookies file is missing', async () => {
    const dir = await makeTempDir();
    const transport = routeTransport({});
    await expect(
      createSession({ cookiesFile: path.join(dir, 'missing.txt'), baseUrl: BASE_URL }, makeFetcher(transport), silentLogger),
    ).rejects.toThrow(CredentialError);
    expect(transport).not.toHaveBeenCalled();
  });

  it('reads the cookies file and checks the subscription', async () => {
    const dir = await makeTempDir();
    const cookiesFile = path.join(dir, 'cookies.txt');
    await fs.writeFile(cookiesFile, COOKIES_TXT);
    const transport = routeTransport({ '/api/v2/tiny/profile': { result: { is_prime: true } } });

    const session = await createSession({ cookiesFile, baseUrl: BASE_URL }, makeFetcher(transport), silentLogger);

    expect(session.authToken).toBe(TEST_TOKEN);
  });
});
