import * as jose from 'jose';
import { v4 as uuidv4 } from 'uuid';
import { BrokerConfig } from '../shared/config';
import {
  CsrfMaterial,
  GuestTokenPayload,
  ServiceCredentials,
  Session,
} from '../shared/types';
import { AnalyticsClient } from '../broker/upstream/client';

const secret = new TextEncoder().encode('test-secret');

export interface AccessTokenOptions {
  sub?: string;
  iat?: number; // Unix seconds
  exp?: number; // Unix seconds
}

// JWT shaped like the upstream's access_token, for exp-driven expiry tests
export async function createAccessToken(options: AccessTokenOptions = {}): Promise<string> {
  const now = Math.floor(Date.now() / 1000);

  return new jose.SignJWT({ fresh: true, type: 'access' })
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject(options.sub ?? '1')
    .setJti(uuidv4())
    .setIssuedAt(options.iat ?? now)
    .setExpirationTime(options.exp ?? now + 900)
    .sign(secret);
}

export function testBrokerConfig(overrides: Partial<BrokerConfig> = {}): BrokerConfig {
  return {
    baseUrl: 'http://superset.test',
    username: 'admin',
    password: 'test-password',
    provider: 'db',
    verifySsl: true,
    defaultRlsRules: [],
    defaultGuestUsername: 'guest_via_api',
    requestTimeoutMs: 2000,
    sessionTtlMs: 15 * 60 * 1000,
    sessionRefreshMarginMs: 60 * 1000,
    retryBackoffMs: 0,
    rlsClauseMaxLength: 4096,
    ...overrides,
  };
}

export interface FakeClient extends AnalyticsClient {
  login: jest.Mock<Promise<string>, [ServiceCredentials]>;
  fetchCsrfToken: jest.Mock<Promise<CsrfMaterial>, [string]>;
  lookupDashboard: jest.Mock<Promise<string>, [Session, string]>;
  createGuestToken: jest.Mock<Promise<string>, [Session, GuestTokenPayload, AbortSignal?]>;
}

/**
 * Scripted AnalyticsClient. Logins hand out access-1, access-2, ...; lookups
 * map id N to uuid-for-N; guest tokens echo the dashboard id.
 */
export function createFakeClient(): FakeClient {
  let logins = 0;

  return {
    login: jest.fn<Promise<string>, [ServiceCredentials]>(async () => {
      logins += 1;
      return `access-${logins}`;
    }),
    fetchCsrfToken: jest.fn<Promise<CsrfMaterial>, [string]>(async (accessCredential) => ({
      crossSiteToken: `csrf-for-${accessCredential}`,
      cookie: 'session=test-cookie',
    })),
    lookupDashboard: jest.fn<Promise<string>, [Session, string]>(
      async (_session, numericId) => `uuid-for-${numericId}`
    ),
    createGuestToken: jest.fn<Promise<string>, [Session, GuestTokenPayload, AbortSignal?]>(
      async (_session, payload) => `guest-token-${payload.resources[0].id}`
    ),
  };
}

// A promise plus its settle functions, for holding an upstream call open
export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
