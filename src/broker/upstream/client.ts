import { Agent, Dispatcher, fetch } from 'undici';
import { z } from 'zod';
import {
  SessionExpiredError,
  UpstreamAuthError,
  UpstreamRejected,
  UpstreamUnavailable,
} from '../../shared/errors';
import { Logger, createLogger } from '../../shared/logger';
import {
  CsrfMaterial,
  GuestTokenPayload,
  ServiceCredentials,
  Session,
} from '../../shared/types';

/**
 * The four upstream endpoints the broker depends on. The broker components
 * only see this interface, so tests can swap in a scripted fake.
 */
export interface AnalyticsClient {
  login(credentials: ServiceCredentials): Promise<string>;
  fetchCsrfToken(accessCredential: string): Promise<CsrfMaterial>;
  lookupDashboard(session: Session, numericId: string): Promise<string>;
  createGuestToken(session: Session, payload: GuestTokenPayload, signal?: AbortSignal): Promise<string>;
}

export interface SupersetClientOptions {
  baseUrl: string;
  verifySsl: boolean;
  requestTimeoutMs: number;
  logger?: Logger;
}

interface UpstreamResponse {
  status: number;
  text: string;
  setCookies: string[];
}

const MAX_DETAIL_LENGTH = 500;

const loginResponseSchema = z.object({ access_token: z.string().min(1) });
const csrfResponseSchema = z.object({ result: z.string().min(1) });
const dashboardResponseSchema = z.object({
  result: z.object({ uuid: z.string().min(1) }),
});
const guestTokenResponseSchema = z.object({ token: z.string().min(1) });

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function detailOf(response: UpstreamResponse): string {
  const text = response.text.trim();
  if (!text) return `status=${response.status}`;
  return text.length > MAX_DETAIL_LENGTH ? `${text.slice(0, MAX_DETAIL_LENGTH)}...` : text;
}

function isServerError(status: number): boolean {
  return status >= 500;
}

/**
 * 401 is an expired or revoked access token. Flask-WTF answers an expired CSRF
 * token (or one whose web session is gone) with a 400 that names it.
 */
export function isSessionExpiry(status: number, body: string): boolean {
  return status === 401 || (status === 400 && /csrf/i.test(body));
}

// "session=abc; Path=/; HttpOnly" -> "session=abc"
function toCookieHeader(setCookies: string[]): string {
  return setCookies
    .map(cookie => cookie.split(';', 1)[0].trim())
    .filter(Boolean)
    .join('; ');
}

function describeNetworkError(error: unknown, timeoutMs: number): string {
  if (error instanceof Error) {
    if (error.name === 'TimeoutError') {
      return `timed out after ${timeoutMs}ms`;
    }
    if (error.cause instanceof Error) {
      return `${error.message}: ${error.cause.message}`;
    }
    return error.message;
  }
  return String(error);
}

export class SupersetClient implements AnalyticsClient {
  private readonly baseUrl: string;
  private readonly dispatcher: Dispatcher;
  private readonly requestTimeoutMs: number;
  private readonly log: Logger;

  constructor(options: SupersetClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.log = options.logger ?? createLogger('Upstream');

    // One agent for every call so the TLS toggle and timeouts apply uniformly
    this.dispatcher = new Agent({
      connect: {
        timeout: options.requestTimeoutMs,
        rejectUnauthorized: options.verifySsl,
      },
      headersTimeout: options.requestTimeoutMs,
      bodyTimeout: options.requestTimeoutMs,
    });
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }

  async login(credentials: ServiceCredentials): Promise<string> {
    const response = await this.send('POST', '/api/v1/security/login', {
      body: {
        username: credentials.username,
        password: credentials.password,
        provider: credentials.provider,
        refresh: false,
      },
    });

    if (response.status !== 200) {
      const message = `Login failed (${response.status}): ${detailOf(response)}`;
      if (isServerError(response.status)) {
        throw new UpstreamUnavailable(message, response.status);
      }
      throw new UpstreamAuthError(message, response.status);
    }

    const parsed = loginResponseSchema.safeParse(parseJson(response.text));
    if (!parsed.success) {
      throw new UpstreamAuthError('Login succeeded but no access_token returned', response.status);
    }
    return parsed.data.access_token;
  }

  async fetchCsrfToken(accessCredential: string): Promise<CsrfMaterial> {
    const response = await this.send('GET', '/api/v1/security/csrf_token/', {
      headers: { Authorization: `Bearer ${accessCredential}` },
    });

    if (response.status !== 200) {
      const message = `Fetching CSRF failed (${response.status}): ${detailOf(response)}`;
      if (isServerError(response.status)) {
        throw new UpstreamUnavailable(message, response.status);
      }
      throw new UpstreamAuthError(message, response.status);
    }

    const parsed = csrfResponseSchema.safeParse(parseJson(response.text));
    if (!parsed.success) {
      throw new UpstreamAuthError("CSRF response missing 'result'", response.status);
    }

    return {
      crossSiteToken: parsed.data.result,
      cookie: toCookieHeader(response.setCookies),
    };
  }

  async lookupDashboard(session: Session, numericId: string): Promise<string> {
    const response = await this.send('GET', `/api/v1/dashboard/${encodeURIComponent(numericId)}`, {
      headers: this.sessionHeaders(session),
    });

    if (response.status !== 200) {
      this.throwForBusinessCall(
        response,
        `Could not resolve dashboard UUID from '${numericId}' (${response.status}): ${detailOf(response)}`
      );
    }

    const parsed = dashboardResponseSchema.safeParse(parseJson(response.text));
    if (!parsed.success) {
      throw new UpstreamRejected(`Dashboard lookup returned no 'uuid' for '${numericId}'`, response.status);
    }
    return parsed.data.result.uuid;
  }

  async createGuestToken(
    session: Session,
    payload: GuestTokenPayload,
    signal?: AbortSignal
  ): Promise<string> {
    const response = await this.send(
      'POST',
      '/api/v1/security/guest_token/',
      {
        headers: {
          ...this.sessionHeaders(session),
          'X-CSRFToken': session.crossSiteToken,
          Referer: this.baseUrl,
        },
        body: payload,
      },
      signal
    );

    if (response.status !== 200) {
      this.throwForBusinessCall(
        response,
        `guest_token request failed (${response.status}): ${detailOf(response)}`
      );
    }

    const parsed = guestTokenResponseSchema.safeParse(parseJson(response.text));
    if (!parsed.success) {
      throw new UpstreamRejected("guest_token response missing 'token'", response.status);
    }
    return parsed.data.token;
  }

  private sessionHeaders(session: Session): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${session.accessCredential}`,
    };
    if (session.cookie) {
      headers.Cookie = session.cookie;
    }
    return headers;
  }

  private throwForBusinessCall(response: UpstreamResponse, message: string): never {
    if (isSessionExpiry(response.status, response.text)) {
      throw new SessionExpiredError(message, response.status);
    }
    if (isServerError(response.status)) {
      throw new UpstreamUnavailable(message, response.status);
    }
    throw new UpstreamRejected(message, response.status);
  }

  private async send(
    method: 'GET' | 'POST',
    path: string,
    init: { headers?: Record<string, string>; body?: unknown },
    signal?: AbortSignal
  ): Promise<UpstreamResponse> {
    const timeout = AbortSignal.timeout(this.requestTimeoutMs);
    const headers: Record<string, string> = { Accept: 'application/json', ...init.headers };
    if (init.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: init.body === undefined ? undefined : JSON.stringify(init.body),
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
        dispatcher: this.dispatcher,
      });

      return {
        status: response.status,
        text: await response.text(),
        setCookies: response.headers.getSetCookie(),
      };
    } catch (error) {
      // The caller walked away; that is not an upstream outage
      if (signal?.aborted) {
        throw signal.reason;
      }
      const reason = describeNetworkError(error, this.requestTimeoutMs);
      this.log.warn(`${method} ${path} failed: ${reason}`);
      throw new UpstreamUnavailable(`${method} ${path} failed: ${reason}`);
    }
  }
}
