import * as jose from 'jose';
import { nowMs } from '../shared/clock';
import { Logger, createLogger } from '../shared/logger';
import { ServiceCredentials, Session, SessionStatus } from '../shared/types';
import { SingleFlight } from './singleFlight';
import { AnalyticsClient } from './upstream/client';

type AuthState =
  | { status: 'unauthenticated' }
  | { status: 'authenticating' }
  | { status: 'authenticated'; session: Session }
  | { status: 'stale'; session: Session };

export interface SessionAuthenticatorOptions {
  client: AnalyticsClient;
  credentials: ServiceCredentials;
  // Lifetime assumed when the access credential carries no readable exp claim
  sessionTtlMs: number;
  sessionRefreshMarginMs: number;
  logger?: Logger;
}

const SESSION_KEY = 'admin-session';

/**
 * Owns the one admin session of the process.
 *
 * unauthenticated -> authenticating -> authenticated -> stale -> authenticating ...
 *
 * Every refresh goes through a single-flight handle, so a burst of callers
 * that all find the session missing or stale produces exactly one login.
 */
export class SessionAuthenticator {
  private state: AuthState = { status: 'unauthenticated' };
  private readonly flight = new SingleFlight<Session>();
  private readonly client: AnalyticsClient;
  private readonly credentials: ServiceCredentials;
  private readonly sessionTtlMs: number;
  private readonly refreshMarginMs: number;
  private readonly log: Logger;

  constructor(options: SessionAuthenticatorOptions) {
    this.client = options.client;
    this.credentials = options.credentials;
    this.sessionTtlMs = options.sessionTtlMs;
    this.refreshMarginMs = options.sessionRefreshMarginMs;
    this.log = options.logger ?? createLogger('Authenticator');
  }

  status(): SessionStatus {
    return this.state.status;
  }

  async ensureSession(signal?: AbortSignal): Promise<Session> {
    const current = this.freshSession();
    if (current) return current;

    return this.flight.run(SESSION_KEY, () => this.authenticate(), signal);
  }

  /**
   * Marks `session` stale after an upstream call blamed it. A request still
   * holding an older session must not knock out the one that replaced it.
   */
  invalidate(session: Session): boolean {
    if (this.state.status !== 'authenticated' || this.state.session !== session) {
      return false;
    }
    this.log.info('Upstream reported the admin session expired; marking stale');
    this.state = { status: 'stale', session };
    return true;
  }

  async refreshAfterExpiry(expired: Session, signal?: AbortSignal): Promise<Session> {
    this.invalidate(expired);
    return this.ensureSession(signal);
  }

  private freshSession(): Session | null {
    if (this.state.status !== 'authenticated') return null;

    const { session } = this.state;
    if (this.isFresh(session)) return session;

    this.log.info('Admin session is within its refresh margin; marking stale');
    this.state = { status: 'stale', session };
    return null;
  }

  isFresh(session: Session): boolean {
    const lifetime = session.expiresAt - session.obtainedAt;
    // A margin larger than the lifetime would force a login on every call
    const margin = Math.min(this.refreshMarginMs, lifetime / 2);
    return nowMs() < session.expiresAt - margin;
  }

  private async authenticate(): Promise<Session> {
    this.state = { status: 'authenticating' };
    this.log.info(
      `Logging in as '${this.credentials.username}' via provider '${this.credentials.provider}'`
    );

    try {
      const accessCredential = await this.client.login(this.credentials);
      const csrf = await this.client.fetchCsrfToken(accessCredential);
      const obtainedAt = nowMs();

      const session: Session = {
        accessCredential,
        crossSiteToken: csrf.crossSiteToken,
        cookie: csrf.cookie,
        obtainedAt,
        expiresAt: this.expiryOf(accessCredential, obtainedAt),
        provider: this.credentials.provider,
      };

      this.state = { status: 'authenticated', session };
      this.log.info(`Admin session established, valid until ${new Date(session.expiresAt).toISOString()}`);
      return session;
    } catch (error) {
      this.state = { status: 'unauthenticated' };
      this.log.error(`Admin login failed: ${error instanceof Error ? error.message : String(error)}`);
      throw error;
    }
  }

  private expiryOf(accessCredential: string, obtainedAt: number): number {
    try {
      const { exp } = jose.decodeJwt(accessCredential);
      if (typeof exp === 'number' && exp * 1000 > obtainedAt) {
        return exp * 1000;
      }
    } catch {
      // Not a JWT; fall through to the configured lifetime
    }
    return obtainedAt + this.sessionTtlMs;
  }
}
