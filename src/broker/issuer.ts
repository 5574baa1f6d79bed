import { setTimeout as sleep } from 'node:timers/promises';
import { SessionExpiredError, UpstreamAuthError, UpstreamUnavailable } from '../shared/errors';
import { Logger, createLogger } from '../shared/logger';
import { GuestTokenPayload, RlsRule, Session } from '../shared/types';
import { SessionAuthenticator } from './authenticator';
import { AnalyticsClient } from './upstream/client';

export interface GuestTokenIssuerOptions {
  client: AnalyticsClient;
  authenticator: SessionAuthenticator;
  retryBackoffMs: number;
  logger?: Logger;
}

export function buildGuestTokenPayload(
  canonicalId: string,
  requestingUser: string,
  rlsRules: readonly RlsRule[]
): GuestTokenPayload {
  return {
    resources: [{ type: 'dashboard', id: canonicalId }],
    user: { username: requestingUser },
    rls: rlsRules.map(rule => ({ ...rule })),
  };
}

/**
 * Exchanges a resolved dashboard id for a guest token.
 *
 * Retry budget per call: one re-authentication when upstream blames the
 * session, and one backoff retry when upstream is unreachable. Anything
 * else is surfaced on the first failure.
 */
export class GuestTokenIssuer {
  private readonly client: AnalyticsClient;
  private readonly authenticator: SessionAuthenticator;
  private readonly retryBackoffMs: number;
  private readonly log: Logger;

  constructor(options: GuestTokenIssuerOptions) {
    this.client = options.client;
    this.authenticator = options.authenticator;
    this.retryBackoffMs = options.retryBackoffMs;
    this.log = options.logger ?? createLogger('Issuer');
  }

  async issueToken(
    session: Session,
    canonicalId: string,
    requestingUser: string,
    rlsRules: readonly RlsRule[],
    signal?: AbortSignal
  ): Promise<string> {
    const payload = buildGuestTokenPayload(canonicalId, requestingUser, rlsRules);
    let current = session;
    let reauthenticated = false;
    let networkRetried = false;

    while (true) {
      try {
        return await this.client.createGuestToken(current, payload, signal);
      } catch (error) {
        if (error instanceof SessionExpiredError) {
          if (reauthenticated) {
            throw new UpstreamAuthError(
              `Admin session rejected again after re-authentication: ${error.message}`,
              error.upstreamStatus
            );
          }
          reauthenticated = true;
          this.log.info(`Guest token call for ${canonicalId} hit an expired session; re-authenticating once`);
          // Invalidate the session upstream actually rejected, not the one we started with
          current = await this.authenticator.refreshAfterExpiry(current, signal);
          continue;
        }

        if (error instanceof UpstreamUnavailable && !networkRetried) {
          networkRetried = true;
          this.log.warn(`Upstream unavailable (${error.message}); retrying once in ${this.retryBackoffMs}ms`);
          await sleep(this.retryBackoffMs, undefined, { signal });
          // The backoff may have carried the session past its refresh margin
          if (!this.authenticator.isFresh(current)) {
            current = await this.authenticator.ensureSession(signal);
          }
          continue;
        }

        throw error;
      }
    }
  }
}
