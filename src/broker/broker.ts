import { BrokerConfig } from '../shared/config';
import { UpstreamUnavailable, ValidationError, isBrokerError } from '../shared/errors';
import { Logger, createLogger } from '../shared/logger';
import { GuestTokenRequest, GuestTokenResult, RlsRule, SessionStatus } from '../shared/types';
import { SessionAuthenticator } from './authenticator';
import { GuestTokenIssuer } from './issuer';
import { DashboardResolver } from './resolver';
import { ResolutionCache, createResolutionCache } from './store/resolutionCache';
import { AnalyticsClient, SupersetClient } from './upstream/client';

export interface GuestTokenBrokerOptions {
  resolver: DashboardResolver;
  authenticator: SessionAuthenticator;
  issuer: GuestTokenIssuer;
  defaultRlsRules: RlsRule[];
  defaultGuestUsername: string;
  rlsClauseMaxLength: number;
  logger?: Logger;
}

export function validateRlsRules(rules: readonly RlsRule[], maxLength: number): void {
  rules.forEach((rule, index) => {
    if (rule.clause.trim().length === 0) {
      throw new ValidationError(`rls[${index}].clause must not be empty`);
    }
    if (rule.clause.length > maxLength) {
      throw new ValidationError(`rls[${index}].clause exceeds ${maxLength} characters`);
    }
  });
}

/**
 * The single externally consumed operation: dashboard reference in, guest
 * token out. Failures leave here as exactly one BrokerError.
 */
export class GuestTokenBroker {
  private readonly resolver: DashboardResolver;
  private readonly authenticator: SessionAuthenticator;
  private readonly issuer: GuestTokenIssuer;
  private readonly defaultRlsRules: RlsRule[];
  private readonly defaultGuestUsername: string;
  private readonly rlsClauseMaxLength: number;
  private readonly log: Logger;

  constructor(options: GuestTokenBrokerOptions) {
    this.resolver = options.resolver;
    this.authenticator = options.authenticator;
    this.issuer = options.issuer;
    this.defaultRlsRules = options.defaultRlsRules;
    this.defaultGuestUsername = options.defaultGuestUsername;
    this.rlsClauseMaxLength = options.rlsClauseMaxLength;
    this.log = options.logger ?? createLogger('Broker');
  }

  async issueGuestToken(request: GuestTokenRequest, signal?: AbortSignal): Promise<GuestTokenResult> {
    const rules = request.rlsRules ?? this.defaultRlsRules;
    const requestingUser = request.requestingUser ?? this.defaultGuestUsername;

    return this.guard(async () => {
      validateRlsRules(rules, this.rlsClauseMaxLength);

      const canonicalId = await this.resolver.resolve(request.dashboardReference, signal);
      const session = await this.authenticator.ensureSession(signal);
      const token = await this.issuer.issueToken(session, canonicalId, requestingUser, rules, signal);

      return { token, canonicalId };
    }, signal);
  }

  async resolveDashboard(ref: string, signal?: AbortSignal): Promise<string> {
    return this.guard(() => this.resolver.resolve(ref, signal), signal);
  }

  sessionStatus(): SessionStatus {
    return this.authenticator.status();
  }

  private async guard<T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (isBrokerError(error) || signal?.aborted) throw error;
      this.log.error('Unexpected failure while talking to upstream:', error);
      throw new UpstreamUnavailable(
        `Unexpected upstream failure: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}

export interface BrokerRuntime {
  broker: GuestTokenBroker;
  cache: ResolutionCache;
  shutdown(): Promise<void>;
}

/**
 * Wires the broker from validated configuration. One call per process: the
 * authenticator it builds owns the process-wide admin session.
 */
export function createBroker(
  brokerConfig: BrokerConfig,
  overrides: { client?: AnalyticsClient; cache?: ResolutionCache; logger?: Logger } = {}
): BrokerRuntime {
  const client = overrides.client ?? new SupersetClient({
    baseUrl: brokerConfig.baseUrl,
    verifySsl: brokerConfig.verifySsl,
    requestTimeoutMs: brokerConfig.requestTimeoutMs,
    logger: overrides.logger,
  });
  const cache = overrides.cache ?? createResolutionCache(brokerConfig.redisUrl, overrides.logger);

  const authenticator = new SessionAuthenticator({
    client,
    credentials: {
      username: brokerConfig.username,
      password: brokerConfig.password,
      provider: brokerConfig.provider,
    },
    sessionTtlMs: brokerConfig.sessionTtlMs,
    sessionRefreshMarginMs: brokerConfig.sessionRefreshMarginMs,
    logger: overrides.logger,
  });

  const resolver = new DashboardResolver({ client, authenticator, cache, logger: overrides.logger });
  const issuer = new GuestTokenIssuer({
    client,
    authenticator,
    retryBackoffMs: brokerConfig.retryBackoffMs,
    logger: overrides.logger,
  });

  const broker = new GuestTokenBroker({
    resolver,
    authenticator,
    issuer,
    defaultRlsRules: brokerConfig.defaultRlsRules,
    defaultGuestUsername: brokerConfig.defaultGuestUsername,
    rlsClauseMaxLength: brokerConfig.rlsClauseMaxLength,
    logger: overrides.logger,
  });

  return {
    broker,
    cache,
    async shutdown() {
      await cache.disconnect();
      if (client instanceof SupersetClient) {
        await client.close();
      }
    },
  };
}
