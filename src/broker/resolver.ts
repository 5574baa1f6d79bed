import { SessionExpiredError, UpstreamAuthError, ValidationError } from '../shared/errors';
import { Logger, createLogger } from '../shared/logger';
import { DashboardReference } from '../shared/types';
import { SessionAuthenticator } from './authenticator';
import { SingleFlight } from './singleFlight';
import { ResolutionCache } from './store/resolutionCache';
import { AnalyticsClient } from './upstream/client';

const NUMERIC_ID = /^\d+$/;
// UUID-shaped, whatever the version nibble
const CANONICAL_ID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export type ParsedReference =
  | { kind: 'canonical'; canonicalId: string }
  | { kind: 'numeric'; numericId: string };

/**
 * Classify a dashboard reference without touching upstream.
 * Absolute URLs contribute their last non-empty path segment.
 */
export function parseDashboardReference(ref: DashboardReference): ParsedReference {
  let candidate = ref.trim();

  if (/^https?:\/\//i.test(candidate)) {
    try {
      const segments = new URL(candidate).pathname.split('/').filter(Boolean);
      candidate = segments.length > 0 ? decodeURIComponent(segments[segments.length - 1]) : '';
    } catch {
      throw new ValidationError('unrecognized dashboard reference');
    }
  }

  if (CANONICAL_ID.test(candidate)) {
    return { kind: 'canonical', canonicalId: candidate };
  }
  if (NUMERIC_ID.test(candidate)) {
    return { kind: 'numeric', numericId: candidate };
  }
  throw new ValidationError('unrecognized dashboard reference');
}

export interface DashboardResolverOptions {
  client: AnalyticsClient;
  authenticator: SessionAuthenticator;
  cache: ResolutionCache;
  logger?: Logger;
}

export class DashboardResolver {
  private readonly lookups = new SingleFlight<string>();
  private readonly client: AnalyticsClient;
  private readonly authenticator: SessionAuthenticator;
  private readonly cache: ResolutionCache;
  private readonly log: Logger;

  constructor(options: DashboardResolverOptions) {
    this.client = options.client;
    this.authenticator = options.authenticator;
    this.cache = options.cache;
    this.log = options.logger ?? createLogger('Resolver');
  }

  async resolve(ref: DashboardReference, signal?: AbortSignal): Promise<string> {
    const parsed = parseDashboardReference(ref);
    if (parsed.kind === 'canonical') {
      return parsed.canonicalId;
    }

    const cached = await this.cache.get(parsed.numericId);
    if (cached) {
      this.log.debug(`Cache hit for dashboard ${parsed.numericId}`);
      return cached;
    }

    return this.lookups.run(parsed.numericId, () => this.lookup(parsed.numericId), signal);
  }

  private async lookup(numericId: string): Promise<string> {
    let session = await this.authenticator.ensureSession();
    let canonicalId: string;

    try {
      canonicalId = await this.client.lookupDashboard(session, numericId);
    } catch (error) {
      if (!(error instanceof SessionExpiredError)) throw error;

      session = await this.authenticator.refreshAfterExpiry(session);
      try {
        canonicalId = await this.client.lookupDashboard(session, numericId);
      } catch (retryError) {
        if (retryError instanceof SessionExpiredError) {
          throw new UpstreamAuthError(
            `Admin session rejected again after re-authentication: ${retryError.message}`,
            retryError.upstreamStatus
          );
        }
        throw retryError;
      }
    }

    await this.cache.set(numericId, canonicalId);
    this.log.info(`Resolved dashboard ${numericId} -> ${canonicalId}`);
    return canonicalId;
  }
}
