export interface Session {
  accessCredential: string;
  crossSiteToken: string;
  // Upstream web-session cookie the CSRF token is bound to; empty when none was set
  cookie: string;
  obtainedAt: number; // Unix ms
  expiresAt: number; // Unix ms
  provider: string;
}

export type SessionStatus = 'unauthenticated' | 'authenticating' | 'authenticated' | 'stale';

export type DashboardReference = string;

export interface RlsRule {
  clause: string;
  dataset?: number;
}

export interface GuestTokenRequest {
  dashboardReference: DashboardReference;
  requestingUser?: string;
  // Absent means "use the configured default rule set"; [] is sent as-is
  rlsRules?: RlsRule[];
}

export interface GuestTokenResult {
  token: string;
  canonicalId: string;
}

export interface ServiceCredentials {
  username: string;
  password: string;
  provider: string;
}

export interface CsrfMaterial {
  crossSiteToken: string;
  cookie: string;
}

// Body of the upstream guest-token call
export interface GuestTokenPayload {
  resources: Array<{ type: 'dashboard'; id: string }>;
  user: { username: string };
  rls: RlsRule[];
}
