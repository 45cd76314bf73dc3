/**
 * Shapes owned by the auth module. They document what flows through the
 * gateway; bodies are passed on without being checked against them.
 */
export interface UserRecord {
  email: string;
  email_verified: boolean;
  two_factor_enabled: boolean;
  metadata: Record<string, unknown>;
  created_at: string;
  updated_at: string;
}

export interface DashboardStats {
  total_users: number;
  verified_users: number;
  unverified_users: number;
  two_factor_enabled: number;
}

/** Reply relayed to the client: the auth module's status, content type and raw body. */
export interface GatewayReply {
  status: number;
  body?: string;
  contentType?: string;
}
