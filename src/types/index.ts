import type { GatewayError } from "../errors";

export interface Config {
  username: string;
  token: string;
  apiUrl: string;
  errorLogPath: string;
  /**
   * Upper bound on pull requests created at the same time for one fork.
   * The default of 1 keeps branch processing strictly sequential.
   */
  maxConcurrentPullRequests: number;
  debug?: boolean;
}

export interface Fork {
  fullName: string;
  /** `full_name` of the upstream repository, when the API reports one. */
  parentFullName?: string;
}

export interface Branch {
  name: string;
}

export interface SyncRequest {
  fork: Fork;
  upstream: string;
  branch: string;
}

export interface PullRequestPayload {
  head: string;
  base: string;
  title: string;
  body: string;
}

export interface PullRequest {
  url?: string;
}

export type HttpMethod = "GET" | "POST";

export type GatewayResult<T> = { ok: true; data: T } | { ok: false; error: GatewayError };

/**
 * Outcome of a catalog lookup. Keeps "the API returned nothing" apart from
 * "the request failed".
 */
export type CatalogResult<T> = { ok: true; items: T[] } | { ok: false; error: Error };

export type BranchSyncStatus = "created" | "failed";

export interface BranchSyncReport {
  branch: string;
  status: BranchSyncStatus;
  pullRequestUrl?: string;
  reason?: string;
}

export type ForkSyncOutcome = "synced" | "skipped" | "failed";

export interface ForkSyncReport {
  fork: string;
  upstream?: string;
  outcome: ForkSyncOutcome;
  branches: BranchSyncReport[];
  reason?: string;
}
