import pLimit from "p-limit";

import { DEFAULT_CONFIG } from "../constants";
import { repositoryPath, toPullRequest } from "../utils/github-payload";

import { Logger } from "./logger.service";

import type { BranchCatalogService } from "./branch-catalog.service";
import type { ForkCatalogService } from "./fork-catalog.service";
import type { RequestGateway } from "./github-gateway.service";
import type { BranchSyncReport, Fork, ForkSyncReport, PullRequestPayload, SyncRequest } from "../types";

export interface SyncEngineOptions {
  maxConcurrentPullRequests?: number;
  logger?: Logger;
}

export function buildPullRequestPayload(request: SyncRequest): PullRequestPayload {
  return {
    head: `${request.upstream}:${request.branch}`,
    base: request.branch,
    title: `Sync branch ${request.branch}`,
    body: `Syncing branch ${request.branch} from ${request.upstream}.`,
  };
}

/**
 * Opens one pull request per upstream branch on a fork. Branches are
 * independent: a failed creation is reported and the next branch is tried.
 */
export class SyncEngineService {
  private readonly logger: Logger;
  private readonly maxConcurrent: number;

  constructor(
    private readonly gateway: RequestGateway,
    private readonly forkCatalog: ForkCatalogService,
    private readonly branchCatalog: BranchCatalogService,
    options: SyncEngineOptions = {},
  ) {
    this.logger = options.logger ?? Logger.createDefault();
    this.maxConcurrent = options.maxConcurrentPullRequests ?? DEFAULT_CONFIG.MAX_CONCURRENT_PULL_REQUESTS;
  }

  async syncOne(fork: Fork, upstream: string): Promise<ForkSyncReport> {
    const branchResult = await this.branchCatalog.listBranches(upstream);
    if (!branchResult.ok) {
      this.logger.error(`Could not list branches of ${upstream}:`, branchResult.error);
      return { fork: fork.fullName, upstream, outcome: "failed", branches: [], reason: branchResult.error.message };
    }

    const branches = branchResult.items;
    if (branches.length === 0) {
      this.logger.warn(`No branches found in original repo: ${upstream}`);
      return { fork: fork.fullName, upstream, outcome: "skipped", branches: [], reason: "no branches" };
    }

    const limit = pLimit(this.maxConcurrent);
    const completed: Array<BranchSyncReport | undefined> = new Array(branches.length);
    const reports: BranchSyncReport[] = [];

    // Reports are emitted in branch order even when creations overlap.
    const flush = (): void => {
      while (reports.length < completed.length) {
        const next = completed[reports.length];
        if (!next) return;
        this.reportBranch(fork, next);
        reports.push(next);
      }
    };

    await Promise.all(
      branches.map((branch, index) =>
        limit(async () => {
          completed[index] = await this.createPullRequest({ fork, upstream, branch: branch.name });
          flush();
        }),
      ),
    );

    return { fork: fork.fullName, upstream, outcome: "synced", branches: reports };
  }

  async syncAll(): Promise<ForkSyncReport[]> {
    const forkResult = await this.forkCatalog.listForks();
    if (!forkResult.ok) {
      this.logger.error("Could not list forks:", forkResult.error);
      return [];
    }

    const reports: ForkSyncReport[] = [];
    for (const fork of forkResult.items) {
      const upstream = fork.parentFullName;
      if (upstream) {
        this.logger.info(`Syncing branches from ${upstream} to ${fork.fullName}...`);
        reports.push(await this.syncOne(fork, upstream));
      } else {
        this.logger.warn(`Original repository not found for ${fork.fullName}`);
        reports.push({ fork: fork.fullName, outcome: "skipped", branches: [], reason: "no upstream" });
      }
    }
    return reports;
  }

  private async createPullRequest(request: SyncRequest): Promise<BranchSyncReport> {
    const url = repositoryPath(request.fork.fullName, "pulls");
    if (!url) {
      return {
        branch: request.branch,
        status: "failed",
        reason: `invalid fork name '${request.fork.fullName}'`,
      };
    }

    const result = await this.gateway.call("POST", url, buildPullRequestPayload(request));
    if (!result.ok) {
      return { branch: request.branch, status: "failed", reason: result.error.message };
    }

    const pullRequest = toPullRequest(result.data);
    return { branch: request.branch, status: "created", pullRequestUrl: pullRequest.url };
  }

  private reportBranch(fork: Fork, report: BranchSyncReport): void {
    if (report.status === "created") {
      this.logger.success(`Created PR for branch ${report.branch} in ${fork.fullName}`);
      if (report.pullRequestUrl) {
        this.logger.debug(`  ${report.pullRequestUrl}`);
      }
    } else {
      this.logger.error(`Failed to create PR for branch ${report.branch}:`, report.reason);
    }
  }
}
