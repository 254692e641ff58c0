import { GITHUB_CONSTANTS } from "../constants";
import { GatewayError, InvalidRepositoryNameError } from "../errors";
import { mapArray, repositoryPath, toBranch } from "../utils/github-payload";

import type { RequestGateway } from "./github-gateway.service";
import type { Branch, CatalogResult } from "../types";

export class BranchCatalogService {
  constructor(private readonly gateway: RequestGateway) {}

  async listBranches(repoFullName: string): Promise<CatalogResult<Branch>> {
    const basePath = repositoryPath(repoFullName.trim(), "branches");
    if (!basePath) {
      return { ok: false, error: new InvalidRepositoryNameError(repoFullName) };
    }

    const url = `${basePath}?per_page=${GITHUB_CONSTANTS.PER_PAGE}`;
    const result = await this.gateway.call("GET", url);
    if (!result.ok) {
      return { ok: false, error: result.error };
    }

    const branches = mapArray(result.data, toBranch);
    if (!branches) {
      return { ok: false, error: new GatewayError("GET", url, "expected a JSON array of branches") };
    }
    return { ok: true, items: branches };
  }
}
