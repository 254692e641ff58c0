import { GITHUB_CONSTANTS } from "../constants";
import { GatewayError } from "../errors";
import { mapArray, toFork } from "../utils/github-payload";

import type { RequestGateway } from "./github-gateway.service";
import type { CatalogResult, Fork } from "../types";

export class ForkCatalogService {
  constructor(private readonly gateway: RequestGateway) {}

  /** One call to `GET /user/repos?type=fork`. Forks are returned in API order. */
  async listForks(): Promise<CatalogResult<Fork>> {
    const url = `${GITHUB_CONSTANTS.FORKS_PATH}?type=${GITHUB_CONSTANTS.FORK_TYPE}&per_page=${GITHUB_CONSTANTS.PER_PAGE}`;
    const result = await this.gateway.call("GET", url);
    if (!result.ok) {
      return { ok: false, error: result.error };
    }

    const forks = mapArray(result.data, toFork);
    if (!forks) {
      return { ok: false, error: new GatewayError("GET", url, "expected a JSON array of repositories") };
    }
    return { ok: true, items: forks };
  }
}
