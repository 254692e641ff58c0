import type { Branch, Fork, PullRequest } from "../types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() !== "" ? value : undefined;
}

/**
 * Maps one entry of `GET /user/repos` to a Fork. Entries without a
 * `full_name`, or explicitly flagged `fork: false`, yield undefined.
 */
export function toFork(value: unknown): Fork | undefined {
  if (!isRecord(value)) return undefined;

  const fullName = nonEmptyString(value.full_name);
  if (!fullName || value.fork === false) return undefined;

  const parentFullName = isRecord(value.parent) ? nonEmptyString(value.parent.full_name) : undefined;
  return parentFullName ? { fullName, parentFullName } : { fullName };
}

export function toBranch(value: unknown): Branch | undefined {
  if (!isRecord(value)) return undefined;

  const name = nonEmptyString(value.name);
  return name ? { name } : undefined;
}

export function toPullRequest(value: unknown): PullRequest {
  if (!isRecord(value)) return {};

  return {
    url: nonEmptyString(value.html_url),
  };
}

/**
 * Applies `mapper` to every element of a JSON array, keeping the defined
 * results. Returns undefined when `value` is not an array.
 */
export function mapArray<T>(value: unknown, mapper: (item: unknown) => T | undefined): T[] | undefined {
  if (!Array.isArray(value)) return undefined;

  const items: T[] = [];
  for (const entry of value) {
    const mapped = mapper(entry);
    if (mapped !== undefined) {
      items.push(mapped);
    }
  }
  return items;
}

export function splitFullName(fullName: string): { owner: string; repo: string } | undefined {
  const [owner, repo, ...rest] = fullName.split("/");
  if (!owner || !repo || rest.length > 0) return undefined;
  return { owner, repo };
}

export function repositoryPath(fullName: string, suffix: string): string | undefined {
  const parts = splitFullName(fullName);
  if (!parts) return undefined;
  return `/repos/${encodeURIComponent(parts.owner)}/${encodeURIComponent(parts.repo)}/${suffix}`;
}
