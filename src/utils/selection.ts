import { InvalidSelectionError } from "../errors";

/**
 * Converts a 1-based menu answer into a 0-based index.
 * @throws InvalidSelectionError when the answer is not an integer in [1, count]
 */
export function parseSelection(answer: string, count: number): number {
  const trimmed = answer.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidSelectionError(answer, count);
  }

  const selected = Number.parseInt(trimmed, 10);
  if (selected < 1 || selected > count) {
    throw new InvalidSelectionError(answer, count);
  }

  return selected - 1;
}
