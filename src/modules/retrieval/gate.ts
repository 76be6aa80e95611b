import { DEFAULT_RETRIEVAL_CONFIG } from "../../config";
import type { RetrievalResult } from "../../interfaces";

export const CONTEXT_SEPARATOR = "\n\n---\n\n";

/**
 * Whether retrieval found enough to answer from the knowledge base. Looks
 * only at the top result; an empty list is never sufficient.
 */
export function isSufficient(
  results: readonly RetrievalResult[],
  threshold: number = DEFAULT_RETRIEVAL_CONFIG.threshold,
): boolean {
  const top = results[0];
  return top !== undefined && top.fusedScore >= threshold;
}

export function formatResult(result: RetrievalResult, position: number): string {
  return `[Source ${position} - Page ${result.page}, Relevance: ${result.fusedScore.toFixed(2)}, Method: ${result.method}]\n${result.text}`;
}

/** Renders up to `k` results, in order, as one prompt context string. */
export function selectContext(
  results: readonly RetrievalResult[],
  k: number = results.length,
): string {
  return results
    .slice(0, Math.max(0, k))
    .map((result, i) => formatResult(result, i + 1))
    .join(CONTEXT_SEPARATOR);
}
