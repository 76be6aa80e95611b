import stopwordList from "../../../data/stopwords.json";

export const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

const TOKEN_SPLIT = /[^\p{L}\p{N}]+/u;

/**
 * Lower-cases, splits on anything that is not a Unicode letter or digit and
 * drops stopwords. Used for both indexing and querying; duplicates are kept.
 */
export function tokenize(
  text: string,
  stopwords: ReadonlySet<string> = STOPWORDS,
): string[] {
  return text
    .toLowerCase()
    .split(TOKEN_SPLIT)
    .filter((token) => token.length > 0 && !stopwords.has(token));
}
