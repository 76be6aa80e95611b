import { z } from "zod";
import { MEDICAL_DISCLAIMER } from "../../config";
import { errorMessage } from "../../errors";
import type {
  ILanguageModel,
  IWebSearchAnswer,
  IWebSearchHit,
  IWebSearchProvider,
} from "../../interfaces";
import { createLogger } from "../../utils/logger";
import { withRetry } from "../../utils/retry";
import { truncate } from "../../utils/text";
import { systemMessage, userMessage } from "./llm";
import { WEB_SEARCH_INSTRUCTIONS, webSearchPrompt } from "./prompts";

/** Raised when a search succeeds but returns nothing; worth another try. */
export class NoSearchResultsError extends Error {
  constructor(readonly query: string) {
    super(`No search results for "${query}"`);
    this.name = "NoSearchResultsError";
  }
}

interface RelatedTopic {
  Text?: string;
  FirstURL?: string;
  Topics?: RelatedTopic[];
}

const RelatedTopicSchema: z.ZodType<RelatedTopic> = z.lazy(() =>
  z.object({
    Text: z.string().optional(),
    FirstURL: z.string().optional(),
    Topics: z.array(RelatedTopicSchema).optional(),
  }),
);

export const InstantAnswerSchema = z.object({
  Heading: z.string().optional().default(""),
  AbstractText: z.string().optional().default(""),
  AbstractURL: z.string().optional().default(""),
  AbstractSource: z.string().optional().default(""),
  RelatedTopics: z.array(RelatedTopicSchema).optional().default([]),
});

export type InstantAnswer = z.infer<typeof InstantAnswerSchema>;

function flattenTopics(topics: RelatedTopic[]): RelatedTopic[] {
  return topics.flatMap((t) => (t.Topics ? flattenTopics(t.Topics) : [t]));
}

export function hitsFromInstantAnswer(
  answer: InstantAnswer,
  maxResults: number,
): IWebSearchHit[] {
  const hits: IWebSearchHit[] = [];
  if (answer.AbstractText) {
    hits.push({
      title: answer.Heading || answer.AbstractSource || "Summary",
      url: answer.AbstractURL,
      snippet: answer.AbstractText,
    });
  }
  for (const topic of flattenTopics(answer.RelatedTopics)) {
    if (!topic.Text || !topic.FirstURL) continue;
    const dash = topic.Text.indexOf(" - ");
    hits.push({
      title: truncate(dash > 0 ? topic.Text.slice(0, dash) : topic.Text, 80),
      url: topic.FirstURL,
      snippet: topic.Text,
    });
  }
  return hits.slice(0, maxResults);
}

export interface DuckDuckGoOptions {
  endpoint?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

/** DuckDuckGo Instant Answer API; needs no key. */
export class DuckDuckGoSearchProvider implements IWebSearchProvider {
  readonly name = "duckduckgo";
  private endpoint: string;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;

  constructor(options: DuckDuckGoOptions = {}) {
    this.endpoint = options.endpoint ?? "https://api.duckduckgo.com/";
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async search(query: string, maxResults: number): Promise<IWebSearchHit[]> {
    const url = new URL(this.endpoint);
    url.searchParams.set("q", query);
    url.searchParams.set("format", "json");
    url.searchParams.set("no_html", "1");
    url.searchParams.set("skip_disambig", "1");

    const response = await this.fetchImpl(url, {
      signal: AbortSignal.timeout(this.timeoutMs),
      headers: { Accept: "application/json" },
    });
    if (!response.ok) {
      throw new Error(`Search request failed with HTTP ${response.status}`);
    }

    const parsed = InstantAnswerSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected search response: ${parsed.error.message}`);
    }
    return hitsFromInstantAnswer(parsed.data, maxResults);
  }
}

export interface WebSearchAgentOptions {
  provider: IWebSearchProvider;
  llm: ILanguageModel;
  maxResults?: number;
  retries?: number;
  retryBaseDelayMs?: number;
}

const log = createLogger("web-search");

export function withDisclaimer(answer: string): string {
  return answer.includes(MEDICAL_DISCLAIMER.trim())
    ? answer
    : `${answer}\n\n${MEDICAL_DISCLAIMER}`;
}

function formatHits(hits: IWebSearchHit[]): string {
  return hits
    .map((hit, i) => `${i + 1}. ${hit.title}\n${hit.url}\n${hit.snippet}`)
    .join("\n\n");
}

/**
 * Searches the web and has the language model write an answer from the hits.
 * Failures come back as `success: false` instead of being thrown.
 */
export class WebSearchAgent {
  private provider: IWebSearchProvider;
  private llm: ILanguageModel;
  private maxResults: number;
  private retries: number;
  private retryBaseDelayMs: number;

  constructor(options: WebSearchAgentOptions) {
    this.provider = options.provider;
    this.llm = options.llm;
    this.maxResults = options.maxResults ?? 5;
    this.retries = options.retries ?? 2;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
  }

  async search(query: string): Promise<IWebSearchHit[]> {
    return withRetry(
      async () => {
        const hits = await this.provider.search(query, this.maxResults);
        if (hits.length === 0) throw new NoSearchResultsError(query);
        return hits;
      },
      {
        retries: this.retries,
        baseDelayMs: this.retryBaseDelayMs,
        shouldRetry: (error) => error instanceof NoSearchResultsError,
        onRetry: (_error, attempt, delayMs) =>
          log.info(`No results for "${query}", retry ${attempt} in ${delayMs}ms`),
      },
    );
  }

  async answer(question: string): Promise<IWebSearchAnswer> {
    let hits: IWebSearchHit[];
    try {
      hits = await this.search(question);
    } catch (error) {
      if (error instanceof NoSearchResultsError) {
        return {
          answer: withDisclaimer(
            "I couldn't find relevant information online for your question. Please consult your healthcare provider.",
          ),
          sources: [],
          success: false,
        };
      }
      log.error(`Search failed for "${question}": ${errorMessage(error)}`);
      return {
        answer: `An error occurred while searching: ${errorMessage(error)}. Please try rephrasing your question or consult a healthcare professional.`,
        sources: [],
        success: false,
      };
    }

    try {
      const answer = await this.llm.complete([
        systemMessage(WEB_SEARCH_INSTRUCTIONS),
        userMessage(webSearchPrompt(question, formatHits(hits))),
      ]);
      return { answer: withDisclaimer(answer), sources: hits, success: true };
    } catch (error) {
      log.error(`Answer synthesis failed: ${errorMessage(error)}`);
      return {
        answer: `An error occurred while summarizing search results: ${errorMessage(error)}. Please consult a healthcare professional.`,
        sources: hits,
        success: false,
      };
    }
  }
}
