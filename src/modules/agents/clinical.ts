import type { RetrievalMethod } from "../../config";
import { errorMessage, isRetrievalError } from "../../errors";
import type {
  IClinicalAnswer,
  IKnowledgeBase,
  IKnowledgeSource,
  ILanguageModel,
  RetrievalResult,
} from "../../interfaces";
import type { IPatientRecord } from "../../schemas/patient";
import { createLogger } from "../../utils/logger";
import { patientContext } from "../patients";
import { systemMessage, userMessage } from "./llm";
import {
  CLINICAL_INSTRUCTIONS,
  knowledgeBasePrompt,
  personalizationPrompt,
} from "./prompts";
import { type WebSearchAgent, withDisclaimer } from "./web-search";

export interface ClinicalAgentOptions {
  knowledgeBase: IKnowledgeBase;
  llm: ILanguageModel;
  webSearch: WebSearchAgent;
  topK?: number;
  method?: RetrievalMethod;
  threshold?: number;
}

const log = createLogger("clinical-agent");

const UNAVAILABLE_FROM_WEB =
  "The reference knowledge base is currently unavailable, so this answer comes from a web search.";
const UNAVAILABLE_NO_WEB =
  "The reference knowledge base is currently unavailable, and a web search could not answer your question either.";

export function knowledgeSources(
  results: readonly RetrievalResult[],
): IKnowledgeSource[] {
  return results.map((r, i) => ({
    index: i + 1,
    chunkId: r.chunkId,
    source: r.source,
    page: r.page,
    relevance: r.fusedScore,
    method: r.method,
  }));
}

/**
 * Answers medical questions from the knowledge base when retrieval clears the
 * gate, and from a web search otherwise.
 */
export class ClinicalAgent {
  private knowledgeBase: IKnowledgeBase;
  private llm: ILanguageModel;
  private webSearch: WebSearchAgent;
  private topK?: number;
  private method?: RetrievalMethod;
  private threshold?: number;

  constructor(options: ClinicalAgentOptions) {
    this.knowledgeBase = options.knowledgeBase;
    this.llm = options.llm;
    this.webSearch = options.webSearch;
    this.topK = options.topK;
    this.method = options.method;
    this.threshold = options.threshold;
  }

  async answer(query: string, patient?: IPatientRecord): Promise<IClinicalAnswer> {
    let results: RetrievalResult[];
    try {
      results = await this.knowledgeBase.retrieve(query, this.topK, this.method);
    } catch (error) {
      if (!isRetrievalError(error)) throw error;
      log.error(`Knowledge base unavailable (${error.code}): ${error.message}`);
      return this.fromWeb(query, patient, "knowledge_base_unavailable", error.message);
    }

    if (this.knowledgeBase.isSufficient(results, this.threshold)) {
      return this.fromKnowledgeBase(query, results, patient);
    }

    log.info(`Retrieval below threshold for "${query}", falling back to web search`);
    return this.fromWeb(query, patient);
  }

  private async fromKnowledgeBase(
    query: string,
    results: RetrievalResult[],
    patient?: IPatientRecord,
  ): Promise<IClinicalAnswer> {
    const context = this.knowledgeBase.selectContext(results);
    const patientInfo = patient ? patientContext(patient) : "None provided";

    try {
      const answer = await this.llm.complete([
        systemMessage(CLINICAL_INSTRUCTIONS),
        userMessage(knowledgeBasePrompt(query, context, patientInfo)),
      ]);
      return {
        answer: withDisclaimer(answer),
        sourceType: "knowledge_base",
        knowledgeSources: knowledgeSources(results),
        webSources: [],
        success: true,
      };
    } catch (error) {
      log.error(`Answer synthesis failed: ${errorMessage(error)}`);
      return {
        answer:
          "I apologize, I encountered an error processing your question. Please try rephrasing or consult with your healthcare provider.",
        sourceType: "error",
        knowledgeSources: knowledgeSources(results),
        webSources: [],
        success: false,
        error: errorMessage(error),
      };
    }
  }

  /**
   * Web answer, personalised when a patient is known. With
   * `knowledge_base_unavailable` the answer, or the failure message, is
   * prefixed with a notice so the user can tell it apart from a plain miss.
   */
  private async fromWeb(
    query: string,
    patient?: IPatientRecord,
    reason?: "knowledge_base_unavailable",
    detail?: string,
  ): Promise<IClinicalAnswer> {
    const web = await this.webSearch.answer(query);

    if (!web.success) {
      return {
        answer: reason ? `${UNAVAILABLE_NO_WEB}\n\n${web.answer}` : web.answer,
        sourceType: reason ?? "web_search_failed",
        knowledgeSources: [],
        webSources: web.sources,
        success: false,
        error: detail,
      };
    }

    let answer = web.answer;
    if (patient) {
      try {
        answer = withDisclaimer(
          await this.llm.complete([
            userMessage(
              personalizationPrompt(query, answer, patientContext(patient)),
            ),
          ]),
        );
      } catch (error) {
        log.warn(`Personalisation failed, keeping web answer: ${errorMessage(error)}`);
      }
    }

    if (reason) {
      answer = `${UNAVAILABLE_FROM_WEB}\n\n${answer}`;
    }

    return {
      answer,
      sourceType: reason ?? "web_search",
      knowledgeSources: [],
      webSources: web.sources,
      success: true,
      error: detail,
    };
  }
}
