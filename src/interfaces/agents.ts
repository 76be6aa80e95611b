import type { IPatientRecord } from "../schemas/patient";

export interface IChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ICompletionOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface ILanguageModel {
  readonly model: string;
  complete(
    messages: IChatMessage[],
    options?: ICompletionOptions,
  ): Promise<string>;
}

export interface IWebSearchHit {
  title: string;
  url: string;
  snippet: string;
}

export interface IWebSearchProvider {
  readonly name: string;
  search(query: string, maxResults: number): Promise<IWebSearchHit[]>;
}

export interface IWebSearchAnswer {
  answer: string;
  sources: IWebSearchHit[];
  success: boolean;
}

export interface IKnowledgeSource {
  index: number;
  chunkId: string;
  source: string;
  page: number;
  relevance: number;
  method: "dense" | "sparse" | "hybrid";
}

export type ClinicalSourceType =
  | "knowledge_base"
  | "web_search"
  | "web_search_failed"
  | "knowledge_base_unavailable"
  | "error";

export interface IClinicalAnswer {
  answer: string;
  sourceType: ClinicalSourceType;
  knowledgeSources: IKnowledgeSource[];
  webSources: IWebSearchHit[];
  success: boolean;
  error?: string;
}

export interface IPatientMatch {
  patient: IPatientRecord;
  warning?: string;
}

export type AgentName = "receptionist" | "clinical";

export type ReceptionistAction =
  | "greeting"
  | "patient_retrieved"
  | "patient_not_found"
  | "conversation"
  | "route_to_clinical"
  | "error";

export interface IReceptionistReply {
  response: string;
  action: ReceptionistAction;
  patient?: IPatientMatch;
  originalQuery?: string;
  error?: string;
}

export type RouterAction =
  | ReceptionistAction
  | "clinical_response"
  | "return_to_receptionist"
  | "session_inactive";

export interface IRouterReply {
  response: string;
  currentAgent: AgentName | null;
  action: RouterAction;
  clinical?: IClinicalAnswer;
  patient?: IPatientRecord;
}

export interface IInteraction {
  agent: AgentName;
  messageType: "greeting" | "user_input" | "response";
  content: string;
  metadata: Record<string, unknown>;
  timestamp: string;
}
