export { ClinicalAgent, type ClinicalAgentOptions, knowledgeSources } from "./clinical";
export {
  OpenAIChatModel,
  type ChatModelOptions,
  systemMessage,
  userMessage,
} from "./llm";
export {
  ReceptionistAgent,
  type ReceptionistAgentOptions,
  isMedicalQuery,
  parseExtractedName,
} from "./receptionist";
export { AgentRouter, type AgentRouterOptions, type RouterStatus, wantsReception } from "./router";
export {
  DuckDuckGoSearchProvider,
  InstantAnswerSchema,
  NoSearchResultsError,
  WebSearchAgent,
  type WebSearchAgentOptions,
  hitsFromInstantAnswer,
  withDisclaimer,
} from "./web-search";
