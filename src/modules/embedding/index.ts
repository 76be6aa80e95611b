export { OpenAIEmbedder, type OpenAIEmbedderOptions } from "./openai-embedder";
export {
  assertSameDimensions,
  cosineSimilarity,
  embedAll,
  type EmbedAllOptions,
} from "./vectors";
