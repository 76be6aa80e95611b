export { DenseIndex, DEFAULT_EMBED_OPTIONS } from "./dense-index";
export { CONTEXT_SEPARATOR, formatResult, isSufficient, selectContext } from "./gate";
export { HybridRetriever, type RetrieverOptions } from "./hybrid-retriever";
export { compareRanked, minMaxNormalize, topK } from "./ranking";
export { SparseIndex } from "./sparse-index";
export { STOPWORDS, tokenize } from "./tokenizer";
