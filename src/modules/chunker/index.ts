export {
  Chunker,
  DEFAULT_CHUNKER_CONFIG,
  chunkDocument,
  chunkId,
  concatenatePages,
} from "./chunker";
export { FixedSizeStrategy, pageForOffset } from "./strategies";
