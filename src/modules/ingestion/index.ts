export {
  DEFAULT_INGESTION_CONFIG,
  IngestionPipeline,
  type IngestionPipelineOptions,
} from "./pipeline";
