import type { StorageConfig } from "../config";
import type { IIndexStore } from "../interfaces";
import { FileIndexStore } from "./file-store";
import { PostgresIndexStore } from "./postgres";

export { FileIndexStore } from "./file-store";
export { PostgresIndexStore, type PostgresIndexStoreConfig } from "./postgres";

export function createIndexStore(config: StorageConfig): IIndexStore {
  switch (config.driver) {
    case "file":
      return new FileIndexStore(config.indexDir);
    case "postgres":
      return new PostgresIndexStore({
        connectionString: config.connectionString,
        indexName: config.indexName,
      });
  }
}
