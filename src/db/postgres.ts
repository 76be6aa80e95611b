import pg from "pg";
import { z } from "zod";
import { IndexNotReadyError } from "../errors";
import type {
  IChunk,
  IDenseVectorEntry,
  IIndexSnapshot,
  IIndexStore,
} from "../interfaces";
import {
  IndexManifestSchema,
  SparseIndexDataSchema,
  VectorColumnSchema,
} from "../schemas/index-snapshot";
import { createLogger } from "../utils/logger";

export interface PostgresIndexStoreConfig {
  connectionString?: string;
  indexName?: string;
  pool?: pg.Pool;
}

const ChunkRowSchema = z.object({
  chunk_id: z.string(),
  chunk_index: z.number().int(),
  content: z.string(),
  source: z.string(),
  page: z.number().int(),
  char_offset: z.number().int(),
  embedding: VectorColumnSchema,
});

const ManifestRowSchema = z.object({
  manifest: IndexManifestSchema,
  sparse: SparseIndexDataSchema,
});

const UNDEFINED_TABLE = "42P01";

const log = createLogger("postgres-store");

/**
 * Stores indexes in pgvector-enabled Postgres. Each index name owns one
 * manifest row and its chunk rows; a save replaces both in one transaction.
 */
export class PostgresIndexStore implements IIndexStore {
  private pool: pg.Pool;
  private indexName: string;
  private schemaReady = false;

  constructor(config: PostgresIndexStoreConfig) {
    this.pool =
      config.pool ??
      new pg.Pool({
        connectionString: config.connectionString,
      });
    this.indexName = config.indexName ?? "default";
  }

  get location(): string {
    return `postgres:${this.indexName}`;
  }

  async connect(): Promise<void> {
    const client = await this.pool.connect();
    client.release();
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
  }

  async init(): Promise<void> {
    if (this.schemaReady) return;

    const client = await this.pool.connect();
    try {
      await client.query("CREATE EXTENSION IF NOT EXISTS vector");

      await client.query(`
        CREATE TABLE IF NOT EXISTS kb_index_manifests (
          index_name TEXT PRIMARY KEY,
          manifest JSONB NOT NULL,
          sparse JSONB NOT NULL,
          updated_at TIMESTAMP WITH TIME ZONE DEFAULT NOW()
        );
      `);

      await client.query(`
        CREATE TABLE IF NOT EXISTS kb_index_chunks (
          index_name TEXT NOT NULL,
          chunk_id TEXT NOT NULL,
          position INTEGER NOT NULL,
          chunk_index INTEGER NOT NULL,
          content TEXT NOT NULL,
          source TEXT NOT NULL,
          page INTEGER NOT NULL,
          char_offset INTEGER NOT NULL,
          embedding VECTOR,
          PRIMARY KEY (index_name, chunk_id)
        );
      `);

      await client.query(`
        CREATE INDEX IF NOT EXISTS kb_index_chunks_position_idx
        ON kb_index_chunks(index_name, position);
      `);
    } finally {
      client.release();
    }
    this.schemaReady = true;
  }

  async exists(): Promise<boolean> {
    try {
      const result = await this.pool.query(
        "SELECT 1 FROM kb_index_manifests WHERE index_name = $1",
        [this.indexName],
      );
      return result.rows.length > 0;
    } catch (error) {
      if (isUndefinedTable(error)) return false;
      throw error;
    }
  }

  async save(snapshot: IIndexSnapshot): Promise<void> {
    await this.init();

    const vectors = new Map(snapshot.dense.map((e) => [e.chunkId, e.vector]));

    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      await client.query("DELETE FROM kb_index_chunks WHERE index_name = $1", [
        this.indexName,
      ]);

      for (const [position, chunk] of snapshot.chunks.entries()) {
        const vector = vectors.get(chunk.id);
        await client.query(
          `INSERT INTO kb_index_chunks
             (index_name, chunk_id, position, chunk_index, content, source, page, char_offset, embedding)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
          [
            this.indexName,
            chunk.id,
            position,
            chunk.index,
            chunk.text,
            chunk.source,
            chunk.page,
            chunk.offset,
            vector ? `[${vector.join(",")}]` : null,
          ],
        );
      }

      await client.query(
        `INSERT INTO kb_index_manifests (index_name, manifest, sparse, updated_at)
         VALUES ($1, $2, $3, NOW())
         ON CONFLICT (index_name)
         DO UPDATE SET manifest = EXCLUDED.manifest, sparse = EXCLUDED.sparse, updated_at = NOW()`,
        [
          this.indexName,
          JSON.stringify(snapshot.manifest),
          JSON.stringify(snapshot.sparse),
        ],
      );

      await client.query("COMMIT");
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }

    log.info(
      `Saved index "${this.indexName}" (${snapshot.chunks.length} chunks)`,
    );
  }

  async load(): Promise<IIndexSnapshot> {
    let manifestRows: unknown[];
    let chunkRows: unknown[];
    try {
      manifestRows = (
        await this.pool.query(
          "SELECT manifest, sparse FROM kb_index_manifests WHERE index_name = $1",
          [this.indexName],
        )
      ).rows;
      chunkRows = (
        await this.pool.query(
          `SELECT chunk_id, chunk_index, content, source, page, char_offset, embedding::text AS embedding
           FROM kb_index_chunks
           WHERE index_name = $1
           ORDER BY position`,
          [this.indexName],
        )
      ).rows;
    } catch (error) {
      if (isUndefinedTable(error)) {
        throw new IndexNotReadyError(`No index tables in ${this.location}`, {
          cause: error,
        });
      }
      throw error;
    }

    if (manifestRows.length === 0) {
      throw new IndexNotReadyError(`No index named "${this.indexName}"`);
    }

    const head = ManifestRowSchema.safeParse(manifestRows[0]);
    if (!head.success) {
      throw new IndexNotReadyError(
        `Manifest for "${this.indexName}" is malformed: ${head.error.message}`,
        { cause: head.error },
      );
    }

    const rows = ChunkRowSchema.array().safeParse(chunkRows);
    if (!rows.success) {
      throw new IndexNotReadyError(
        `Chunk rows for "${this.indexName}" are malformed: ${rows.error.message}`,
        { cause: rows.error },
      );
    }

    const chunks: IChunk[] = [];
    const dense: IDenseVectorEntry[] = [];
    for (const row of rows.data) {
      const chunk = {
        id: row.chunk_id,
        text: row.content,
        source: row.source,
        page: row.page,
        offset: row.char_offset,
        index: row.chunk_index,
      };
      chunks.push(chunk);
      dense.push({
        chunkId: chunk.id,
        vector: row.embedding,
        text: chunk.text,
        source: chunk.source,
        page: chunk.page,
        offset: chunk.offset,
      });
    }

    const { manifest, sparse } = head.data;
    if (chunks.length !== manifest.chunkCount) {
      throw new IndexNotReadyError(
        `Index "${this.indexName}" lists ${manifest.chunkCount} chunks but ${chunks.length} are stored`,
      );
    }

    return { manifest, chunks, dense, sparse };
  }
}

function isUndefinedTable(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === UNDEFINED_TABLE
  );
}
