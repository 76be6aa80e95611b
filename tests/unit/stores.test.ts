import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { IndexNotReadyError } from "../../src/errors";
import type { IIndexSnapshot } from "../../src/interfaces";
import { FileIndexStore, PostgresIndexStore, createIndexStore } from "../../src/db";
import { KnowledgeBase } from "../../src/KnowledgeBase";
import {
  HashingEmbedder,
  MemoryIndexStore,
  buildSnapshot,
  createFakePool,
  makeDocument,
  pgError,
} from "../mocks";

describe("FileIndexStore", () => {
  let root: string;
  let indexDir: string;
  let snapshot: IIndexSnapshot;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "kb-store-"));
    indexDir = join(root, "index");
    snapshot = await buildSnapshot();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("should report a missing index as not ready", async () => {
    const store = new FileIndexStore(indexDir);
    expect(await store.exists()).toBe(false);
    await expect(store.load()).rejects.toBeInstanceOf(IndexNotReadyError);
  });

  it("should load exactly what was saved", async () => {
    const store = new FileIndexStore(indexDir);
    await store.save(snapshot);

    expect(await store.exists()).toBe(true);
    expect(await store.load()).toEqual(snapshot);
  });

  it("should answer queries the same way after a round-trip", async () => {
    const embedder = new HashingEmbedder();
    const memory = new MemoryIndexStore();
    await memory.save(snapshot);
    const file = new FileIndexStore(indexDir);
    await file.save(snapshot);

    const fresh = await KnowledgeBase.open({ store: memory, embedder });
    const loaded = await KnowledgeBase.open({ store: file, embedder });

    for (const query of ["kidney filtration", "potassium diet", "swelling breath"]) {
      for (const method of ["dense", "sparse", "hybrid"]) {
        expect(await loaded.retrieve(query, 3, method)).toEqual(
          await fresh.retrieve(query, 3, method),
        );
      }
    }
  });

  it("should replace the previous index and leave no staging directories", async () => {
    const store = new FileIndexStore(indexDir);
    await store.save(snapshot);

    const replacement = await buildSnapshot([makeDocument("other.txt", ["Anemia is common in kidney disease."])]);
    await store.save(replacement);

    const loaded = await store.load();
    expect(loaded.manifest.sources).toEqual(["other.txt"]);
    expect(await readdir(root)).toEqual(["index"]);
  });

  it("should finish overlapping saves in the order they were made", async () => {
    const store = new FileIndexStore(indexDir);
    const replacement = await buildSnapshot([makeDocument("other.txt", ["Anemia is common in kidney disease."])]);

    await Promise.all([
      store.save(snapshot),
      store.save(replacement),
      store.save(snapshot),
      store.save(replacement),
    ]);

    expect((await store.load()).manifest.sources).toEqual(["other.txt"]);
    expect(await readdir(root)).toEqual(["index"]);
  });

  it("should keep saving after a failed save", async () => {
    const blocker = join(root, "blocker");
    await writeFile(blocker, "not a directory");
    const store = new FileIndexStore(join(blocker, "index"));

    await expect(store.save(snapshot)).rejects.toThrow();
    await rm(blocker);

    await store.save(snapshot);
    expect(await store.load()).toEqual(snapshot);
  });

  it("should reject a corrupt manifest", async () => {
    const store = new FileIndexStore(indexDir);
    await store.save(snapshot);
    await writeFile(join(indexDir, "manifest.json"), "{ not json");

    await expect(store.load()).rejects.toBeInstanceOf(IndexNotReadyError);
  });

  it("should reject a manifest whose counts do not match the files", async () => {
    const store = new FileIndexStore(indexDir);
    await store.save(snapshot);
    await writeFile(
      join(indexDir, "manifest.json"),
      JSON.stringify({ ...snapshot.manifest, chunkCount: snapshot.manifest.chunkCount + 1 }),
    );

    await expect(store.load()).rejects.toThrow(/inconsistent/);
  });
});

describe("PostgresIndexStore", () => {
  const vectorRows = (snapshot: IIndexSnapshot) =>
    snapshot.chunks.map((chunk, i) => ({
      chunk_id: chunk.id,
      chunk_index: chunk.index,
      content: chunk.text,
      source: chunk.source,
      page: chunk.page,
      char_offset: chunk.offset,
      embedding: `[${snapshot.dense[i].vector.join(",")}]`,
    }));

  describe("save", () => {
    it("should replace the index inside one transaction", async () => {
      const snapshot = await buildSnapshot();
      const fake = createFakePool();
      const store = new PostgresIndexStore({ pool: fake.pool, indexName: "nephrology" });

      await store.save(snapshot);

      const statements = fake.queries.map((q) => q.text.split(/\s+/)[0]);
      const begin = statements.indexOf("BEGIN");
      expect(statements.slice(begin)).toEqual([
        "BEGIN",
        "DELETE",
        ...snapshot.chunks.map(() => "INSERT"),
        "INSERT",
        "COMMIT",
      ]);
      expect(fake.queries[begin + 1].values).toEqual(["nephrology"]);
      expect(fake.released).toBe(2);
    });

    it("should write vectors in pgvector text form", async () => {
      const snapshot = await buildSnapshot();
      const fake = createFakePool();
      await new PostgresIndexStore({ pool: fake.pool }).save(snapshot);

      const insert = fake.queries.find((q) => q.text.startsWith("INSERT INTO kb_index_chunks"));
      expect(insert?.values[0]).toBe("default");
      expect(insert?.values[1]).toBe(snapshot.chunks[0].id);
      expect(insert?.values[8]).toBe(`[${snapshot.dense[0].vector.join(",")}]`);
    });

    it("should create the schema only once", async () => {
      const snapshot = await buildSnapshot();
      const fake = createFakePool();
      const store = new PostgresIndexStore({ pool: fake.pool });

      await store.save(snapshot);
      await store.save(snapshot);

      expect(fake.queries.filter((q) => q.text.startsWith("CREATE EXTENSION"))).toHaveLength(1);
    });

    it("should roll back when a write fails", async () => {
      const snapshot = await buildSnapshot();
      const fake = createFakePool((text) => {
        if (text.startsWith("INSERT INTO kb_index_manifests")) {
          throw new Error("disk full");
        }
        return [];
      });
      const store = new PostgresIndexStore({ pool: fake.pool });

      await expect(store.save(snapshot)).rejects.toThrow("disk full");

      const statements = fake.queries.map((q) => q.text);
      expect(statements).toContain("ROLLBACK");
      expect(statements).not.toContain("COMMIT");
      expect(fake.released).toBe(2);
    });
  });

  describe("load", () => {
    it("should rebuild the snapshot from its rows", async () => {
      const snapshot = await buildSnapshot();
      const fake = createFakePool((text) => {
        if (text.includes("FROM kb_index_manifests")) {
          return [{ manifest: snapshot.manifest, sparse: snapshot.sparse }];
        }
        if (text.includes("FROM kb_index_chunks")) return vectorRows(snapshot);
        return [];
      });

      const loaded = await new PostgresIndexStore({ pool: fake.pool }).load();

      expect(loaded).toEqual(snapshot);
    });

    it("should report missing tables as not ready", async () => {
      const fake = createFakePool(() => {
        throw pgError("42P01", 'relation "kb_index_manifests" does not exist');
      });
      const store = new PostgresIndexStore({ pool: fake.pool });

      await expect(store.load()).rejects.toBeInstanceOf(IndexNotReadyError);
      expect(await store.exists()).toBe(false);
    });

    it("should report an unknown index name as not ready", async () => {
      const fake = createFakePool(() => []);
      const store = new PostgresIndexStore({ pool: fake.pool, indexName: "missing" });

      await expect(store.load()).rejects.toThrow('No index named "missing"');
    });

    it("should rethrow other database errors", async () => {
      const fake = createFakePool(() => {
        throw pgError("57P01", "terminating connection");
      });
      await expect(new PostgresIndexStore({ pool: fake.pool }).load()).rejects.toThrow(
        "terminating connection",
      );
    });
  });

  it("should end the pool on disconnect", async () => {
    const fake = createFakePool();
    await new PostgresIndexStore({ pool: fake.pool }).disconnect();
    expect(fake.ended).toBe(true);
  });
});

describe("createIndexStore", () => {
  it("should pick the store for the configured driver", () => {
    expect(createIndexStore({ driver: "file", indexDir: "./data/index" })).toBeInstanceOf(
      FileIndexStore,
    );
    expect(
      createIndexStore({
        driver: "postgres",
        connectionString: "postgres://localhost:5432/test",
        indexName: "test",
      }).location,
    ).toBe("postgres:test");
  });
});
