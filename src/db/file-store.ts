import { mkdir, mkdtemp, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import type { ZodType } from "zod";
import { IndexNotReadyError, errorMessage } from "../errors";
import type { IIndexSnapshot, IIndexStore } from "../interfaces";
import {
  DenseEntrySchema,
  IndexManifestSchema,
  SparseIndexDataSchema,
  StoredChunkSchema,
} from "../schemas/index-snapshot";
import { createLogger } from "../utils/logger";

const FILES = {
  manifest: "manifest.json",
  chunks: "chunks.json",
  dense: "dense.json",
  sparse: "sparse.json",
} as const;

const log = createLogger("file-store");

function isMissing(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  );
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isMissing(error)) return false;
    throw error;
  }
}

/**
 * Keeps one index as JSON files in a directory. A save writes a sibling
 * temporary directory and swaps it in with renames, so readers see either the
 * previous index or the new one.
 */
export class FileIndexStore implements IIndexStore {
  readonly location: string;
  private saving: Promise<void> = Promise.resolve();

  constructor(indexDir: string) {
    this.location = resolve(indexDir);
  }

  async exists(): Promise<boolean> {
    return pathExists(join(this.location, FILES.manifest));
  }

  /** Saves run one at a time; each writes a fresh staging directory and swaps it in. */
  save(snapshot: IIndexSnapshot): Promise<void> {
    const run = this.saving.then(() => this.write(snapshot));
    // a failed save must not block the next one; the caller still sees the failure
    this.saving = run.catch(() => undefined);
    return run;
  }

  private async write(snapshot: IIndexSnapshot): Promise<void> {
    const parent = dirname(this.location);
    const name = basename(this.location);

    await mkdir(parent, { recursive: true });
    const staging = await mkdtemp(join(parent, `.${name}.tmp-`));
    const retired = `${staging}-old`;
    try {
      await writeFile(join(staging, FILES.chunks), JSON.stringify(snapshot.chunks));
      await writeFile(join(staging, FILES.dense), JSON.stringify(snapshot.dense));
      await writeFile(join(staging, FILES.sparse), JSON.stringify(snapshot.sparse));
      await writeFile(
        join(staging, FILES.manifest),
        JSON.stringify(snapshot.manifest, null, 2),
      );

      const hadPrevious = await pathExists(this.location);
      if (hadPrevious) await rename(this.location, retired);
      try {
        await rename(staging, this.location);
      } catch (error) {
        if (hadPrevious) await rename(retired, this.location);
        throw error;
      }
    } catch (error) {
      await rm(staging, { recursive: true, force: true });
      throw error;
    }

    await rm(retired, { recursive: true, force: true });
    log.info(
      `Saved index (${snapshot.manifest.chunkCount} chunks) to ${this.location}`,
    );
  }

  async load(): Promise<IIndexSnapshot> {
    if (!(await this.exists())) {
      throw new IndexNotReadyError(`No index found at ${this.location}`);
    }

    const manifest = await this.readJson(FILES.manifest, IndexManifestSchema);
    const chunks = await this.readJson(FILES.chunks, StoredChunkSchema.array());
    const dense = await this.readJson(FILES.dense, DenseEntrySchema.array());
    const sparse = await this.readJson(FILES.sparse, SparseIndexDataSchema);

    if (chunks.length !== manifest.chunkCount || dense.length !== chunks.length) {
      throw new IndexNotReadyError(
        `Index at ${this.location} is inconsistent: manifest lists ${manifest.chunkCount} chunks, found ${chunks.length} chunks and ${dense.length} vectors`,
      );
    }

    return { manifest, chunks, dense, sparse };
  }

  private async readJson<T>(file: string, schema: ZodType<T>): Promise<T> {
    const path = join(this.location, file);
    let raw: string;
    try {
      raw = await readFile(path, "utf8");
    } catch (error) {
      throw new IndexNotReadyError(
        `Index file ${path} is missing: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new IndexNotReadyError(`Index file ${path} is not valid JSON`, {
        cause: error,
      });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new IndexNotReadyError(
        `Index file ${path} does not match the expected shape: ${parsed.error.message}`,
        { cause: parsed.error },
      );
    }
    return parsed.data;
  }
}
