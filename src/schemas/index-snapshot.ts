import { z } from "zod";

export const Bm25ParamsSchema = z.object({
  k1: z.number(),
  b: z.number(),
});

export const IndexManifestSchema = z.object({
  version: z.literal(1),
  modelId: z.string(),
  dimensions: z.number().int().nonnegative(),
  chunking: z.object({
    chunkSize: z.number().int().positive(),
    chunkOverlap: z.number().int().nonnegative(),
    pageSeparator: z.string(),
  }),
  bm25: Bm25ParamsSchema,
  sources: z.array(z.string()),
  chunkCount: z.number().int().nonnegative(),
  createdAt: z.string(),
});

export const StoredChunkSchema = z.object({
  id: z.string(),
  text: z.string(),
  source: z.string(),
  page: z.number().int().positive(),
  offset: z.number().int().nonnegative(),
  index: z.number().int().nonnegative(),
});

export const DenseEntrySchema = z.object({
  chunkId: z.string(),
  vector: z.array(z.number()),
  text: z.string(),
  source: z.string(),
  page: z.number().int().positive(),
  offset: z.number().int().nonnegative(),
});

export const SparseIndexDataSchema = z.object({
  params: Bm25ParamsSchema,
  lengths: z.record(z.string(), z.number().int().nonnegative()),
  offsets: z.record(z.string(), z.number().int().nonnegative()),
  postings: z.record(
    z.string(),
    z.array(
      z.object({
        chunkId: z.string(),
        tf: z.number().int().positive(),
      }),
    ),
  ),
});

/** pgvector's text form, `[0.1,0.2,...]`, or an already parsed array. */
export const VectorColumnSchema = z
  .union([z.string(), z.array(z.number())])
  .transform((value, ctx) => {
    if (Array.isArray(value)) return value;

    let json: unknown;
    try {
      json = JSON.parse(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "not a vector" });
      return z.NEVER;
    }

    const parsed = z.array(z.number()).safeParse(json);
    if (!parsed.success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "not a vector" });
      return z.NEVER;
    }
    return parsed.data;
  });
