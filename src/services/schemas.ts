import { z } from "zod";

export const listOf = <T extends z.ZodTypeAny>(item: T) =>
  z.object({
    data: z.array(item),
    has_more: z.boolean().optional().default(false),
    last_id: z.string().nullable().optional(),
  });

export const VectorStoreSchema = z.object({
  id: z.string(),
  name: z.string().nullable().optional(),
  created_at: z.number().nullable().optional(),
  file_counts: z
    .object({
      in_progress: z.number(),
      completed: z.number(),
      failed: z.number(),
      cancelled: z.number().optional().default(0),
      total: z.number(),
    })
    .nullable()
    .optional(),
});

export const VectorStoreFileSchema = z.object({
  id: z.string(),
  status: z.enum(["in_progress", "completed", "failed", "cancelled"]),
  last_error: z
    .object({ code: z.string().optional(), message: z.string() })
    .nullable()
    .optional(),
  usage_bytes: z.number().nullable().optional(),
});

export const FileObjectSchema = z.object({
  id: z.string(),
  filename: z.string().nullable().optional(),
  bytes: z.number().nullable().optional(),
});

export const DeletedSchema = z.object({
  id: z.string(),
  deleted: z.boolean(),
});

const AnnotationSchema = z.object({
  type: z.string(),
  file_id: z.string().optional(),
  filename: z.string().nullable().optional(),
});

const ContentPartSchema = z.object({
  type: z.string(),
  text: z.string().nullable().optional(),
  annotations: z.array(AnnotationSchema).nullable().optional(),
});

const OutputItemSchema = z.object({
  type: z.string(),
  content: z.array(ContentPartSchema).nullable().optional(),
});

export const ResponseSchema = z.object({
  id: z.string(),
  status: z.string().nullable().optional(),
  error: z.object({ code: z.string().nullable().optional(), message: z.string() }).nullable().optional(),
  output: z.array(OutputItemSchema).nullable().optional(),
});

export const ApiErrorBodySchema = z.object({
  error: z.object({
    message: z.string(),
    type: z.string().nullable().optional(),
    code: z.string().nullable().optional(),
  }),
});

export type VectorStore = z.infer<typeof VectorStoreSchema>;
export type VectorStoreFile = z.infer<typeof VectorStoreFileSchema>;
export type ResponseObject = z.infer<typeof ResponseSchema>;
