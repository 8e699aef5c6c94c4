import { z } from "zod";
import { logEvent } from "./logger";

export const DEFAULT_QUERY_INSTRUCTIONS =
  "You're assigned a task to determine whether a bug bounty program exists for the given input. " +
  "Use the file_search tool on the provided vector store to verify. " +
  "Respond strictly in a single JSON object only, with no explanations or extra text. " +
  "Fields required: 'Found' (Yes/No), 'Source', 'Rewards' (Yes/No), 'Program Url'.";

export type PollSettings = {
  intervalMs: number;
  timeoutMs: number;
  backoffFactor: number;
  maxIntervalMs: number;
};

export type AppConfig = {
  openaiBaseUrl: string;
  defaultModel: string;
  requestTimeoutMs: number;
  polling: PollSettings;
  maxUploadMb: number;
  queryInstructions: string;
};

type EnvSource = Record<string, string | boolean | undefined>;

const positiveInt = z.coerce.number().int().positive();

const fields = {
  openaiBaseUrl: {
    key: "VITE_OPENAI_BASE_URL",
    schema: z.string().url().transform((value) => value.replace(/\/+$/, "")),
    fallback: "https://api.openai.com/v1",
  },
  defaultModel: { key: "VITE_DEFAULT_MODEL", schema: z.string().trim().min(1), fallback: "gpt-4.1-mini" },
  requestTimeoutMs: { key: "VITE_REQUEST_TIMEOUT_MS", schema: positiveInt, fallback: 60_000 },
  intervalMs: { key: "VITE_INDEXING_POLL_INTERVAL_MS", schema: positiveInt, fallback: 1_000 },
  timeoutMs: { key: "VITE_INDEXING_TIMEOUT_MS", schema: positiveInt, fallback: 90_000 },
  backoffFactor: { key: "VITE_INDEXING_BACKOFF_FACTOR", schema: z.coerce.number().min(1).max(10), fallback: 1 },
  maxIntervalMs: { key: "VITE_INDEXING_MAX_INTERVAL_MS", schema: positiveInt, fallback: 5_000 },
  maxUploadMb: { key: "VITE_MAX_UPLOAD_MB", schema: z.coerce.number().positive(), fallback: 25 },
  queryInstructions: {
    key: "VITE_QUERY_INSTRUCTIONS",
    schema: z.string().trim().min(1),
    fallback: DEFAULT_QUERY_INSTRUCTIONS,
  },
};

type EnvField<S extends z.ZodTypeAny> = { key: string; schema: S; fallback: z.output<S> };

const read = <S extends z.ZodTypeAny>(env: EnvSource, field: EnvField<S>): z.output<S> => {
  const raw = env[field.key];
  if (raw === undefined || raw === "") return field.fallback;
  const parsed = field.schema.safeParse(raw);
  if (parsed.success) return parsed.data;
  logEvent("warn", "config_invalid", { reason: field.key });
  return field.fallback;
};

export const getAppConfig = (env: EnvSource = import.meta.env): AppConfig => {
  const intervalMs = read(env, fields.intervalMs);
  return {
    openaiBaseUrl: read(env, fields.openaiBaseUrl),
    defaultModel: read(env, fields.defaultModel),
    requestTimeoutMs: read(env, fields.requestTimeoutMs),
    polling: {
      intervalMs,
      timeoutMs: read(env, fields.timeoutMs),
      backoffFactor: read(env, fields.backoffFactor),
      maxIntervalMs: Math.max(intervalMs, read(env, fields.maxIntervalMs)),
    },
    maxUploadMb: read(env, fields.maxUploadMb),
    queryInstructions: read(env, fields.queryInstructions),
  };
};
