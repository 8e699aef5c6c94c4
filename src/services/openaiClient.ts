import type { z } from "zod";
import { RemoteError, ValidationError } from "../errors";
import { logEvent } from "../logger";
import type { Logger } from "../logger";
import type { SecretValue } from "../session/secret";
import { ApiErrorBodySchema } from "./schemas";

type QueryValue = string | number | undefined;

export type RequestOptions = {
  method?: "GET" | "POST" | "DELETE";
  json?: unknown;
  form?: FormData;
  query?: Record<string, QueryValue>;
  /** Shortens the client's request timeout for this call; never lengthens it. */
  timeoutMs?: number;
};

export type OpenAIClient = {
  request: <S extends z.ZodTypeAny>(schema: S, path: string, options?: RequestOptions) => Promise<z.output<S>>;
};

export type OpenAIClientOptions = {
  credential: SecretValue;
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
};

export const MISSING_CREDENTIAL_MESSAGE = "Set your OpenAI API key in Settings first.";

const buildUrl = (baseUrl: string, path: string, query?: Record<string, QueryValue>) => {
  const params = new URLSearchParams();
  Object.entries(query ?? {}).forEach(([key, value]) => {
    if (value !== undefined) params.set(key, String(value));
  });
  const qs = params.toString();
  return `${baseUrl}${path}${qs ? `?${qs}` : ""}`;
};

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

const toRemoteError = async (res: Response) => {
  const text = await res.text().catch(() => "");
  const body = ApiErrorBodySchema.safeParse(parseJson(text));
  if (body.success) {
    return new RemoteError({
      message: body.data.error.message,
      code: body.data.error.code || body.data.error.type || "http_error",
      status: res.status,
    });
  }
  return new RemoteError({ message: text || res.statusText || "Request failed", code: "http_error", status: res.status });
};

export const createOpenAIClient = ({
  credential,
  baseUrl,
  timeoutMs,
  fetchImpl,
  logger = logEvent,
}: OpenAIClientOptions): OpenAIClient => {
  if (credential.isEmpty) {
    throw new ValidationError(MISSING_CREDENTIAL_MESSAGE, "missing_credential");
  }
  const doFetch: typeof fetch = fetchImpl ?? ((input, init) => globalThis.fetch(input, init));

  const request = async <S extends z.ZodTypeAny>(
    schema: S,
    path: string,
    options: RequestOptions = {},
  ): Promise<z.output<S>> => {
    const apiKey = credential.reveal();
    if (!apiKey) {
      throw new ValidationError(MISSING_CREDENTIAL_MESSAGE, "missing_credential");
    }
    const method = options.method ?? "GET";
    const headers: Record<string, string> = { Authorization: `Bearer ${apiKey}` };
    let body: BodyInit | undefined;
    if (options.form) {
      body = options.form;
    } else if (options.json !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(options.json);
    }

    const limitMs = Math.min(options.timeoutMs ?? timeoutMs, timeoutMs);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), limitMs);
    const startedAt = Date.now();
    let res: Response;
    try {
      res = await doFetch(buildUrl(baseUrl, path, options.query), {
        method,
        headers,
        body,
        signal: controller.signal,
      });
    } catch (err) {
      const aborted = err instanceof Error && err.name === "AbortError";
      logger("warn", "openai_request_failed", {
        method,
        path,
        reason: aborted ? "timeout" : "network",
        durationMs: Date.now() - startedAt,
      });
      throw new RemoteError({
        message: aborted
          ? `Request timed out after ${Math.round(limitMs / 1000)}s`
          : "Network request to OpenAI failed",
        code: aborted ? "request_timeout" : "network_error",
        status: null,
      });
    } finally {
      clearTimeout(timeoutId);
    }

    logger(res.ok ? "info" : "warn", "openai_request", {
      method,
      path,
      httpStatus: res.status,
      durationMs: Date.now() - startedAt,
    });

    if (!res.ok) {
      throw await toRemoteError(res);
    }

    const payload = parseJson(await res.text());
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new RemoteError({
        message: `Unexpected response from ${method} ${path}`,
        code: "invalid_response",
        status: res.status,
        retryable: false,
      });
    }
    return parsed.data;
  };

  return { request };
};
