import { RemoteError, ValidationError } from "../errors";
import { logEvent } from "../logger";
import type { Logger } from "../logger";
import type { Citation, QueryResult } from "../types";
import { MISSING_CREDENTIAL_MESSAGE } from "./openaiClient";
import type { OpenAIClient } from "./openaiClient";
import { ResponseSchema } from "./schemas";
import type { ResponseObject } from "./schemas";

export type QueryInput = {
  client: OpenAIClient | null;
  text: string;
  storeId: string | null;
  model: string;
  instructions: string;
  logger?: Logger;
};

export const extractAnswer = (response: ResponseObject): Pick<QueryResult, "text" | "citations"> => {
  let text = "";
  const citations: Citation[] = [];
  const seen = new Set<string>();

  for (const item of response.output ?? []) {
    if (item.type !== "message") continue;
    for (const part of item.content ?? []) {
      if (part.type !== "output_text") continue;
      text += part.text ?? "";
      for (const ann of part.annotations ?? []) {
        if (ann.type !== "file_citation" || !ann.file_id || seen.has(ann.file_id)) continue;
        seen.add(ann.file_id);
        citations.push({ fileId: ann.file_id, filename: ann.filename || null });
      }
    }
  }

  return { text, citations };
};

export const dispatchQuery = async ({
  client,
  text,
  storeId,
  model,
  instructions,
  logger = logEvent,
}: QueryInput): Promise<QueryResult> => {
  const input = text.trim();
  if (!input) {
    throw new ValidationError("Please provide some input (domain, email, org name, etc.).", "empty_query");
  }
  if (!storeId) {
    throw new ValidationError(
      "No active vector store set. Create one or pick one in the Knowledge Base section.",
      "no_active_store",
    );
  }
  if (!client) {
    throw new ValidationError(MISSING_CREDENTIAL_MESSAGE, "missing_credential");
  }

  const response = await client.request(ResponseSchema, "/responses", {
    method: "POST",
    json: {
      model,
      instructions,
      input,
      tools: [{ type: "file_search", vector_store_ids: [storeId] }],
    },
  });

  if (response.status === "failed") {
    throw new RemoteError({
      message: response.error?.message ?? "The model run failed",
      code: response.error?.code ?? "response_failed",
      retryable: false,
    });
  }

  const answer = extractAnswer(response);
  logger("info", "query_answered", { storeId, count: answer.citations.length });
  return { responseId: response.id, ...answer };
};
