import type { AppConfig } from "../config";
import { DEFAULT_QUERY_INSTRUCTIONS } from "../config";

export const TEST_BASE_URL = "https://api.test/v1";
export const TEST_API_KEY = "test-secret";

type FileStatus = "in_progress" | "completed" | "failed" | "cancelled";

type StoredFile = { id: string; filename: string; bytes: number; content: string };
type Attachment = { fileId: string; plan: FileStatus[]; checks: number };
type StoredVectorStore = { id: string; name: string; createdAt: number; attachments: Attachment[] };

export type RecordedCall = {
  method: string;
  path: string;
  query: Record<string, string>;
  body: unknown;
  authorization: string | null;
};

type Failure = {
  method: string;
  path: RegExp;
  status: number;
  message: string;
  code: string;
  times: number;
};

export type FakeOpenAI = {
  fetch: typeof fetch;
  calls: RecordedCall[];
  stores: Map<string, StoredVectorStore>;
  files: Map<string, StoredFile>;
  /** Statuses returned by successive status checks for files with this name; the last one repeats. */
  planStatuses: (filename: string, plan: FileStatus[]) => void;
  failOn: (method: string, path: RegExp, options?: Partial<Omit<Failure, "method" | "path">>) => void;
  seedStore: (name: string) => string;
  seedFile: (storeId: string, filename: string, content: string) => string;
  pageSize: number | null;
  callsTo: (method: string, path: RegExp) => RecordedCall[];
};

const json = (status: number, body: unknown) =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

const errorBody = (status: number, message: string, code: string) =>
  json(status, { error: { message, type: "invalid_request_error", code } });

const toUrl = (input: RequestInfo | URL) => {
  if (typeof input === "string") return new URL(input);
  if (input instanceof URL) return input;
  return new URL(input.url);
};

// Reads through FileReader where the environment provides one, as jsdom does.
const readBlob = (blob: Blob): Promise<string> => {
  if (typeof FileReader === "undefined") return blob.text();
  return new Promise((resolve, reject) => {
    const reader = new FileReader();
    reader.onload = () => resolve(typeof reader.result === "string" ? reader.result : "");
    reader.onerror = () => reject(reader.error);
    reader.readAsText(blob);
  });
};

const statusOf = (attachment: Attachment): FileStatus => {
  const index = Math.min(attachment.checks, attachment.plan.length - 1);
  return attachment.plan[index] ?? "completed";
};

/**
 * In-process stand-in for the OpenAI REST endpoints this app calls. Files are
 * kept in memory and `/responses` answers with the first line of the store's
 * files that contains a word of the query.
 */
export const createFakeOpenAI = (): FakeOpenAI => {
  const calls: RecordedCall[] = [];
  const stores = new Map<string, StoredVectorStore>();
  const files = new Map<string, StoredFile>();
  const plans = new Map<string, FileStatus[]>();
  const failures: Failure[] = [];
  let storeSeq = 0;
  let fileSeq = 0;
  let responseSeq = 0;
  let clock = 1_700_000_000;

  const nextStoreId = () => `vs_${++storeSeq}`;
  const nextFileId = () => `file-${++fileSeq}`;

  const addStore = (name: string) => {
    const id = nextStoreId();
    stores.set(id, { id, name, createdAt: clock++, attachments: [] });
    return id;
  };

  const addFile = (filename: string, content: string) => {
    const id = nextFileId();
    files.set(id, { id, filename, bytes: new TextEncoder().encode(content).length, content });
    return id;
  };

  const attach = (store: StoredVectorStore, fileId: string) => {
    const filename = files.get(fileId)?.filename ?? "";
    const plan = plans.get(filename) ?? ["in_progress", "completed"];
    const attachment: Attachment = { fileId, plan, checks: 0 };
    store.attachments.push(attachment);
    return attachment;
  };

  const storeJson = (store: StoredVectorStore) => {
    const counts = { in_progress: 0, completed: 0, failed: 0, cancelled: 0, total: store.attachments.length };
    store.attachments.forEach((a) => {
      counts[statusOf(a)] += 1;
    });
    return { id: store.id, object: "vector_store", name: store.name, created_at: store.createdAt, file_counts: counts };
  };

  const attachmentJson = (storeId: string, a: Attachment) => ({
    id: a.fileId,
    object: "vector_store.file",
    vector_store_id: storeId,
    status: statusOf(a),
    usage_bytes: files.get(a.fileId)?.bytes ?? 0,
    last_error: statusOf(a) === "failed" ? { code: "unsupported_file", message: "File could not be parsed" } : null,
  });

  const paginate = <T extends { id: string }>(items: T[], query: Record<string, string>) => {
    const limit = fake.pageSize ?? Number(query.limit ?? 20);
    const start = query.after ? items.findIndex((item) => item.id === query.after) + 1 : 0;
    const data = items.slice(start, start + limit);
    return {
      object: "list",
      data,
      first_id: data[0]?.id ?? null,
      last_id: data[data.length - 1]?.id ?? null,
      has_more: start + limit < items.length,
    };
  };

  const answer = (store: StoredVectorStore, input: string) => {
    const terms = input
      .toLowerCase()
      .split(/[^a-z0-9.]+/)
      .filter((term) => term.length >= 3);
    let hit: { file: StoredFile; line: string } | null = null;
    for (const a of store.attachments) {
      const file = files.get(a.fileId);
      const line = file?.content
        .split("\n")
        .find((l) => terms.some((term) => l.toLowerCase().includes(term)));
      if (file && line) {
        hit = { file, line: line.trim() };
        break;
      }
    }
    const text = hit
      ? JSON.stringify({ Found: "Yes", Source: hit.file.filename, Rewards: "Yes", "Program Url": hit.line })
      : JSON.stringify({ Found: "No", Source: "", Rewards: "No", "Program Url": "" });
    return {
      id: `resp_${++responseSeq}`,
      object: "response",
      status: "completed",
      output: [
        { type: "file_search_call", id: "fs_1", status: "completed" },
        {
          type: "message",
          role: "assistant",
          content: [
            {
              type: "output_text",
              text,
              annotations: hit
                ? [{ type: "file_citation", index: 0, file_id: hit.file.id, filename: hit.file.filename }]
                : [],
            },
          ],
        },
      ],
    };
  };

  const route = async (method: string, path: string, query: Record<string, string>, body: unknown) => {
    let match: RegExpMatchArray | null;

    if (path === "/vector_stores" && method === "POST") {
      const name = typeof body === "object" && body !== null && "name" in body ? String(body.name) : "";
      const store = stores.get(addStore(name));
      return store ? json(200, storeJson(store)) : errorBody(500, "store vanished", "server_error");
    }
    if (path === "/vector_stores" && method === "GET") {
      return json(200, paginate([...stores.values()].map(storeJson), query));
    }
    if ((match = path.match(/^\/vector_stores\/([^/]+)$/))) {
      const store = stores.get(match[1] ?? "");
      if (!store) return errorBody(404, "No vector store found", "not_found");
      if (method === "DELETE") {
        stores.delete(store.id);
        return json(200, { id: store.id, object: "vector_store.deleted", deleted: true });
      }
      return json(200, storeJson(store));
    }
    if ((match = path.match(/^\/vector_stores\/([^/]+)\/files$/))) {
      const store = stores.get(match[1] ?? "");
      if (!store) return errorBody(404, "No vector store found", "not_found");
      if (method === "POST") {
        const fileId = typeof body === "object" && body !== null && "file_id" in body ? String(body.file_id) : "";
        if (!files.has(fileId)) return errorBody(404, "No file found", "not_found");
        const a = attach(store, fileId);
        return json(200, { ...attachmentJson(store.id, a), status: "in_progress" });
      }
      return json(200, paginate(store.attachments.map((a) => attachmentJson(store.id, a)), query));
    }
    if ((match = path.match(/^\/vector_stores\/([^/]+)\/files\/([^/]+)$/))) {
      const store = stores.get(match[1] ?? "");
      const a = store?.attachments.find((x) => x.fileId === match?.[2]);
      if (!store || !a) return errorBody(404, "No file found", "not_found");
      if (method === "DELETE") {
        store.attachments = store.attachments.filter((x) => x !== a);
        return json(200, { id: a.fileId, object: "vector_store.file.deleted", deleted: true });
      }
      const result = attachmentJson(store.id, a);
      a.checks += 1;
      return json(200, result);
    }
    if (path === "/files" && method === "POST") {
      if (!(body instanceof FormData)) return errorBody(400, "Expected multipart body", "invalid_request");
      const file = body.get("file");
      if (body.get("purpose") !== "assistants" || !(file instanceof File)) {
        return errorBody(400, "Missing file or purpose", "invalid_request");
      }
      const stored = files.get(addFile(file.name, await readBlob(file)));
      return stored
        ? json(200, { id: stored.id, object: "file", filename: stored.filename, bytes: stored.bytes, purpose: "assistants" })
        : errorBody(500, "file vanished", "server_error");
    }
    if ((match = path.match(/^\/files\/([^/]+)$/))) {
      const file = files.get(match[1] ?? "");
      if (!file) return errorBody(404, "No such File object", "not_found");
      if (method === "DELETE") {
        files.delete(file.id);
        return json(200, { id: file.id, object: "file", deleted: true });
      }
      return json(200, { id: file.id, object: "file", filename: file.filename, bytes: file.bytes });
    }
    if (path === "/responses" && method === "POST") {
      const payload = typeof body === "object" && body !== null ? body : {};
      const input = "input" in payload ? String(payload.input) : "";
      const tools = "tools" in payload && Array.isArray(payload.tools) ? payload.tools : [];
      const storeIds: unknown[] = tools.flatMap((t: unknown) =>
        typeof t === "object" && t !== null && "vector_store_ids" in t && Array.isArray(t.vector_store_ids)
          ? t.vector_store_ids
          : [],
      );
      const store = stores.get(String(storeIds[0] ?? ""));
      if (!store) return errorBody(404, "Vector store not found", "not_found");
      return json(200, answer(store, input));
    }
    return errorBody(404, `Unknown route ${method} ${path}`, "not_found");
  };

  const fakeFetch: typeof fetch = async (input, init) => {
    const url = toUrl(input);
    const method = init?.method ?? "GET";
    const path = url.pathname.replace(/^\/v1/, "");
    const query = Object.fromEntries(url.searchParams.entries());
    const rawBody = init?.body;
    const body: unknown = typeof rawBody === "string" ? JSON.parse(rawBody) : rawBody;
    const headers = new Headers(init?.headers);
    calls.push({ method, path, query, body, authorization: headers.get("Authorization") });

    const failure = failures.find((f) => f.method === method && f.path.test(path) && f.times > 0);
    if (failure) {
      failure.times -= 1;
      return errorBody(failure.status, failure.message, failure.code);
    }
    return route(method, path, query, body);
  };

  const fake: FakeOpenAI = {
    fetch: fakeFetch,
    calls,
    stores,
    files,
    pageSize: null,
    planStatuses: (filename, plan) => {
      plans.set(filename, plan);
    },
    failOn: (method, path, options = {}) => {
      failures.push({
        method,
        path,
        status: options.status ?? 500,
        message: options.message ?? "Internal server error",
        code: options.code ?? "server_error",
        times: options.times ?? 1,
      });
    },
    seedStore: (name) => addStore(name),
    seedFile: (storeId, filename, content) => {
      const fileId = addFile(filename, content);
      const store = stores.get(storeId);
      if (store) attach(store, fileId).checks = Number.MAX_SAFE_INTEGER;
      return fileId;
    },
    callsTo: (method, path) => calls.filter((c) => c.method === method && path.test(c.path)),
  };

  return fake;
};

export const testConfig = (overrides: Partial<AppConfig> = {}): AppConfig => ({
  openaiBaseUrl: TEST_BASE_URL,
  defaultModel: "gpt-4.1-mini",
  requestTimeoutMs: 5_000,
  polling: { intervalMs: 1, timeoutMs: 50, backoffFactor: 1, maxIntervalMs: 1 },
  maxUploadMb: 1,
  queryInstructions: DEFAULT_QUERY_INSTRUCTIONS,
  ...overrides,
});
