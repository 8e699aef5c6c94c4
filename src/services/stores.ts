import type { PollSettings } from "../config";
import { CascadeDeleteError, RemoteError, TimeoutError, ValidationError } from "../errors";
import type { CascadeStep } from "../errors";
import { logEvent } from "../logger";
import type { Logger } from "../logger";
import type { FileRef, IndexingStatus, StoreSummary } from "../types";
import type { UploadLimits } from "../utils/uploadLimits";
import { validateUpload } from "../utils/uploadLimits";
import type { OpenAIClient } from "./openaiClient";
import { waitForIndexing } from "./polling";
import type { PollOptions } from "./polling";
import {
  DeletedSchema,
  FileObjectSchema,
  listOf,
  VectorStoreFileSchema,
  VectorStoreSchema,
} from "./schemas";
import type { VectorStore, VectorStoreFile } from "./schemas";

const PAGE_SIZE = 100;
const UNNAMED_STORE = "(unnamed)";
// Floor for a status check made at or near the indexing deadline.
const MIN_STATUS_CHECK_MS = 5_000;

const VectorStoreListSchema = listOf(VectorStoreSchema);
const VectorStoreFileListSchema = listOf(VectorStoreFileSchema);

export type StoreManager = {
  createStore: (name: string) => Promise<StoreSummary>;
  listStores: () => Promise<StoreSummary[]>;
  listFiles: (storeId: string) => Promise<FileRef[]>;
  uploadFile: (
    storeId: string,
    file: File,
    hooks?: { onIndexing?: (fileId: string) => void; onStatus?: (status: IndexingStatus) => void },
  ) => Promise<FileRef>;
  deleteFile: (storeId: string, fileId: string) => Promise<void>;
  deleteStore: (storeId: string) => Promise<{ deletedFiles: number }>;
};

export type StoreManagerOptions = {
  polling: PollSettings;
  uploadLimits: UploadLimits;
  logger?: Logger;
  sleep?: PollOptions["sleep"];
  now?: PollOptions["now"];
};

type Page<T> = { data: T[]; has_more: boolean; last_id?: string | null };

const collectPages = async <T extends { id: string }>(fetchPage: (after: string | undefined) => Promise<Page<T>>) => {
  const items: T[] = [];
  let after: string | undefined;
  for (;;) {
    const page = await fetchPage(after);
    items.push(...page.data);
    const cursor = page.last_id ?? page.data[page.data.length - 1]?.id;
    if (!page.has_more || !cursor || page.data.length === 0) return items;
    after = cursor;
  }
};

export const toIndexingStatus = (status: VectorStoreFile["status"]): IndexingStatus =>
  status === "cancelled" ? "failed" : status;

export const toStoreSummary = (store: VectorStore): StoreSummary => ({
  id: store.id,
  name: store.name?.trim() || UNNAMED_STORE,
  createdAt: store.created_at ?? null,
  fileCounts: store.file_counts
    ? {
        inProgress: store.file_counts.in_progress,
        completed: store.file_counts.completed,
        failed: store.file_counts.failed + store.file_counts.cancelled,
        total: store.file_counts.total,
      }
    : null,
});

const toFileRef = (storeId: string, file: VectorStoreFile, filename: string | null): FileRef => ({
  id: file.id,
  storeId,
  filename,
  status: toIndexingStatus(file.status),
  bytes: file.usage_bytes ?? null,
  lastError: file.last_error?.message ?? null,
});

const ensureDeleted = (result: { id: string; deleted: boolean }) => {
  if (!result.deleted) {
    throw new RemoteError({ message: `${result.id} was not deleted`, code: "not_deleted", retryable: false });
  }
};

export const createStoreManager = (
  client: OpenAIClient,
  { polling, uploadLimits, logger = logEvent, sleep, now }: StoreManagerOptions,
): StoreManager => {
  const storePath = (storeId: string) => `/vector_stores/${encodeURIComponent(storeId)}`;
  const storeFilePath = (storeId: string, fileId: string) =>
    `${storePath(storeId)}/files/${encodeURIComponent(fileId)}`;

  const listStoreFiles = (storeId: string) =>
    collectPages((after) =>
      client.request(VectorStoreFileListSchema, `${storePath(storeId)}/files`, {
        query: { limit: PAGE_SIZE, after },
      }),
    );

  const detachFile = async (storeId: string, fileId: string) => {
    ensureDeleted(await client.request(DeletedSchema, storeFilePath(storeId, fileId), { method: "DELETE" }));
  };

  const deleteFileContent = async (fileId: string) => {
    ensureDeleted(
      await client.request(DeletedSchema, `/files/${encodeURIComponent(fileId)}`, { method: "DELETE" }),
    );
  };

  const resolveFilename = async (fileId: string) => {
    try {
      const file = await client.request(FileObjectSchema, `/files/${encodeURIComponent(fileId)}`);
      return file.filename ?? null;
    } catch (err) {
      logger("warn", "filename_lookup_failed", {
        fileId,
        code: err instanceof RemoteError ? err.code : "unknown",
      });
      return null;
    }
  };

  return {
    createStore: async (name) => {
      const trimmed = name.trim();
      if (!trimmed) {
        throw new ValidationError("Please enter a store name.", "empty_store_name");
      }
      const created = await client.request(VectorStoreSchema, "/vector_stores", {
        method: "POST",
        json: { name: trimmed },
      });
      logger("info", "store_created", { storeId: created.id });
      return toStoreSummary(created);
    },

    listStores: async () => {
      const stores = await collectPages((after) =>
        client.request(VectorStoreListSchema, "/vector_stores", { query: { limit: PAGE_SIZE, after } }),
      );
      return stores.map(toStoreSummary);
    },

    listFiles: async (storeId) => {
      const files = await listStoreFiles(storeId);
      const refs: FileRef[] = [];
      for (const file of files) {
        refs.push(toFileRef(storeId, file, await resolveFilename(file.id)));
      }
      return refs;
    },

    uploadFile: async (storeId, file, hooks = {}) => {
      validateUpload(file, uploadLimits);

      const form = new FormData();
      form.append("purpose", "assistants");
      form.append("file", file, file.name);
      const created = await client.request(FileObjectSchema, "/files", { method: "POST", form });
      try {
        await client.request(VectorStoreFileSchema, `${storePath(storeId)}/files`, {
          method: "POST",
          json: { file_id: created.id },
        });
      } catch (err) {
        // The uploaded file is attached nowhere; delete it before rethrowing.
        await deleteFileContent(created.id).catch((cleanupErr: unknown) => {
          logger("error", "orphan_cleanup_failed", {
            storeId,
            fileId: created.id,
            code: cleanupErr instanceof RemoteError ? cleanupErr.code : "unknown",
          });
        });
        throw err;
      }
      logger("info", "file_attached", { storeId, fileId: created.id });
      hooks.onIndexing?.(created.id);

      const outcome = await waitForIndexing(
        async (remainingMs) => {
          const current = await client.request(VectorStoreFileSchema, storeFilePath(storeId, created.id), {
            timeoutMs: Math.max(remainingMs, MIN_STATUS_CHECK_MS),
          });
          return { ...current, status: toIndexingStatus(current.status) };
        },
        { ...polling, sleep, now, onStatus: hooks.onStatus },
      );

      if (outcome.kind === "timed_out") {
        logger("warn", "indexing_timed_out", {
          storeId,
          fileId: created.id,
          status: outcome.lastStatus,
          elapsedMs: outcome.elapsedMs,
        });
        throw new TimeoutError({ fileId: created.id, lastStatus: outcome.lastStatus, elapsedMs: outcome.elapsedMs });
      }
      if (outcome.kind === "failed") {
        logger("warn", "indexing_failed", { storeId, fileId: created.id });
        throw new RemoteError({
          message: `Indexing failed for ${file.name}: ${outcome.file.last_error?.message ?? "no reason given"}`,
          code: "indexing_failed",
          retryable: false,
        });
      }

      logger("info", "indexing_completed", { storeId, fileId: created.id });
      return {
        id: created.id,
        storeId,
        filename: created.filename ?? file.name,
        status: "completed",
        bytes: outcome.file.usage_bytes ?? created.bytes ?? file.size,
        lastError: null,
      };
    },

    deleteFile: async (storeId, fileId) => {
      await detachFile(storeId, fileId);
      await deleteFileContent(fileId);
      logger("info", "file_deleted", { storeId, fileId });
    },

    deleteStore: async (storeId) => {
      const fail = (step: CascadeStep, fileId: string | null, deletedFiles: number, cause: unknown) => {
        logger("error", "store_delete_halted", { storeId, fileId, reason: step, count: deletedFiles });
        return new CascadeDeleteError({ storeId, step, fileId, deletedFiles, cause });
      };

      let files: VectorStoreFile[];
      try {
        files = await listStoreFiles(storeId);
      } catch (cause) {
        throw fail("list_files", null, 0, cause);
      }

      let deletedFiles = 0;
      for (const file of files) {
        try {
          await detachFile(storeId, file.id);
        } catch (cause) {
          throw fail("detach_file", file.id, deletedFiles, cause);
        }
        try {
          await deleteFileContent(file.id);
        } catch (cause) {
          throw fail("delete_file", file.id, deletedFiles, cause);
        }
        deletedFiles += 1;
      }

      ensureDeleted(await client.request(DeletedSchema, storePath(storeId), { method: "DELETE" }));
      logger("info", "store_deleted", { storeId, count: deletedFiles });
      return { deletedFiles };
    },
  };
};
