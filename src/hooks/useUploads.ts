import { useCallback, useState } from "react";
import { AppError, describeError, TimeoutError } from "../errors";
import { logEvent } from "../logger";
import type { StoreManager } from "../services/stores";
import type { FileRef, PendingUpload } from "../types";

const newUploadId = () => `${Date.now()}-${Math.random().toString(16).slice(2)}`;

export const useUploads = ({
  storeId,
  manager,
  fetchFiles,
}: {
  storeId: string | null;
  manager: StoreManager | null;
  fetchFiles: (storeId: string) => Promise<FileRef[]>;
}) => {
  const [pendingUploads, setPendingUploads] = useState<PendingUpload[]>([]);
  const [lastError, setLastError] = useState<string | null>(null);
  const [uploading, setUploading] = useState(false);

  const patch = useCallback(
    (id: string, next: Partial<PendingUpload>) =>
      setPendingUploads((prev) => prev.map((u) => (u.id === id ? { ...u, ...next } : u))),
    [],
  );

  const uploadFile = useCallback(
    async (file: File, targetStoreId: string, uploadManager: StoreManager) => {
      const id = newUploadId();
      setPendingUploads((prev) => [...prev, { id, name: file.name, status: "uploading" }]);
      try {
        const ref = await uploadManager.uploadFile(targetStoreId, file, {
          onIndexing: (fileId) => patch(id, { status: "indexing", fileId, message: "Indexing…" }),
          onStatus: (status) => patch(id, { message: `Status: ${status}` }),
        });
        patch(id, { status: "indexed", fileId: ref.id, message: "Ready" });
        return true;
      } catch (err) {
        const message =
          err instanceof TimeoutError ? `Indexing is taking too long (${err.fileId}). Please check later.` : describeError(err);
        patch(id, { status: "error", message });
        setLastError(`Failed to upload ${file.name}: ${message}`);
        return false;
      }
    },
    [patch],
  );

  const handleFiles = useCallback(
    async (files: FileList | File[] | null) => {
      const queue = files ? Array.from(files) : [];
      if (!queue.length) {
        setLastError("Please choose one or more files to upload.");
        return;
      }
      if (!storeId) {
        setLastError("No active vector store set. Create one or set one active above.");
        return;
      }
      if (!manager) {
        setLastError("Set your OpenAI API key in Settings first.");
        return;
      }
      setLastError(null);
      setUploading(true);
      let uploaded = 0;
      try {
        // One file at a time: each upload blocks until its indexing poll ends.
        for (const file of queue) {
          if (await uploadFile(file, storeId, manager)) uploaded += 1;
        }
      } finally {
        setUploading(false);
      }
      if (uploaded > 0) {
        try {
          await fetchFiles(storeId);
        } catch (err) {
          logEvent("warn", "files_refresh_failed", {
            storeId,
            code: err instanceof AppError ? err.code : "unknown",
          });
        }
      }
    },
    [fetchFiles, manager, storeId, uploadFile],
  );

  const clearUploads = useCallback(() => {
    setPendingUploads([]);
    setLastError(null);
  }, []);

  return { pendingUploads, handleFiles, uploading, lastError, clearUploads };
};
