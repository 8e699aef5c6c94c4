import { useCallback, useEffect, useMemo, useRef, useState } from "react";
import { toast } from "sonner";
import { useSession } from "../contexts/SessionContext";
import { AppError, describeError, ValidationError } from "../errors";
import { logEvent } from "../logger";
import { MISSING_CREDENTIAL_MESSAGE } from "../services/openaiClient";
import { createStoreManager } from "../services/stores";
import type { StoreManager } from "../services/stores";
import type { FileRef, StoreSummary } from "../types";
import { getUploadLimits } from "../utils/uploadLimits";

export const useStores = () => {
  const { client, config, storesLoaded, storeCreated, storeDeleted } = useSession();
  const [filesByStore, setFilesByStore] = useState<Record<string, FileRef[]>>({});
  const [loadingStores, setLoadingStores] = useState(false);
  const [storesError, setStoresError] = useState<string | null>(null);

  const manager = useMemo<StoreManager | null>(
    () =>
      client
        ? createStoreManager(client, {
            polling: config.polling,
            uploadLimits: getUploadLimits(config.maxUploadMb),
          })
        : null,
    [client, config.polling, config.maxUploadMb],
  );

  // Results of calls made through a manager that has since been replaced are dropped.
  const currentManager = useRef(manager);
  useEffect(() => {
    currentManager.current = manager;
  }, [manager]);

  const requireManager = useCallback(() => {
    if (!manager) throw new ValidationError(MISSING_CREDENTIAL_MESSAGE, "missing_credential");
    return manager;
  }, [manager]);

  const refreshStores = useCallback(async () => {
    if (!manager) {
      storesLoaded([]);
      setFilesByStore({});
      setLoadingStores(false);
      setStoresError(null);
      return;
    }
    setLoadingStores(true);
    try {
      const stores = await manager.listStores();
      if (currentManager.current !== manager) return;
      storesLoaded(stores);
      setStoresError(null);
    } catch (err) {
      if (currentManager.current !== manager) return;
      logEvent("error", "stores_refresh_failed", { code: err instanceof AppError ? err.code : "unknown" });
      const message = `Failed to list vector stores: ${describeError(err)}`;
      setStoresError(message);
      toast.error(message, { id: "stores-error" });
    } finally {
      if (currentManager.current === manager) setLoadingStores(false);
    }
  }, [manager, storesLoaded]);

  const fetchFiles = useCallback(
    async (storeId: string) => {
      const owner = requireManager();
      const files = await owner.listFiles(storeId);
      if (currentManager.current === owner) {
        setFilesByStore((prev) => ({ ...prev, [storeId]: files }));
      }
      return files;
    },
    [requireManager],
  );

  const createStore = useCallback(
    async (name: string): Promise<StoreSummary> => {
      const store = await requireManager().createStore(name);
      storeCreated(store);
      return store;
    },
    [requireManager, storeCreated],
  );

  const deleteStore = useCallback(
    async (storeId: string) => {
      const result = await requireManager().deleteStore(storeId);
      storeDeleted(storeId);
      setFilesByStore((prev) => {
        const next = { ...prev };
        delete next[storeId];
        return next;
      });
      return result;
    },
    [requireManager, storeDeleted],
  );

  const deleteFile = useCallback(
    async (storeId: string, fileId: string) => {
      await requireManager().deleteFile(storeId, fileId);
      setFilesByStore((prev) => ({
        ...prev,
        [storeId]: (prev[storeId] ?? []).filter((f) => f.id !== fileId),
      }));
    },
    [requireManager],
  );

  useEffect(() => {
    void refreshStores();
  }, [refreshStores]);

  return {
    manager,
    filesByStore,
    loadingStores,
    storesError,
    refreshStores,
    fetchFiles,
    createStore,
    deleteStore,
    deleteFile,
  };
};
