import React, { createContext, useContext, useMemo } from "react";
import { useStores } from "../hooks/useStores";
import { useUploads } from "../hooks/useUploads";
import type { FileRef, PendingUpload, StoreSummary } from "../types";
import { useSession } from "./SessionContext";

type StoreContextValue = {
  stores: StoreSummary[];
  activeStoreId: string | null;
  setActiveStore: (id: string | null) => void;
  filesByStore: Record<string, FileRef[]>;
  loadingStores: boolean;
  storesError: string | null;
  refreshStores: () => Promise<void>;
  fetchFiles: (storeId: string) => Promise<FileRef[]>;
  createStore: (name: string) => Promise<StoreSummary>;
  deleteStore: (storeId: string) => Promise<{ deletedFiles: number }>;
  deleteFile: (storeId: string, fileId: string) => Promise<void>;
  pendingUploads: PendingUpload[];
  handleFiles: (files: FileList | File[] | null) => Promise<void>;
  uploading: boolean;
  uploadsError: string | null;
  clearUploads: () => void;
  canManage: boolean;
};

const StoreContext = createContext<StoreContextValue | null>(null);

export const StoreProvider: React.FC<{ children: React.ReactNode }> = ({ children }) => {
  const { state, setActiveStore } = useSession();
  const {
    manager,
    filesByStore,
    loadingStores,
    storesError,
    refreshStores,
    fetchFiles,
    createStore,
    deleteStore,
    deleteFile,
  } = useStores();

  const { pendingUploads, handleFiles, uploading, lastError, clearUploads } = useUploads({
    storeId: state.activeStoreId,
    manager,
    fetchFiles,
  });

  const value = useMemo(
    () => ({
      stores: state.stores,
      activeStoreId: state.activeStoreId,
      setActiveStore,
      filesByStore,
      loadingStores,
      storesError,
      refreshStores,
      fetchFiles,
      createStore,
      deleteStore,
      deleteFile,
      pendingUploads,
      handleFiles,
      uploading,
      uploadsError: lastError,
      clearUploads,
      canManage: manager !== null,
    }),
    [
      state.stores,
      state.activeStoreId,
      setActiveStore,
      filesByStore,
      loadingStores,
      storesError,
      refreshStores,
      fetchFiles,
      createStore,
      deleteStore,
      deleteFile,
      pendingUploads,
      handleFiles,
      uploading,
      lastError,
      clearUploads,
      manager,
    ],
  );

  return <StoreContext.Provider value={value}>{children}</StoreContext.Provider>;
};

export const useStoreContext = () => {
  const ctx = useContext(StoreContext);
  if (!ctx) {
    throw new Error("useStoreContext must be used within a StoreProvider");
  }
  return ctx;
};
