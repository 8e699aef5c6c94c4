import React, { useState } from "react";
import { useStoreContext } from "../../contexts/StoreContext";
import { CreateStoreDialog } from "../CreateStoreDialog";
import { QueryPanel } from "../QueryPanel";
import { SettingsPanel } from "../SettingsPanel";
import { StoreList } from "../StoreList";
import { UploadPanel } from "../UploadPanel";

export const AppLayout: React.FC = () => {
  const { stores, activeStoreId, canManage, createStore, refreshStores, storesError } = useStoreContext();
  const [createStoreOpen, setCreateStoreOpen] = useState(false);
  const activeStore = stores.find((s) => s.id === activeStoreId) ?? null;

  return (
    <div className="flex h-screen bg-background text-foreground">
      <div className="w-96 border-r border-border bg-card p-4 overflow-y-auto">
        <h2 className="text-2xl font-bold mb-4">Bug Bounty Program Finder</h2>
        <SettingsPanel />

        <div className="space-y-3">
          <div className="flex items-center justify-between">
            <h3 className="text-sm font-semibold text-muted-foreground">Knowledge Base</h3>
            <button
              className="text-xs text-muted-foreground hover:text-foreground disabled:opacity-50"
              onClick={() => void refreshStores()}
              disabled={!canManage}
            >
              Refresh
            </button>
          </div>
          <button
            onClick={() => setCreateStoreOpen(true)}
            disabled={!canManage}
            title={!canManage ? "Set your API key to create a store" : ""}
            className="w-full px-3 py-2 bg-primary text-primary-foreground rounded-md hover:bg-primary/90 disabled:opacity-50 disabled:cursor-not-allowed"
          >
            + New Store
          </button>
          {storesError ? (
            <div className="text-xs text-red-500 bg-red-50 border border-red-200 rounded p-2">{storesError}</div>
          ) : null}
          {canManage ? <StoreList /> : null}
          <UploadPanel />
        </div>
      </div>

      <main className="flex-1 overflow-y-auto px-4 py-6">
        <div className="max-w-3xl mx-auto space-y-4">
          <div>
            <h1 className="text-xl font-bold">Find a bug bounty program</h1>
            <p className="text-sm text-muted-foreground">
              {activeStore
                ? `Searching ${activeStore.name} (${activeStore.id})`
                : "No active vector store. Create one or pick one in the Knowledge Base section."}
            </p>
          </div>
          <QueryPanel />
        </div>
      </main>

      <CreateStoreDialog
        open={createStoreOpen}
        onOpenChange={setCreateStoreOpen}
        canCreate={canManage}
        onCreate={createStore}
      />
    </div>
  );
};
