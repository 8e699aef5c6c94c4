import React, { useState } from "react";
import { toast } from "sonner";
import { useStoreContext } from "../contexts/StoreContext";
import { describeError } from "../errors";
import type { StoreSummary } from "../types";
import { ConfirmDialog } from "./ConfirmDialog";
import { FileList } from "./FileList";

export const StoreList: React.FC = () => {
  const {
    stores,
    activeStoreId,
    setActiveStore,
    filesByStore,
    fetchFiles,
    deleteStore,
    deleteFile,
    loadingStores,
  } = useStoreContext();
  const [expanded, setExpanded] = useState<Record<string, boolean>>({});
  const [pendingDelete, setPendingDelete] = useState<StoreSummary | null>(null);
  const [deleting, setDeleting] = useState(false);

  const toggleFiles = async (storeId: string) => {
    const open = !expanded[storeId];
    setExpanded((prev) => ({ ...prev, [storeId]: open }));
    if (!open) return;
    try {
      await fetchFiles(storeId);
    } catch (err) {
      toast.error(`Failed to list files: ${describeError(err)}`);
    }
  };

  const confirmDelete = async () => {
    if (!pendingDelete) return;
    setDeleting(true);
    try {
      const { deletedFiles } = await deleteStore(pendingDelete.id);
      toast.success(`Deleted vector store: ${pendingDelete.id} (and ${deletedFiles} related files)`);
      setPendingDelete(null);
    } catch (err) {
      toast.error(`Failed to delete vector store: ${describeError(err)}`);
    } finally {
      setDeleting(false);
    }
  };

  if (loadingStores && !stores.length) {
    return <p className="text-xs text-muted-foreground">Loading stores…</p>;
  }

  if (!stores.length) {
    return <p className="text-xs text-muted-foreground">No vector stores found.</p>;
  }

  return (
    <div className="space-y-3">
      {stores.map((s) => {
        const isActive = s.id === activeStoreId;
        const files = filesByStore[s.id];
        return (
          <div
            key={s.id}
            className={`rounded-md border p-3 space-y-2 ${isActive ? "border-primary bg-primary/5" : "border-border"}`}
          >
            <div className="flex items-center justify-between gap-2">
              <p className="text-sm font-medium truncate">
                {s.name} <span className="text-muted-foreground">({s.id})</span>
              </p>
              {isActive ? (
                <span className="text-xs px-2 py-0.5 rounded-full bg-primary text-primary-foreground">Active</span>
              ) : (
                <button
                  type="button"
                  onClick={() => setActiveStore(s.id)}
                  className="text-xs px-2 py-1 rounded-md border border-border hover:bg-muted"
                >
                  Set active
                </button>
              )}
            </div>
            {s.fileCounts ? (
              <p className="text-xs text-muted-foreground">
                {s.fileCounts.completed} indexed • {s.fileCounts.inProgress} in progress • {s.fileCounts.failed} failed
              </p>
            ) : null}
            <div className="flex gap-2">
              <button
                type="button"
                onClick={() => void toggleFiles(s.id)}
                className="text-xs px-2 py-1 rounded-md border border-border hover:bg-muted"
              >
                {expanded[s.id] ? "Hide files" : "Show files"}
              </button>
              <button
                type="button"
                onClick={() => setPendingDelete(s)}
                className="text-xs px-2 py-1 rounded-md border border-border text-destructive hover:bg-muted"
              >
                Delete store
              </button>
            </div>
            {expanded[s.id] ? (
              files ? (
                <FileList files={files} onDelete={(fileId) => deleteFile(s.id, fileId)} />
              ) : (
                <p className="text-xs text-muted-foreground">Loading files…</p>
              )
            ) : null}
          </div>
        );
      })}

      <ConfirmDialog
        open={pendingDelete !== null}
        title="Delete vector store"
        message={
          pendingDelete
            ? `Delete ${pendingDelete.name} (${pendingDelete.id}) and every file in it? This cannot be undone.`
            : ""
        }
        loading={deleting}
        onConfirm={() => void confirmDelete()}
        onCancel={() => setPendingDelete(null)}
      />
    </div>
  );
};
