import React, { useState } from "react";
import { toast } from "sonner";
import { describeError } from "../errors";
import type { FileRef } from "../types";

type FileListProps = {
  files: FileRef[];
  onDelete: (fileId: string) => Promise<void>;
};

const formatSize = (bytes: number | null) => (bytes == null ? "" : ` • ${(bytes / 1024).toFixed(1)} KB`);

export const FileList: React.FC<FileListProps> = ({ files, onDelete }) => {
  const [deletingId, setDeletingId] = useState<string | null>(null);

  const handleDelete = async (fileId: string) => {
    setDeletingId(fileId);
    try {
      await onDelete(fileId);
      toast.success(`Deleted file: ${fileId}`);
    } catch (err) {
      toast.error(`Failed to delete file: ${describeError(err)}`);
    } finally {
      setDeletingId(null);
    }
  };

  if (!files.length) {
    return <p className="text-xs text-muted-foreground">No files in this store.</p>;
  }

  return (
    <ul className="space-y-2">
      {files.map((f) => (
        <li
          key={f.id}
          className="border border-border rounded-md p-2 text-xs flex items-center justify-between"
          title={f.lastError ?? f.filename ?? f.id}
        >
          <div className="flex-1 min-w-0">
            <div className="font-semibold text-foreground truncate">{f.filename ?? "(unknown)"}</div>
            <div className="text-muted-foreground truncate">
              {f.id} • {f.status}
              {formatSize(f.bytes)}
            </div>
          </div>
          <button
            type="button"
            onClick={() => void handleDelete(f.id)}
            disabled={deletingId !== null}
            className="ml-2 px-2 py-1 rounded-md border border-border text-destructive hover:bg-muted disabled:opacity-50"
          >
            {deletingId === f.id ? "Deleting..." : "Delete"}
          </button>
        </li>
      ))}
    </ul>
  );
};
