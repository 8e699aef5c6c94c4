import React, { useMemo } from "react";
import { toast } from "sonner";
import { useSession } from "../contexts/SessionContext";
import { useStoreContext } from "../contexts/StoreContext";
import type { PendingUpload } from "../types";
import { buildAcceptValue, formatAllowedTypes, getUploadLimits } from "../utils/uploadLimits";

const statusLabel = (u: PendingUpload) => {
  switch (u.status) {
    case "uploading":
      return "Uploading…";
    case "indexing":
      return u.message || "Indexing…";
    case "indexed":
      return "Indexed";
    case "error":
      return u.message || "Failed";
  }
};

export const UploadPanel: React.FC = () => {
  const { config } = useSession();
  const { activeStoreId, canManage, pendingUploads, handleFiles, uploading, uploadsError, clearUploads } =
    useStoreContext();
  const uploadLimits = useMemo(() => getUploadLimits(config.maxUploadMb), [config.maxUploadMb]);
  const acceptValue = buildAcceptValue(uploadLimits.allowedExtensions);
  const allowedTypesLabel = formatAllowedTypes(uploadLimits.allowedExtensions);
  const canUpload = canManage && activeStoreId !== null;

  const submit = (files: FileList | null) => {
    if (!canUpload) {
      toast.error("Set your API key and an active store first.");
      return;
    }
    void handleFiles(files);
  };

  return (
    <div
      className="border border-dashed border-border rounded-md p-3 text-xs text-muted-foreground flex flex-col gap-2"
      onDragOver={(e) => e.preventDefault()}
      onDrop={(e) => {
        e.preventDefault();
        e.stopPropagation();
        submit(e.dataTransfer.files);
      }}
    >
      <p className="font-medium text-foreground">Upload files to the active store</p>
      <p className="text-[11px]">
        Max {uploadLimits.maxUploadMb} MB per file. Allowed types: {allowedTypesLabel}.
      </p>
      <label
        className={`self-start px-3 py-2 rounded-md border border-border hover:bg-muted cursor-pointer ${
          !canUpload || uploading ? "opacity-50 cursor-not-allowed" : ""
        }`}
      >
        <input
          type="file"
          aria-label="Choose files"
          accept={acceptValue}
          className="hidden"
          multiple
          disabled={!canUpload || uploading}
          onChange={(e) => {
            submit(e.target.files);
            e.target.value = "";
          }}
        />
        {uploading ? "Uploading…" : "Choose files"}
      </label>
      {uploadsError ? (
        <div className="text-xs text-red-500 bg-red-50 border border-red-200 rounded p-2">{uploadsError}</div>
      ) : null}
      {pendingUploads.length > 0 && !uploading ? (
        <button
          type="button"
          onClick={clearUploads}
          className="self-end text-[11px] text-muted-foreground hover:text-foreground"
        >
          Clear
        </button>
      ) : null}
      <div className="space-y-1 max-h-32 overflow-y-auto">
        {pendingUploads.map((u) => (
          <div key={u.id} className="flex items-center justify-between gap-2">
            <span className="font-medium text-foreground truncate">{u.name}</span>
            <span className={u.status === "error" ? "text-destructive" : ""}>{statusLabel(u)}</span>
          </div>
        ))}
      </div>
    </div>
  );
};
