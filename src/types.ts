export type IndexingStatus = "submitted" | "in_progress" | "completed" | "failed";

export type FileCounts = {
  inProgress: number;
  completed: number;
  failed: number;
  total: number;
};

export type StoreSummary = {
  id: string;
  name: string;
  createdAt: number | null;
  fileCounts: FileCounts | null;
};

export type FileRef = {
  id: string;
  storeId: string;
  filename: string | null;
  status: IndexingStatus;
  bytes: number | null;
  lastError: string | null;
};

export type Citation = {
  fileId: string;
  filename: string | null;
};

export type QueryResult = {
  responseId: string;
  text: string;
  citations: Citation[];
};

export type PendingUpload = {
  id: string;
  name: string;
  status: "uploading" | "indexing" | "indexed" | "error";
  message?: string;
  fileId?: string;
};
