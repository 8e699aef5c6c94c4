import type { IndexingStatus } from "./types";

export class AppError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Rejected locally before any remote call. */
export class ValidationError extends AppError {
  constructor(message: string, code = "validation_error") {
    super(code, message);
  }
}

export class RemoteError extends AppError {
  readonly status: number | null;
  readonly retryable: boolean;

  constructor({
    message,
    code = "remote_error",
    status = null,
    retryable,
  }: {
    message: string;
    code?: string;
    status?: number | null;
    retryable?: boolean;
  }) {
    super(code, message);
    this.status = status;
    this.retryable = retryable ?? isRetryableStatus(status);
  }
}

export type CascadeStep = "list_files" | "detach_file" | "delete_file";

export class CascadeDeleteError extends RemoteError {
  readonly storeId: string;
  readonly step: CascadeStep;
  readonly fileId: string | null;
  readonly deletedFiles: number;

  constructor({
    storeId,
    step,
    fileId,
    deletedFiles,
    cause,
  }: {
    storeId: string;
    step: CascadeStep;
    fileId: string | null;
    deletedFiles: number;
    cause: unknown;
  }) {
    const target = fileId ? ` for file ${fileId}` : "";
    super({
      message: `Store ${storeId} was not deleted: ${step.replace("_", " ")} failed${target} after ${deletedFiles} file(s) were removed (${describeError(cause)})`,
      code: "cascade_delete_failed",
      status: cause instanceof RemoteError ? cause.status : null,
      retryable: false,
    });
    this.storeId = storeId;
    this.step = step;
    this.fileId = fileId;
    this.deletedFiles = deletedFiles;
  }
}

export class TimeoutError extends AppError {
  readonly fileId: string;
  readonly lastStatus: IndexingStatus;
  readonly elapsedMs: number;

  constructor({
    fileId,
    lastStatus,
    elapsedMs,
  }: {
    fileId: string;
    lastStatus: IndexingStatus;
    elapsedMs: number;
  }) {
    super(
      "indexing_timeout",
      `Indexing of ${fileId} did not finish within ${Math.round(elapsedMs / 1000)}s (last status: ${lastStatus})`,
    );
    this.fileId = fileId;
    this.lastStatus = lastStatus;
    this.elapsedMs = elapsedMs;
  }
}

export const isRetryableStatus = (status: number | null) =>
  status === null || status === 429 || status >= 500;

export const describeError = (error: unknown): string => {
  if (error instanceof RemoteError && !(error instanceof CascadeDeleteError) && error.status !== null) {
    return `${error.message} (HTTP ${error.status})`;
  }
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === "string") return error;
  return "Unexpected error";
};
