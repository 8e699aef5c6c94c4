/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_OPENAI_BASE_URL?: string;
  readonly VITE_DEFAULT_MODEL?: string;
  readonly VITE_REQUEST_TIMEOUT_MS?: string;
  readonly VITE_INDEXING_POLL_INTERVAL_MS?: string;
  readonly VITE_INDEXING_TIMEOUT_MS?: string;
  readonly VITE_INDEXING_BACKOFF_FACTOR?: string;
  readonly VITE_INDEXING_MAX_INTERVAL_MS?: string;
  readonly VITE_MAX_UPLOAD_MB?: string;
  readonly VITE_QUERY_INSTRUCTIONS?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
