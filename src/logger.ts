const ALLOWED_FIELDS = new Set([
  "storeId",
  "fileId",
  "status",
  "durationMs",
  "elapsedMs",
  "method",
  "path",
  "httpStatus",
  "code",
  "count",
  "reason",
]);

export type LogLevel = "info" | "warn" | "error";

type LogValue = number | string | boolean | null;

export type Logger = (level: LogLevel, name: string, data?: Record<string, unknown>) => void;

const isLogValue = (value: unknown): value is LogValue =>
  value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean";

// Only allow-listed scalar fields are printed; secrets never reach the console.
export const sanitizeFields = (data: Record<string, unknown>) => {
  return Object.fromEntries(
    Object.entries(data).filter(([key, value]) => ALLOWED_FIELDS.has(key) && isLogValue(value)),
  );
};

export const logEvent: Logger = (level, name, data = {}) => {
  const line = JSON.stringify({ level, name, ...sanitizeFields(data) });
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};
