import { ValidationError } from "../errors";

export type UploadLimits = {
  maxUploadMb: number;
  allowedExtensions: string[];
};

// File types accepted by OpenAI file search that this tool offers in its picker.
export const DEFAULT_ALLOWED_EXTENSIONS = ["pdf", "txt", "md", "json", "docx", "pptx", "html", "py", "java", "js", "ts"];

const EXTENSION_LABELS: Record<string, string> = {
  pdf: "PDF",
  txt: "Text",
  md: "Markdown",
  json: "JSON",
  docx: "Word (DOCX)",
  pptx: "PowerPoint (PPTX)",
  html: "HTML",
  py: "Python",
  java: "Java",
  js: "JavaScript",
  ts: "TypeScript",
};

export function getUploadLimits(maxUploadMb: number): UploadLimits {
  return { maxUploadMb, allowedExtensions: DEFAULT_ALLOWED_EXTENSIONS };
}

export function fileExtension(name: string): string {
  const dot = name.lastIndexOf(".");
  if (dot <= 0 || dot === name.length - 1) return "";
  return name.slice(dot + 1).toLowerCase();
}

export function validateUpload(file: { name: string; size: number }, limits: UploadLimits): void {
  const ext = fileExtension(file.name);
  if (!limits.allowedExtensions.includes(ext)) {
    throw new ValidationError(
      `${file.name} is not a supported file type. Allowed types: ${formatAllowedTypes(limits.allowedExtensions)}.`,
      "unsupported_file_type",
    );
  }
  if (file.size === 0) {
    throw new ValidationError(`${file.name} is empty.`, "empty_file");
  }
  if (file.size > limits.maxUploadMb * 1024 * 1024) {
    throw new ValidationError(`${file.name} is larger than ${limits.maxUploadMb} MB.`, "file_too_large");
  }
}

export function formatAllowedTypes(allowedExtensions: string[]): string {
  if (!allowedExtensions.length) return "See documentation for supported formats";
  const labels = allowedExtensions.map((ext) => EXTENSION_LABELS[ext] || ext.toUpperCase());
  return Array.from(new Set(labels)).join(", ");
}

export function buildAcceptValue(allowedExtensions: string[]): string | undefined {
  if (!allowedExtensions.length) return undefined;
  return allowedExtensions.map((ext) => `.${ext}`).join(",");
}
