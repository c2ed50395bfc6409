import type { AppError, AppErrorCode } from "../types/app.js";

export class PagerError extends Error {
  readonly code: AppErrorCode;

  constructor(code: AppErrorCode, message: string) {
    super(message);
    this.name = "PagerError";
    this.code = code;
  }
}

const FS_ERROR_CODES: Record<string, AppErrorCode> = {
  ENOENT: "FILE_NOT_FOUND",
  ENOTDIR: "FILE_NOT_FOUND",
  EACCES: "PERMISSION_DENIED",
  EPERM: "PERMISSION_DENIED"
};

const hasStringField = <K extends string>(
  value: object,
  key: K
): value is Record<K, string> =>
  key in value && typeof Reflect.get(value, key) === "string";

export const fsErrorCode = (value: unknown): AppErrorCode | null => {
  if (typeof value !== "object" || value === null || !hasStringField(value, "code")) {
    return null;
  }
  return FS_ERROR_CODES[value.code] ?? null;
};

export const toAppError = (value: unknown, fallback: AppErrorCode = "IO"): AppError => {
  if (value instanceof PagerError) {
    return { code: value.code, message: value.message };
  }

  if (value instanceof Error) {
    return { code: fsErrorCode(value) ?? fallback, message: value.message };
  }

  if (typeof value === "string") {
    return { code: fallback, message: value };
  }

  if (typeof value === "object" && value !== null && hasStringField(value, "message")) {
    return { code: fallback, message: value.message };
  }

  return {
    code: fallback,
    message: String(value ?? "Unexpected error")
  };
};
