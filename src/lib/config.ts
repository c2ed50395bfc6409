import type { LogLevel, PagerConfig, StyleName } from "../types/app.js";

export const DEFAULT_CONFIG: Readonly<PagerConfig> = Object.freeze({
  renderEnabled: true,
  style: "auto",
  maxWidth: 120,
  preserveNewLines: false,
  showLineNumbers: false,
  presentationMode: false,
  statusMessageTimeoutMs: 3000,
  logLevel: "info",
  logFile: null
});

const LIMITS = {
  maxWidth: { min: 0, max: 1000 },
  statusMessageTimeoutMs: { min: 250, max: 60_000 }
} as const;

const STYLE_NAMES: readonly StyleName[] = ["auto", "dark", "light", "notty"];
const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

const ENV_KEYS: ReadonlyArray<[keyof PagerConfig, string]> = [
  ["renderEnabled", "PAGEMARK_RENDER"],
  ["style", "PAGEMARK_STYLE"],
  ["maxWidth", "PAGEMARK_WIDTH"],
  ["preserveNewLines", "PAGEMARK_PRESERVE_NEW_LINES"],
  ["showLineNumbers", "PAGEMARK_LINE_NUMBERS"],
  ["presentationMode", "PAGEMARK_SLIDES"],
  ["statusMessageTimeoutMs", "PAGEMARK_STATUS_TIMEOUT_MS"],
  ["logLevel", "PAGEMARK_LOG_LEVEL"],
  ["logFile", "PAGEMARK_LOG_FILE"]
];

export type ConfigOverrides = Partial<Record<keyof PagerConfig, unknown>>;

const clamp = (value: number, min: number, max: number): number =>
  Math.max(min, Math.min(max, value));

const validateBoolean = (value: unknown, fallback: boolean): boolean => {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (["1", "true", "yes", "on"].includes(normalized)) {
      return true;
    }
    if (["0", "false", "no", "off"].includes(normalized)) {
      return false;
    }
  }
  return fallback;
};

const validateNumber = (value: unknown, fallback: number, min: number, max: number): number => {
  const parsed = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof parsed !== "number" || Number.isNaN(parsed)) {
    return fallback;
  }
  return clamp(Math.round(parsed), min, max);
};

const validateChoice = <T extends string>(
  value: unknown,
  choices: readonly T[],
  fallback: T
): T => {
  if (typeof value !== "string") {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  return choices.find((choice) => choice === normalized) ?? fallback;
};

const validatePath = (value: unknown, fallback: string | null): string | null => {
  if (value === null) {
    return null;
  }
  if (typeof value !== "string") {
    return fallback;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
};

export const validateConfig = (raw: ConfigOverrides, base: PagerConfig): PagerConfig => ({
  renderEnabled: validateBoolean(raw.renderEnabled, base.renderEnabled),
  style: validateChoice(raw.style, STYLE_NAMES, base.style),
  maxWidth: validateNumber(raw.maxWidth, base.maxWidth, LIMITS.maxWidth.min, LIMITS.maxWidth.max),
  preserveNewLines: validateBoolean(raw.preserveNewLines, base.preserveNewLines),
  showLineNumbers: validateBoolean(raw.showLineNumbers, base.showLineNumbers),
  presentationMode: validateBoolean(raw.presentationMode, base.presentationMode),
  statusMessageTimeoutMs: validateNumber(
    raw.statusMessageTimeoutMs,
    base.statusMessageTimeoutMs,
    LIMITS.statusMessageTimeoutMs.min,
    LIMITS.statusMessageTimeoutMs.max
  ),
  logLevel: validateChoice(raw.logLevel, LOG_LEVELS, base.logLevel),
  logFile: validatePath(raw.logFile, base.logFile)
});

export const readEnvOverrides = (env: NodeJS.ProcessEnv): ConfigOverrides => {
  const overrides: ConfigOverrides = {};
  for (const [key, envKey] of ENV_KEYS) {
    const value = env[envKey];
    if (value !== undefined) {
      overrides[key] = value;
    }
  }
  return overrides;
};

export const resolveConfig = (
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Readonly<PagerConfig> => {
  const fromEnv = validateConfig(readEnvOverrides(env), DEFAULT_CONFIG);
  const defined: ConfigOverrides = {};
  for (const [key] of ENV_KEYS) {
    if (overrides[key] !== undefined) {
      defined[key] = overrides[key];
    }
  }
  return Object.freeze(validateConfig(defined, fromEnv));
};
