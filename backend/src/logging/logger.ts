type BackendLogLevel = "debug" | "info" | "warn" | "error";
type BackendLogScope = "app" | "http";

const DEFAULT_LEVEL: BackendLogLevel = "info";
const VALID_LEVELS: readonly string[] = ["debug", "info", "warn", "error"];
const LEVEL_RANK: Record<BackendLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const SCOPE_ENV_KEY: Record<BackendLogScope, string> = {
  app: "HELLO_LOG_APP",
  http: "HELLO_LOG_HTTP",
};

const SCOPE_DEFAULT_ENABLED: Record<BackendLogScope, boolean> = {
  app: true,
  http: true,
};

function isTestRuntime(): boolean {
  return process.env.NODE_ENV === "test" || process.env.VITEST === "true";
}

function isBackendLogLevel(value: string): value is BackendLogLevel {
  return VALID_LEVELS.includes(value);
}

export function parseBooleanEnvFlag(rawValue: string | undefined, defaultValue: boolean): boolean {
  if (typeof rawValue !== "string") {
    return defaultValue;
  }

  const normalized = rawValue.trim().toLowerCase();

  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }

  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }

  return defaultValue;
}

export function parseBackendLogLevel(rawValue: string | undefined): BackendLogLevel {
  if (typeof rawValue !== "string") {
    return DEFAULT_LEVEL;
  }

  const normalized = rawValue.trim().toLowerCase();
  return isBackendLogLevel(normalized) ? normalized : DEFAULT_LEVEL;
}

function shouldEmitLogs(): boolean {
  if (parseBooleanEnvFlag(process.env.HELLO_LOG_FORCE, false)) {
    return true;
  }

  return !isTestRuntime();
}

function getActiveLogLevel(): BackendLogLevel {
  return parseBackendLogLevel(process.env.HELLO_LOG_LEVEL);
}

function shouldEmitLevel(level: BackendLogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[getActiveLogLevel()];
}

export function isBackendLogScopeEnabled(scope: BackendLogScope): boolean {
  if (!shouldEmitLogs()) {
    return false;
  }

  return parseBooleanEnvFlag(process.env[SCOPE_ENV_KEY[scope]], SCOPE_DEFAULT_ENABLED[scope]);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function sanitizeMetadata(value: unknown): unknown {
  if (typeof value === "string") {
    const maxLength = 200;
    return value.length > maxLength
      ? `${value.slice(0, maxLength)}... (truncated, len=${value.length})`
      : value;
  }

  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }

  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entryValue]) => [key, sanitizeMetadata(entryValue)]),
    );
  }

  return value;
}

function stringifyMetadata(metadata: Record<string, unknown> | undefined): string {
  if (!metadata || Object.keys(metadata).length === 0) {
    return "";
  }

  try {
    return JSON.stringify(sanitizeMetadata(metadata));
  } catch {
    return "[unserializable-metadata]";
  }
}

export function formatLogLine(
  timestamp: string,
  scope: BackendLogScope,
  message: string,
  metadata?: Record<string, unknown>,
): string {
  const prefix = `[${timestamp}] [${scope}]`;
  const metadataChunk = stringifyMetadata(metadata);
  return metadataChunk.length > 0 ? `${prefix} ${message} ${metadataChunk}` : `${prefix} ${message}`;
}

export function logBackendEvent(
  scope: BackendLogScope,
  level: BackendLogLevel,
  message: string,
  metadata?: Record<string, unknown>,
) {
  if (!isBackendLogScopeEnabled(scope) || !shouldEmitLevel(level)) {
    return;
  }

  const line = formatLogLine(new Date().toISOString(), scope, message, metadata);

  if (level === "error") {
    console.error(line);
    return;
  }

  if (level === "warn") {
    console.warn(line);
    return;
  }

  console.info(line);
}

export function getBackendLoggingConfigSnapshot(): Record<string, unknown> {
  return {
    level: getActiveLogLevel(),
    scopes: {
      app: isBackendLogScopeEnabled("app"),
      http: isBackendLogScopeEnabled("http"),
    },
  };
}

export type { BackendLogLevel, BackendLogScope };
