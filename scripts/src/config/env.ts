import type { RoutingMode } from "lib/report/types.js";

import {
  DEFAULT_LOCK_STALE_MS,
  DEFAULT_LOG_DIR,
  DEFAULT_LOG_PATTERN,
  DEFAULT_MAX_LINE_BYTES,
  DEFAULT_ROUTING_MODE,
  DEFAULT_STUDY,
  REPORT_ENV_VARIABLES,
  ROUTING_MODES
} from "../constants.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface ReportRuntimeConfig {
  logDir: string;
  pattern: string;
  study: string;
  routingMode: RoutingMode;
  maxLineBytes: number;
  lockStaleMs: number;
}

export function isRoutingMode(value: string): value is RoutingMode {
  return ROUTING_MODES.some((mode) => mode === value);
}

export function parseRoutingMode(value: string, source: string): RoutingMode {
  if (!isRoutingMode(value)) {
    throw new ConfigError(`${source} must be one of ${ROUTING_MODES.join(", ")}, got: ${value}`);
  }
  return value;
}

export function parsePositiveInt(value: string | undefined, fallback: number, source: string): number {
  if (value === undefined || value === "") {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${source} must be a positive integer, got: ${value}`);
  }
  return parsed;
}

function readString(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
  const value = env[key];
  return value !== undefined && value !== "" ? value : fallback;
}

export function resolveReportRuntimeConfig(env: NodeJS.ProcessEnv = process.env): ReportRuntimeConfig {
  const routingRaw = env[REPORT_ENV_VARIABLES.routingMode];

  return {
    logDir: readString(env, REPORT_ENV_VARIABLES.logDir, DEFAULT_LOG_DIR),
    pattern: readString(env, REPORT_ENV_VARIABLES.pattern, DEFAULT_LOG_PATTERN),
    study: readString(env, REPORT_ENV_VARIABLES.study, DEFAULT_STUDY),
    routingMode:
      routingRaw === undefined || routingRaw === ""
        ? DEFAULT_ROUTING_MODE
        : parseRoutingMode(routingRaw, REPORT_ENV_VARIABLES.routingMode),
    maxLineBytes: parsePositiveInt(
      env[REPORT_ENV_VARIABLES.maxLineBytes],
      DEFAULT_MAX_LINE_BYTES,
      REPORT_ENV_VARIABLES.maxLineBytes
    ),
    lockStaleMs: parsePositiveInt(
      env[REPORT_ENV_VARIABLES.lockStaleMs],
      DEFAULT_LOCK_STALE_MS,
      REPORT_ENV_VARIABLES.lockStaleMs
    )
  };
}
