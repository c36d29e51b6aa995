import type { Family, ModelRole, RoutingMode } from "lib/report/types.js";

export const FAMILIES: readonly Family[] = ["psk", "qam", "analog"];
export const MODEL_ROLES: readonly ModelRole[] = ["generalist", "specialist"];
export const ROUTING_MODES: readonly RoutingMode[] = ["oracle", "predicted"];

// LaTeX macro names cannot carry digits or underscores.
export const FAMILY_MACRO_PREFIX: Record<Family, string> = {
  psk: "PSK",
  qam: "QAM",
  analog: "Analog"
};

export const ROUTING_MACRO_SUFFIX: Record<RoutingMode, string> = {
  oracle: "Oracle",
  predicted: "Predicted"
};

export const DEFAULT_STUDY = "specialization_per_modulation_family";
export const DEFAULT_LOG_DIR = "../logs";
export const DEFAULT_LOG_PATTERN = "metrics_*.jsonl";
export const DEFAULT_ROUTING_MODE: RoutingMode = "oracle";
export const DEFAULT_FIGS_DIR = "figs";
export const DEFAULT_DATA_DIR = "data";
export const DEFAULT_MAX_LINE_BYTES = 64 * 1024;
export const DEFAULT_LOCK_STALE_MS = 10 * 60 * 1000;

export const ARTIFACT_NAMES = {
  callouts: "specialization_callouts.tex",
  table: "specialization_table.tex",
  manifest: "specialization_manifest.yaml",
  gainSeries: "specialization_gain_vs_generalist.csv",
  confusionSeries: "family_confusion_deltas.csv"
} as const;

// Plot series live beside the figures they redraw.
export const SERIES_SUBDIR = "data";

export const LOCK_FILE_NAME = ".specialization-report.lock";

export const REPORT_ENV_VARIABLES = {
  logDir: "SPECGAIN_LOG_DIR",
  pattern: "SPECGAIN_LOG_PATTERN",
  study: "SPECGAIN_STUDY",
  routingMode: "SPECGAIN_ROUTING_MODE",
  maxLineBytes: "SPECGAIN_MAX_LINE_BYTES",
  lockStaleMs: "SPECGAIN_LOCK_STALE_MS"
} as const;

export const PERCENT_DIGITS = 1;
export const SERIES_DIGITS = 3;
