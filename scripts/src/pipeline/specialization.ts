import { resolve } from "node:path";

import type { EmptyReason, ReadStats, ReportData, RoutingMode, RunState } from "lib/report/types.js";

import type { ReportRuntimeConfig } from "../config/env.js";
import { discoverLogSources } from "../logs/sources.js";
import { LogReader } from "../logs/reader.js";
import { AccuracyAccumulator } from "../metrics/accumulator.js";
import { buildReportStats } from "../metrics/gains.js";
import { synthesizePlaceholder } from "../metrics/placeholder.js";
import { renderArtifacts, type ArtifactLayout } from "../report/render.js";
import { WriteFailure, writeArtifactsAtomically } from "../report/write_artifacts.js";
import { logger } from "../utils/logger.js";
import { toPortableRelative } from "../utils/path.js";

export interface SpecializationReportOptions extends ReportRuntimeConfig {
  /** Root against which the artifact layout is resolved. */
  outputRoot: string;
  layout: ArtifactLayout;
  /** Skip the logs and emit the placeholder set. */
  forcePlaceholder?: boolean;
  onStateChange?: (state: RunState) => void;
}

export interface RunReport {
  states: RunState[];
  report: ReportData;
  readStats: ReadStats | null;
  warnings: string[];
  written: string[];
}

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  START: ["READING"],
  READING: ["AGGREGATING", "SYNTHESIZING"],
  AGGREGATING: ["EMITTING"],
  SYNTHESIZING: ["EMITTING"],
  EMITTING: ["DONE", "FAILED"],
  DONE: [],
  FAILED: []
};

export class RunStateMachine {
  private readonly visited: RunState[] = ["START"];

  constructor(private readonly onStateChange?: (state: RunState) => void) {}

  get current(): RunState {
    return this.visited[this.visited.length - 1] ?? "START";
  }

  get history(): RunState[] {
    return [...this.visited];
  }

  transition(next: RunState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal run state transition ${this.current} -> ${next}`);
    }
    this.visited.push(next);
    logger.debug("Run state changed", { state: next });
    this.onStateChange?.(next);
  }
}

/**
 * One run: read the study's logs, aggregate them (or fall back to the
 * placeholder set when nothing matches) and publish the artifact set.
 * Malformed lines and unreadable sources are counted in `readStats`; a failed
 * emission ends in `FAILED` and surfaces as `WriteFailure`.
 */
export async function runSpecializationReport(options: SpecializationReportOptions): Promise<RunReport> {
  const machine = new RunStateMachine(options.onStateChange);

  machine.transition("READING");
  const ingest = options.forcePlaceholder ? null : await ingestLogs(options);

  let report: ReportData;
  if (!ingest || ingest.accumulator.size === 0) {
    const reason: EmptyReason = !ingest ? "forced" : ingest.sources.length === 0 ? "no-sources" : "no-records";
    machine.transition("SYNTHESIZING");
    logger.warn("No matching log records; emitting placeholder artifacts", { study: options.study, reason });
    report = synthesizePlaceholder(reason);
  } else {
    machine.transition("AGGREGATING");
    report = { kind: "real", data: buildReportStats(ingest.accumulator.finalize()) };
  }

  const readStats = ingest?.reader.stats ?? null;
  machine.transition("EMITTING");
  const artifacts = renderArtifacts({
    report,
    study: options.study,
    routingMode: options.routingMode,
    layout: options.layout,
    readStats,
    sourceLabel: (source) => toPortableRelative(resolve(options.logDir), source)
  });

  let written: string[];
  try {
    ({ written } = await writeArtifactsAtomically(artifacts.files, {
      root: options.outputRoot,
      lockStaleMs: options.lockStaleMs
    }));
  } catch (error) {
    machine.transition("FAILED");
    logger.error("Artifact emission failed", { error: error instanceof Error ? error.message : String(error) });
    if (error instanceof WriteFailure) {
      throw error;
    }
    throw new WriteFailure("Artifact emission failed", { cause: error });
  }
  machine.transition("DONE");

  logSummary(options.study, options.routingMode, report, readStats, artifacts.warnings, written);

  return {
    states: machine.history,
    report,
    readStats,
    warnings: artifacts.warnings,
    written
  };
}

async function ingestLogs(
  options: SpecializationReportOptions
): Promise<{ sources: string[]; reader: LogReader; accumulator: AccuracyAccumulator }> {
  const sources = await discoverLogSources({ logDir: options.logDir, pattern: options.pattern });
  const reader = new LogReader(sources, { study: options.study, maxLineBytes: options.maxLineBytes });
  const accumulator = new AccuracyAccumulator();
  await accumulator.addAll(reader.records());
  return { sources, reader, accumulator };
}

function logSummary(
  study: string,
  routingMode: RoutingMode,
  report: ReportData,
  readStats: ReadStats | null,
  warnings: readonly string[],
  written: readonly string[]
): void {
  for (const warning of warnings) {
    logger.warn(warning);
  }
  if (readStats && readStats.unreadable > 0) {
    logger.warn("Some log sources could not be read", {
      unreadable: readStats.unreadable,
      sources: readStats.issues.filter((issue) => issue.kind === "unreadable-source").map((issue) => issue.source)
    });
  }
  if (readStats && readStats.skipped > 0) {
    logger.warn("Skipped malformed log entries", {
      skipped: readStats.skipped,
      firstIssues: readStats.issues.slice(0, 5).map((issue) => `${issue.source}:${issue.line} ${issue.kind}`)
    });
  }
  logger.info("Specialization report written", {
    study,
    routingMode,
    source: report.kind,
    accepted: readStats?.accepted ?? 0,
    ignored: readStats?.ignored ?? 0,
    skipped: readStats?.skipped ?? 0,
    unreadable: readStats?.unreadable ?? 0,
    gains: report.data.gains.length,
    omitted: warnings.length,
    files: written.length
  });
}
