import { posix } from "node:path";

import type {
  AccuracyStat,
  ArtifactFile,
  ArtifactSet,
  Family,
  ModelRole,
  ReadStats,
  ReportData,
  RoutingMode,
  SpecializationGain
} from "lib/report/types.js";

import {
  ARTIFACT_NAMES,
  FAMILIES,
  FAMILY_MACRO_PREFIX,
  ROUTING_MACRO_SUFFIX,
  SERIES_DIGITS,
  SERIES_SUBDIR
} from "../constants.js";
import { findStat } from "../metrics/gains.js";
import {
  computeSha256,
  ensureTrailingNewline,
  formatFixed,
  formatPercent,
  formatSignedPp,
  stringifyDeterministic
} from "./deterministic.js";

export interface ArtifactLayout {
  /** Directory for TeX data files, relative to the output root. */
  dataDir: string;
  /** Directory for figures; plot series go to its `data/` subdirectory. */
  figsDir: string;
}

export interface RenderInput {
  report: ReportData;
  study: string;
  routingMode: RoutingMode;
  layout: ArtifactLayout;
  /** Reader counters; `null` when no source was read. */
  readStats: ReadStats | null;
  /** Label used for source files in the manifest. */
  sourceLabel?: (source: string) => string;
}

const PLACEHOLDER_MARK = "SpecializationPlaceholderMark";
const PLACEHOLDER_BANNER = "PLACEHOLDER DATA: illustrative values, not experimental results.";

export function renderArtifacts(input: RenderInput): ArtifactSet {
  const { report, routingMode, layout } = input;
  const warnings = collectOmissions(report, routingMode);

  const files: ArtifactFile[] = [
    { path: posix.join(layout.dataDir, ARTIFACT_NAMES.callouts), content: renderCallouts(report, routingMode) },
    { path: posix.join(layout.dataDir, ARTIFACT_NAMES.table), content: renderTable(report, routingMode) },
    {
      path: posix.join(layout.figsDir, SERIES_SUBDIR, ARTIFACT_NAMES.gainSeries),
      content: renderGainSeries(report)
    },
    {
      path: posix.join(layout.figsDir, SERIES_SUBDIR, ARTIFACT_NAMES.confusionSeries),
      content: renderConfusionSeries(report)
    }
  ];

  files.push({
    path: posix.join(layout.dataDir, ARTIFACT_NAMES.manifest),
    content: renderManifest(input, files, warnings)
  });

  return { source: report.kind, files, warnings };
}

/**
 * Human-readable reasons for every family whose row or macros are left out
 * under the focus routing mode, plus every incomplete group in other modes.
 */
export function collectOmissions(report: ReportData, routingMode: RoutingMode): string[] {
  const warnings: string[] = [];
  const { gains, incomplete } = report.data;

  for (const group of incomplete) {
    warnings.push(
      `IncompleteGroup: ${group.family} (${group.routingMode}) has no ${group.missingRoles.join("/")} data; gain omitted`
    );
  }

  for (const family of FAMILIES) {
    const hasGain = gains.some((gain) => gain.family === family && gain.routingMode === routingMode);
    const isIncomplete = incomplete.some((group) => group.family === family && group.routingMode === routingMode);
    if (!hasGain && !isIncomplete) {
      warnings.push(`IncompleteGroup: ${family} (${routingMode}) has no records; row and macros omitted`);
    }
  }

  return warnings;
}

export function renderCallouts(report: ReportData, routingMode: RoutingMode): string {
  const lines: string[] = [...headerComment(report)];

  lines.push(`\\newcommand{\\SpecializationDataSource}{${report.kind}}`);
  lines.push(`\\newcommand{\\SpecializationRoutingMode}{${routingMode}}`);
  lines.push(
    report.kind === "placeholder"
      ? "\\newcommand{\\SpecializationPlaceholderNote}{\\textbf{[placeholder data]}}"
      : "\\newcommand{\\SpecializationPlaceholderNote}{}"
  );
  lines.push(
    report.kind === "placeholder"
      ? `\\newcommand{\\${PLACEHOLDER_MARK}}{\\textsuperscript{\\dag}}`
      : `\\newcommand{\\${PLACEHOLDER_MARK}}{}`
  );
  const mark = report.kind === "placeholder" ? `\\${PLACEHOLDER_MARK}` : "";

  const focus = gainsFor(report.data.gains, routingMode);
  if (focus.length === 0) {
    lines.push(`% No specialization callouts available for routing mode ${routingMode}.`);
  }
  for (const gain of focus) {
    lines.push(...gainMacros(FAMILY_MACRO_PREFIX[gain.family], gain, mark));
  }

  for (const gain of report.data.gains) {
    lines.push(
      ...gainMacros(`${FAMILY_MACRO_PREFIX[gain.family]}${ROUTING_MACRO_SUFFIX[gain.routingMode]}`, gain, mark)
    );
  }

  return joinLines(lines);
}

export function renderTable(report: ReportData, routingMode: RoutingMode): string {
  const caption =
    `Generalist vs specialist accuracy per modulation family (${routingMode} routing)` +
    (report.kind === "placeholder" ? " [placeholder data, not experimental results]." : ".");

  const lines: string[] = [...headerComment(report)];
  lines.push("\\begin{table}[t]");
  lines.push("  \\centering");
  lines.push(`  \\caption{${caption}}`);
  lines.push("  \\label{tab:specialization-results}");
  lines.push("  \\begin{tabular}{lrrrrr}");
  lines.push("    \\toprule");
  lines.push("    Family & Generalist (\\%) & Specialist (\\%) & $\\Delta$ (pp) & $N_{g}$ & $N_{s}$ \\\\");
  lines.push("    \\midrule");

  const focus = gainsFor(report.data.gains, routingMode);
  if (focus.length === 0) {
    lines.push("    \\multicolumn{6}{c}{No data available} \\\\");
  }
  for (const gain of focus) {
    const generalist = countOf(report.data.stats, gain.family, "generalist", routingMode);
    const specialist = countOf(report.data.stats, gain.family, "specialist", routingMode);
    lines.push(
      `    ${FAMILY_MACRO_PREFIX[gain.family]} & ${formatPercent(gain.generalistAccuracy)} & ` +
        `${formatPercent(gain.specialistAccuracy)} & ${formatSignedPp(gain.deltaPp)} & ${generalist} & ${specialist} \\\\`
    );
  }

  lines.push("    \\bottomrule");
  lines.push("  \\end{tabular}");
  lines.push("\\end{table}");
  return joinLines(lines);
}

export function renderGainSeries(report: ReportData): string {
  const lines = ["family,routing_mode,generalist_acc,specialist_acc,gain_pp,source"];
  for (const gain of report.data.gains) {
    lines.push(
      [
        gain.family,
        gain.routingMode,
        formatFixed(gain.generalistAccuracy * 100, SERIES_DIGITS),
        formatFixed(gain.specialistAccuracy * 100, SERIES_DIGITS),
        formatFixed(gain.deltaPp, SERIES_DIGITS),
        report.kind
      ].join(",")
    );
  }
  return joinLines(lines);
}

export function renderConfusionSeries(report: ReportData): string {
  const lines = ["routing_mode,predicted_family,true_family,generalist,specialist,delta,source"];
  for (const cell of report.data.confusionDeltas) {
    lines.push(
      [
        cell.routingMode,
        cell.predictedFamily,
        cell.trueFamily,
        String(cell.generalist),
        String(cell.specialist),
        String(cell.delta),
        report.kind
      ].join(",")
    );
  }
  return joinLines(lines);
}

function renderManifest(input: RenderInput, files: readonly ArtifactFile[], warnings: readonly string[]): string {
  const { report, readStats } = input;
  const label = input.sourceLabel ?? ((source: string) => source);

  const manifest = {
    study: input.study,
    source: report.kind,
    ...(report.kind === "placeholder" ? { placeholderReason: report.reason } : {}),
    routingMode: input.routingMode,
    records: {
      sources: readStats ? readStats.sources.map(label) : [],
      linesRead: readStats?.linesRead ?? 0,
      accepted: readStats?.accepted ?? 0,
      ignored: readStats?.ignored ?? 0,
      skipped: readStats?.skipped ?? 0,
      unreadable: readStats?.unreadable ?? 0
    },
    warnings: [...warnings],
    artifacts: Object.fromEntries(files.map((file) => [file.path, computeSha256(file.content)]))
  };

  return stringifyDeterministic(manifest);
}

// Placeholder values carry `mark` inside the macro so no use of them reads as a real result.
function gainMacros(prefix: string, gain: SpecializationGain, mark: string): string[] {
  return [
    `\\newcommand{\\${prefix}GeneralistAcc}{${formatPercent(gain.generalistAccuracy)}${mark}}`,
    `\\newcommand{\\${prefix}SpecialistAcc}{${formatPercent(gain.specialistAccuracy)}${mark}}`,
    `\\newcommand{\\${prefix}Gain}{${formatFixed(gain.deltaPp)}${mark}}`
  ];
}

function gainsFor(gains: readonly SpecializationGain[], routingMode: RoutingMode): SpecializationGain[] {
  return gains.filter((gain) => gain.routingMode === routingMode);
}

function countOf(
  stats: readonly AccuracyStat[],
  family: Family,
  modelRole: ModelRole,
  routingMode: RoutingMode
): number {
  return findStat(stats, family, modelRole, routingMode)?.nTotal ?? 0;
}

function headerComment(report: ReportData): string[] {
  const lines = ["% Generated by specialization-report; do not edit by hand."];
  if (report.kind === "placeholder") {
    lines.push(`% ${PLACEHOLDER_BANNER} (reason: ${report.reason})`);
  }
  return lines;
}

function joinLines(lines: readonly string[]): string {
  return ensureTrailingNewline(lines.join("\n"));
}
