import { constants } from "node:fs";
import { access } from "node:fs/promises";

import { get } from "lodash-es";

import type { LogRecord, ParseIssue, RawLogEntry, ReadStats } from "lib/report/types.js";

import { DEFAULT_MAX_LINE_BYTES, DEFAULT_STUDY } from "../constants.js";
import {
  isRecord,
  loadLogRecordValidator,
  validateLogEntry,
  type EntryValidation
} from "../contracts/validators.js";
import { errorCode } from "../utils/fs.js";
import { logger } from "../utils/logger.js";
import { readBoundedLines } from "./lines.js";

export interface LogReaderOptions {
  study?: string;
  maxLineBytes?: number;
}

// Older loggers wrote these field names; the first non-null candidate wins.
const FIELD_ALIASES: Record<string, readonly string[]> = {
  family: ["family", "true_family"],
  model_role: ["model_role", "role"],
  routing_mode: ["routing_mode", "routing"],
  predicted_family: ["predicted_family"]
};

// Only the first few issues are kept verbatim; the count stays exact.
const MAX_RECORDED_ISSUES = 100;

export type LineOutcome =
  | { kind: "record"; record: LogRecord }
  | { kind: "ignored" }
  | { kind: "issue"; issue: Omit<ParseIssue, "source" | "line"> };

/**
 * Streams validated records for one study out of newline-delimited JSON logs.
 *
 * Each line is judged on its own: malformed lines are counted in `stats` and
 * skipped, and lines belonging to another study are counted as ignored. A
 * source that cannot be opened or fails mid-read is counted as unreadable and
 * the remaining sources are still read. `records()` may be consumed once.
 */
export class LogReader {
  readonly stats: ReadStats;

  private readonly study: string;
  private readonly maxLineBytes: number;
  private consumed = false;

  constructor(private readonly sources: readonly string[], options: LogReaderOptions = {}) {
    this.study = options.study ?? DEFAULT_STUDY;
    this.maxLineBytes = options.maxLineBytes ?? DEFAULT_MAX_LINE_BYTES;
    this.stats = {
      sources: [...sources],
      linesRead: 0,
      accepted: 0,
      ignored: 0,
      skipped: 0,
      unreadable: 0,
      issues: []
    };
  }

  async *records(): AsyncGenerator<LogRecord, void, undefined> {
    if (this.consumed) {
      throw new Error("LogReader.records() can only be consumed once");
    }
    this.consumed = true;

    const validate = await loadLogRecordValidator();

    for (const source of this.sources) {
      let lineNumber = 0;
      try {
        // Surface unreadable sources before streaming.
        await access(source, constants.R_OK);
        for await (const line of readBoundedLines(source, this.maxLineBytes)) {
          lineNumber += 1;
          const trimmed = line.text?.trim();
          if (trimmed === "") {
            continue;
          }
          this.stats.linesRead += 1;

          const outcome =
            trimmed === undefined
              ? lineTooLong(this.maxLineBytes)
              : classifyLine(trimmed, this.study, (candidate) => validateLogEntry(validate, candidate));

          switch (outcome.kind) {
            case "record":
              this.stats.accepted += 1;
              yield outcome.record;
              break;
            case "ignored":
              this.stats.ignored += 1;
              break;
            case "issue":
              this.recordIssue({ ...outcome.issue, source, line: lineNumber });
              break;
          }
        }
      } catch (error) {
        this.recordUnreadable(source, lineNumber, error);
      }
    }

    logger.debug("Finished reading log sources", {
      sources: this.sources.length,
      accepted: this.stats.accepted,
      ignored: this.stats.ignored,
      skipped: this.stats.skipped,
      unreadable: this.stats.unreadable
    });
  }

  private recordIssue(issue: ParseIssue): void {
    this.stats.skipped += 1;
    this.keepIssue(issue);
    logger.debug("Skipped malformed log entry", { source: issue.source, line: issue.line, kind: issue.kind });
  }

  private recordUnreadable(source: string, line: number, error: unknown): void {
    this.stats.unreadable += 1;
    const message = error instanceof Error ? error.message : String(error);
    this.keepIssue({ source, line, kind: "unreadable-source", message });
    logger.warn("Could not read log source", { source, line, code: errorCode(error), error: message });
  }

  private keepIssue(issue: ParseIssue): void {
    if (this.stats.issues.length < MAX_RECORDED_ISSUES) {
      this.stats.issues.push(issue);
    }
  }
}

export function classifyLine(
  line: string,
  study: string,
  validate: (candidate: unknown) => EntryValidation
): LineOutcome {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    return {
      kind: "issue",
      issue: { kind: "invalid-json", message: error instanceof Error ? error.message : String(error) }
    };
  }

  const entryStudy: unknown = get(parsed, "study");
  if (!isRecord(parsed) || typeof entryStudy !== "string") {
    return { kind: "issue", issue: { kind: "invalid-shape", message: "entry has no string 'study' field" } };
  }
  if (entryStudy !== study) {
    return { kind: "ignored" };
  }

  const result = validate(foldFieldAliases(parsed));
  if (!result.valid) {
    return { kind: "issue", issue: { kind: result.kind, message: result.errors.join("; ") } };
  }
  return { kind: "record", record: toLogRecord(result.entry) };
}

export function foldFieldAliases(entry: Record<string, unknown>): Record<string, unknown> {
  const data: unknown = get(entry, "data");
  if (!isRecord(data)) {
    return entry;
  }

  const folded: Record<string, unknown> = { ...data };
  for (const [canonical, aliases] of Object.entries(FIELD_ALIASES)) {
    for (const alias of aliases) {
      delete folded[alias];
    }
    const value: unknown = aliases.map((alias) => data[alias]).find((candidate) => candidate !== undefined && candidate !== null);
    if (value !== undefined) {
      folded[canonical] = value;
    }
  }
  return { ...entry, data: folded };
}

function toLogRecord(entry: RawLogEntry): LogRecord {
  const { data } = entry;
  return {
    study: entry.study,
    family: data.family,
    modelRole: data.model_role,
    routingMode: data.routing_mode,
    correct: data.correct === true || data.correct === 1,
    ...(data.predicted_family !== undefined ? { predictedFamily: data.predicted_family } : {})
  };
}

function lineTooLong(maxLineBytes: number): LineOutcome {
  return {
    kind: "issue",
    issue: { kind: "line-too-long", message: `line exceeds ${maxLineBytes} bytes` }
  };
}
