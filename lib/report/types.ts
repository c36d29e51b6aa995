export type Family = "psk" | "qam" | "analog";

export type ModelRole = "generalist" | "specialist";

export type RoutingMode = "oracle" | "predicted";

export interface LogRecord {
  study: string;
  family: Family;
  modelRole: ModelRole;
  routingMode: RoutingMode;
  correct: boolean;
  /** Family the routing classifier predicted; only some loggers emit it. */
  predictedFamily?: Family;
}

/**
 * Wire shape of a log line once field aliases are folded onto canonical names.
 */
export interface RawLogEntry {
  study: string;
  data: {
    family: Family;
    model_role: ModelRole;
    routing_mode: RoutingMode;
    correct: boolean | 0 | 1;
    predicted_family?: Family;
  };
}

export interface GroupKey {
  family: Family;
  modelRole: ModelRole;
  routingMode: RoutingMode;
}

export interface AccuracyStat {
  key: GroupKey;
  nTotal: number;
  nCorrect: number;
  /** `null` when nTotal is 0. */
  accuracy: number | null;
}

export interface SpecializationGain {
  family: Family;
  routingMode: RoutingMode;
  generalistAccuracy: number;
  specialistAccuracy: number;
  /** 100 * (specialist - generalist), in percentage points. */
  deltaPp: number;
}

export type GainOutcome =
  | { status: "available"; gain: SpecializationGain }
  | { status: "unavailable"; family: Family; routingMode: RoutingMode; missingRoles: ModelRole[] };

export interface ConfusionDelta {
  routingMode: RoutingMode;
  predictedFamily: Family;
  trueFamily: Family;
  generalist: number;
  specialist: number;
  delta: number;
}

export type ParseIssueKind =
  | "invalid-json"
  | "invalid-shape"
  | "invalid-value"
  | "line-too-long"
  | "unreadable-source";

export interface ParseIssue {
  source: string;
  line: number;
  kind: ParseIssueKind;
  message: string;
}

export interface IncompleteGroup {
  family: Family;
  routingMode: RoutingMode;
  missingRoles: ModelRole[];
}

export interface ReportStats {
  stats: AccuracyStat[];
  gains: SpecializationGain[];
  confusionDeltas: ConfusionDelta[];
  incomplete: IncompleteGroup[];
}

export type EmptyReason = "no-sources" | "no-records" | "forced";

export type ReportData =
  | { kind: "real"; data: ReportStats }
  | { kind: "placeholder"; data: ReportStats; reason: EmptyReason };

export interface ReadStats {
  sources: string[];
  linesRead: number;
  accepted: number;
  ignored: number;
  skipped: number;
  /** Sources that could not be opened or failed part-way through. */
  unreadable: number;
  issues: ParseIssue[];
}

export interface ArtifactFile {
  /** Path relative to the output root. */
  path: string;
  content: string;
}

export interface ArtifactSet {
  source: ReportData["kind"];
  files: ArtifactFile[];
  warnings: string[];
}

export type RunState =
  | "START"
  | "READING"
  | "AGGREGATING"
  | "SYNTHESIZING"
  | "EMITTING"
  | "DONE"
  | "FAILED";
