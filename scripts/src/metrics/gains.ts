import type {
  AccuracyStat,
  ConfusionDelta,
  Family,
  GainOutcome,
  IncompleteGroup,
  ModelRole,
  ReportStats,
  RoutingMode,
  SpecializationGain
} from "lib/report/types.js";

import { FAMILIES, MODEL_ROLES, ROUTING_MODES } from "../constants.js";
import type { AccumulatorSnapshot, ConfusionTable } from "./accumulator.js";

export function findStat(
  stats: readonly AccuracyStat[],
  family: Family,
  modelRole: ModelRole,
  routingMode: RoutingMode
): AccuracyStat | undefined {
  return stats.find(
    (stat) => stat.key.family === family && stat.key.modelRole === modelRole && stat.key.routingMode === routingMode
  );
}

/**
 * One outcome per (routing mode, family) that has data for at least one role.
 * A gain is only available when both roles have a defined accuracy.
 */
export function computeGains(stats: readonly AccuracyStat[]): GainOutcome[] {
  const outcomes: GainOutcome[] = [];

  for (const routingMode of ROUTING_MODES) {
    for (const family of FAMILIES) {
      const found = MODEL_ROLES.map((role) => ({ role, stat: findStat(stats, family, role, routingMode) }));
      if (found.every((entry) => entry.stat === undefined)) {
        continue;
      }

      const accuracyOf = (role: ModelRole): number | null =>
        found.find((entry) => entry.role === role)?.stat?.accuracy ?? null;
      const generalistAccuracy = accuracyOf("generalist");
      const specialistAccuracy = accuracyOf("specialist");
      if (generalistAccuracy === null || specialistAccuracy === null) {
        outcomes.push({
          status: "unavailable",
          family,
          routingMode,
          missingRoles: MODEL_ROLES.filter((role) => accuracyOf(role) === null)
        });
        continue;
      }

      outcomes.push({
        status: "available",
        gain: {
          family,
          routingMode,
          generalistAccuracy,
          specialistAccuracy,
          deltaPp: 100 * (specialistAccuracy - generalistAccuracy)
        }
      });
    }
  }

  return outcomes;
}

/**
 * Specialist minus generalist count for every (predicted, true) cell, per
 * routing mode where both roles logged predicted families.
 */
export function computeConfusionDeltas(tables: readonly ConfusionTable[]): ConfusionDelta[] {
  const deltas: ConfusionDelta[] = [];

  for (const routingMode of ROUTING_MODES) {
    const generalist = tables.find((table) => table.routingMode === routingMode && table.modelRole === "generalist");
    const specialist = tables.find((table) => table.routingMode === routingMode && table.modelRole === "specialist");
    if (!generalist || !specialist) {
      continue;
    }
    for (const predictedFamily of FAMILIES) {
      for (const trueFamily of FAMILIES) {
        const generalistCount = generalist.matrix[predictedFamily][trueFamily];
        const specialistCount = specialist.matrix[predictedFamily][trueFamily];
        deltas.push({
          routingMode,
          predictedFamily,
          trueFamily,
          generalist: generalistCount,
          specialist: specialistCount,
          delta: specialistCount - generalistCount
        });
      }
    }
  }

  return deltas;
}

export function buildReportStats(snapshot: AccumulatorSnapshot): ReportStats {
  const outcomes = computeGains(snapshot.stats);
  const gains: SpecializationGain[] = [];
  const incomplete: IncompleteGroup[] = [];

  for (const outcome of outcomes) {
    if (outcome.status === "available") {
      gains.push(outcome.gain);
    } else {
      incomplete.push({
        family: outcome.family,
        routingMode: outcome.routingMode,
        missingRoles: outcome.missingRoles
      });
    }
  }

  return {
    stats: snapshot.stats,
    gains,
    confusionDeltas: computeConfusionDeltas(snapshot.confusion),
    incomplete
  };
}
