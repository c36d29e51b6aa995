import type { EmptyReason, Family, ModelRole, ReportData, RoutingMode } from "lib/report/types.js";

import { FAMILIES, MODEL_ROLES, ROUTING_MODES } from "../constants.js";
import {
  type AccumulatorSnapshot,
  type ConfusionMatrix,
  type ConfusionTable,
  toAccuracyStat
} from "./accumulator.js";
import { buildReportStats } from "./gains.js";

/** Placeholder counts are expressed per this many samples. */
export const PLACEHOLDER_SAMPLES = 1000;

// Illustrative figures for drafting the paper before real runs exist.
// Correct counts per PLACEHOLDER_SAMPLES, indexed [routingMode][modelRole][family].
const PLACEHOLDER_CORRECT: Record<RoutingMode, Record<ModelRole, Record<Family, number>>> = {
  oracle: {
    generalist: { psk: 852, qam: 821, analog: 789 },
    specialist: { psk: 886, qam: 842, analog: 836 }
  },
  predicted: {
    generalist: { psk: 852, qam: 821, analog: 789 },
    specialist: { psk: 871, qam: 830, analog: 818 }
  }
};

// [predicted][true]; each true-family column sums to PLACEHOLDER_SAMPLES and the diagonal matches oracle accuracy.
const PLACEHOLDER_CONFUSION: Record<ModelRole, ConfusionMatrix> = {
  generalist: {
    psk: { psk: 852, qam: 131, analog: 97 },
    qam: { psk: 118, qam: 821, analog: 114 },
    analog: { psk: 30, qam: 48, analog: 789 }
  },
  specialist: {
    psk: { psk: 886, qam: 110, analog: 71 },
    qam: { psk: 92, qam: 842, analog: 93 },
    analog: { psk: 22, qam: 48, analog: 836 }
  }
};

export function placeholderSnapshot(): AccumulatorSnapshot {
  const stats = ROUTING_MODES.flatMap((routingMode) =>
    FAMILIES.flatMap((family) =>
      MODEL_ROLES.map((modelRole) =>
        toAccuracyStat(
          { family, modelRole, routingMode },
          { nTotal: PLACEHOLDER_SAMPLES, nCorrect: PLACEHOLDER_CORRECT[routingMode][modelRole][family] }
        )
      )
    )
  );

  return {
    records: stats.length * PLACEHOLDER_SAMPLES,
    stats,
    confusion: MODEL_ROLES.map((modelRole): ConfusionTable => ({
      modelRole,
      routingMode: "oracle",
      matrix: structuredClone(PLACEHOLDER_CONFUSION[modelRole])
    }))
  };
}

/**
 * Fixed substitute statistics used when no matching log data exists. The
 * result is always tagged `placeholder` so the emitter marks every artifact.
 */
export function synthesizePlaceholder(reason: EmptyReason): ReportData {
  return {
    kind: "placeholder",
    reason,
    data: buildReportStats(placeholderSnapshot())
  };
}
