import { describe, expect, it } from "vitest";

import type { Family, LogRecord, ModelRole, RoutingMode } from "lib/report/types.js";

import { AccuracyAccumulator, toAccuracyStat } from "../src/metrics/accumulator.js";
import { buildReportStats, computeConfusionDeltas, computeGains } from "../src/metrics/gains.js";
import { STUDY } from "./fixtures/logs.js";

function records(
  family: Family,
  modelRole: ModelRole,
  total: number,
  correct: number,
  routingMode: RoutingMode = "oracle",
): LogRecord[] {
  return Array.from({ length: total }, (_, index) => ({
    study: STUDY,
    family,
    modelRole,
    routingMode,
    correct: index < correct,
  }));
}

function predicted(modelRole: ModelRole, family: Family, predictedFamily: Family, count: number): LogRecord[] {
  return Array.from({ length: count }, () => ({
    study: STUDY,
    family,
    modelRole,
    routingMode: "oracle" as const,
    correct: family === predictedFamily,
    predictedFamily,
  }));
}

describe("AccuracyAccumulator", () => {
  it("derives per-group accuracy from correctness counts", async () => {
    const accumulator = new AccuracyAccumulator();
    await accumulator.addAll([...records("psk", "generalist", 100, 80), ...records("psk", "specialist", 100, 93)]);

    const snapshot = accumulator.finalize();

    expect(snapshot.records).toBe(200);
    expect(snapshot.stats.map((stat) => [stat.key.modelRole, stat.nTotal, stat.nCorrect])).toEqual([
      ["generalist", 100, 80],
      ["specialist", 100, 93],
    ]);
    expect(snapshot.stats[0]?.accuracy).toBe(0.8);
    expect(snapshot.stats[1]?.accuracy).toBe(0.93);
  });

  it("is independent of arrival order", async () => {
    const all = [
      ...records("qam", "specialist", 7, 5, "predicted"),
      ...records("psk", "generalist", 10, 3),
      ...records("analog", "generalist", 4, 4),
      ...predicted("specialist", "psk", "qam", 2),
    ];

    const forward = new AccuracyAccumulator();
    await forward.addAll(all);
    const backward = new AccuracyAccumulator();
    await backward.addAll([...all].reverse());

    expect(backward.finalize()).toEqual(forward.finalize());
  });

  it("orders stats by routing mode, family, then role", async () => {
    const accumulator = new AccuracyAccumulator();
    accumulator.add({ study: STUDY, family: "analog", modelRole: "specialist", routingMode: "predicted", correct: true });
    accumulator.add({ study: STUDY, family: "qam", modelRole: "generalist", routingMode: "oracle", correct: false });
    accumulator.add({ study: STUDY, family: "psk", modelRole: "specialist", routingMode: "oracle", correct: true });

    const keys = accumulator.finalize().stats.map((stat) => `${stat.key.routingMode}/${stat.key.family}/${stat.key.modelRole}`);

    expect(keys).toEqual(["oracle/psk/specialist", "oracle/qam/generalist", "predicted/analog/specialist"]);
  });
});

describe("toAccuracyStat", () => {
  it("leaves accuracy undefined for an empty group", () => {
    const stat = toAccuracyStat({ family: "psk", modelRole: "generalist", routingMode: "oracle" }, { nTotal: 0, nCorrect: 0 });
    expect(stat.accuracy).toBeNull();
  });

  it("rejects more correct answers than samples", () => {
    expect(() =>
      toAccuracyStat({ family: "psk", modelRole: "generalist", routingMode: "oracle" }, { nTotal: 2, nCorrect: 3 }),
    ).toThrow(RangeError);
  });
});

describe("computeGains", () => {
  it("reports the specialist gain in percentage points", async () => {
    const accumulator = new AccuracyAccumulator();
    await accumulator.addAll([...records("psk", "generalist", 100, 80), ...records("psk", "specialist", 100, 93)]);

    const outcomes = computeGains(accumulator.finalize().stats);

    expect(outcomes).toHaveLength(1);
    const [outcome] = outcomes;
    if (outcome?.status !== "available") {
      throw new Error("expected an available gain");
    }
    expect(outcome.gain.family).toBe("psk");
    expect(outcome.gain.routingMode).toBe("oracle");
    expect(outcome.gain.deltaPp).toBeCloseTo(13.0, 9);
  });

  it("marks a family with only one role as unavailable", async () => {
    const accumulator = new AccuracyAccumulator();
    await accumulator.addAll(records("qam", "generalist", 10, 6));

    expect(computeGains(accumulator.finalize().stats)).toEqual([
      { status: "unavailable", family: "qam", routingMode: "oracle", missingRoles: ["specialist"] },
    ]);
  });

  it("keeps routing modes apart", async () => {
    const accumulator = new AccuracyAccumulator();
    await accumulator.addAll([
      ...records("psk", "generalist", 10, 5, "oracle"),
      ...records("psk", "specialist", 10, 9, "predicted"),
    ]);

    const statuses = computeGains(accumulator.finalize().stats).map((outcome) =>
      outcome.status === "unavailable" ? `${outcome.routingMode}:${outcome.missingRoles.join("/")}` : "available",
    );

    expect(statuses).toEqual(["oracle:specialist", "predicted:generalist"]);
  });
});

describe("computeConfusionDeltas", () => {
  it("subtracts generalist from specialist counts per cell", async () => {
    const accumulator = new AccuracyAccumulator();
    await accumulator.addAll([
      ...predicted("generalist", "psk", "qam", 2),
      ...predicted("generalist", "psk", "psk", 1),
      ...predicted("specialist", "psk", "qam", 1),
      ...predicted("specialist", "psk", "psk", 2),
    ]);

    const deltas = computeConfusionDeltas(accumulator.finalize().confusion);

    expect(deltas).toHaveLength(9);
    expect(deltas.slice(0, 3).map((cell) => [cell.predictedFamily, cell.trueFamily])).toEqual([
      ["psk", "psk"],
      ["psk", "qam"],
      ["psk", "analog"],
    ]);
    expect(deltas.find((cell) => cell.predictedFamily === "psk" && cell.trueFamily === "psk")?.delta).toBe(1);
    expect(deltas.find((cell) => cell.predictedFamily === "qam" && cell.trueFamily === "psk")).toEqual({
      routingMode: "oracle",
      predictedFamily: "qam",
      trueFamily: "psk",
      generalist: 2,
      specialist: 1,
      delta: -1,
    });
    expect(deltas.filter((cell) => cell.delta !== 0)).toHaveLength(2);
  });

  it("needs both roles to have predicted families", async () => {
    const accumulator = new AccuracyAccumulator();
    await accumulator.addAll([...predicted("generalist", "qam", "qam", 3), ...records("qam", "specialist", 3, 3)]);

    expect(computeConfusionDeltas(accumulator.finalize().confusion)).toEqual([]);
  });
});

describe("buildReportStats", () => {
  it("splits outcomes into gains and incomplete groups", async () => {
    const accumulator = new AccuracyAccumulator();
    await accumulator.addAll([
      ...records("psk", "generalist", 100, 80),
      ...records("psk", "specialist", 100, 93),
      ...records("qam", "generalist", 10, 6),
    ]);

    const report = buildReportStats(accumulator.finalize());

    expect(report.gains.map((gain) => gain.family)).toEqual(["psk"]);
    expect(report.incomplete).toEqual([{ family: "qam", routingMode: "oracle", missingRoles: ["specialist"] }]);
    expect(report.confusionDeltas).toEqual([]);
    expect(report.stats).toHaveLength(3);
  });
});
