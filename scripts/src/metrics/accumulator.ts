import type {
  AccuracyStat,
  Family,
  GroupKey,
  LogRecord,
  ModelRole,
  RoutingMode
} from "lib/report/types.js";

import { FAMILIES, MODEL_ROLES, ROUTING_MODES } from "../constants.js";

interface Counter {
  nTotal: number;
  nCorrect: number;
}

/** Counts of (predicted family, true family) cells for one role under one routing mode. */
export type ConfusionMatrix = Record<Family, Record<Family, number>>;

export interface ConfusionTable {
  modelRole: ModelRole;
  routingMode: RoutingMode;
  matrix: ConfusionMatrix;
}

export interface AccumulatorSnapshot {
  records: number;
  stats: AccuracyStat[];
  confusion: ConfusionTable[];
}

export function groupKeyId(key: GroupKey): string {
  return `${key.family}/${key.modelRole}/${key.routingMode}`;
}

export function createConfusionMatrix(): ConfusionMatrix {
  return {
    psk: { psk: 0, qam: 0, analog: 0 },
    qam: { psk: 0, qam: 0, analog: 0 },
    analog: { psk: 0, qam: 0, analog: 0 }
  };
}

/**
 * Per-run accumulator of correctness counts. Create one per run and pass it
 * through the pipeline; accuracies are derived once, in `finalize()`.
 */
export class AccuracyAccumulator {
  private readonly counters = new Map<string, Counter>();
  private readonly confusion = new Map<string, ConfusionMatrix>();
  private records = 0;

  add(record: LogRecord): void {
    const id = groupKeyId(record);
    const counter = this.counters.get(id) ?? { nTotal: 0, nCorrect: 0 };
    counter.nTotal += 1;
    if (record.correct) {
      counter.nCorrect += 1;
    }
    this.counters.set(id, counter);
    this.records += 1;

    if (record.predictedFamily !== undefined) {
      const tableId = `${record.modelRole}/${record.routingMode}`;
      const matrix = this.confusion.get(tableId) ?? createConfusionMatrix();
      matrix[record.predictedFamily][record.family] += 1;
      this.confusion.set(tableId, matrix);
    }
  }

  async addAll(records: AsyncIterable<LogRecord> | Iterable<LogRecord>): Promise<void> {
    for await (const record of records) {
      this.add(record);
    }
  }

  get size(): number {
    return this.records;
  }

  finalize(): AccumulatorSnapshot {
    const stats: AccuracyStat[] = [];
    const confusion: ConfusionTable[] = [];

    // Walk the closed enumerations rather than the maps so output order never depends on arrival order.
    for (const routingMode of ROUTING_MODES) {
      for (const family of FAMILIES) {
        for (const modelRole of MODEL_ROLES) {
          const key: GroupKey = { family, modelRole, routingMode };
          const counter = this.counters.get(groupKeyId(key));
          if (counter) {
            stats.push(toAccuracyStat(key, counter));
          }
        }
      }
      for (const modelRole of MODEL_ROLES) {
        const matrix = this.confusion.get(`${modelRole}/${routingMode}`);
        if (matrix) {
          confusion.push({ modelRole, routingMode, matrix: cloneMatrix(matrix) });
        }
      }
    }

    return { records: this.records, stats, confusion };
  }
}

export function toAccuracyStat(key: GroupKey, counter: Counter): AccuracyStat {
  if (counter.nCorrect > counter.nTotal || counter.nCorrect < 0) {
    throw new RangeError(`nCorrect ${counter.nCorrect} outside [0, ${counter.nTotal}] for ${groupKeyId(key)}`);
  }
  return {
    key,
    nTotal: counter.nTotal,
    nCorrect: counter.nCorrect,
    accuracy: counter.nTotal === 0 ? null : counter.nCorrect / counter.nTotal
  };
}

function cloneMatrix(matrix: ConfusionMatrix): ConfusionMatrix {
  const copy = createConfusionMatrix();
  for (const predicted of FAMILIES) {
    for (const actual of FAMILIES) {
      copy[predicted][actual] = matrix[predicted][actual];
    }
  }
  return copy;
}
