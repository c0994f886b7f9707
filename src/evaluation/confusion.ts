import { AccumulatorFinalizedError } from './errors';
import type {
  AnchorScore,
  ConfusionCounts,
  FieldScore,
  Rates,
  ScoredCounts,
} from './types';

export const ZERO_COUNTS: ConfusionCounts = Object.freeze({ tp: 0, fp: 0, fn: 0 });

export function confusion(tp: number, fp: number, fn: number): ConfusionCounts {
  return Object.freeze({ tp, fp, fn });
}

export function addCounts(a: ConfusionCounts, b: ConfusionCounts): ConfusionCounts {
  return confusion(a.tp + b.tp, a.fp + b.fp, a.fn + b.fn);
}

export function deriveRates({ tp, fp, fn }: ConfusionCounts): Rates {
  const precision = tp + fp > 0 ? tp / (tp + fp) : 0;
  const recall = tp + fn > 0 ? tp / (tp + fn) : 0;
  const f1 = precision + recall > 0 ? (2 * precision * recall) / (precision + recall) : 0;
  return { precision, recall, f1 };
}

export function scoreCounts(counts: ConfusionCounts): ScoredCounts {
  return Object.freeze({ counts, ...deriveRates(counts) });
}

export function compareAnchors(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export interface ConfusionSummary {
  fields: readonly FieldScore[];
  overall: ScoredCounts;
  perAnchor: readonly AnchorScore[];
}

/**
 * Mutable builder for one evaluation run. Every contribution goes through
 * `add`, so the global total is always the sum of the field totals.
 */
export class ConfusionAccumulator {
  private readonly fieldTotals = new Map<string, ConfusionCounts>();
  private readonly anchorTotals = new Map<string, ConfusionCounts>();
  private total: ConfusionCounts = ZERO_COUNTS;
  private finalized = false;

  constructor(fieldNames: Iterable<string> = []) {
    for (const name of fieldNames) {
      this.fieldTotals.set(name, ZERO_COUNTS);
    }
  }

  add(field: string, counts: ConfusionCounts, anchor?: string): void {
    if (this.finalized) {
      throw new AccumulatorFinalizedError();
    }
    this.fieldTotals.set(field, addCounts(this.fieldTotals.get(field) ?? ZERO_COUNTS, counts));
    if (anchor !== undefined) {
      this.anchorTotals.set(anchor, addCounts(this.anchorTotals.get(anchor) ?? ZERO_COUNTS, counts));
    }
    this.total = addCounts(this.total, counts);
  }

  finalize(): ConfusionSummary {
    this.finalized = true;

    const fields = [...this.fieldTotals].map(([field, counts]) =>
      Object.freeze({ field, ...scoreCounts(counts) })
    );
    const perAnchor = [...this.anchorTotals.keys()]
      .sort(compareAnchors)
      .map((anchor) =>
        Object.freeze({ anchor, ...scoreCounts(this.anchorTotals.get(anchor) ?? ZERO_COUNTS) })
      );

    return Object.freeze({
      fields: Object.freeze(fields),
      overall: scoreCounts(this.total),
      perAnchor: Object.freeze(perAnchor),
    });
  }
}
