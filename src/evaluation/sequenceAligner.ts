import { keyByAnchor } from './anchorMatcher';
import { ConfusionAccumulator, compareAnchors, confusion } from './confusion';
import type { ConfusionCounts, SequenceCollection, SequenceResult } from './types';

const SEQUENCE_FIELD = 'steps';

/**
 * Index-by-index comparison up to the shorter length. An inserted or dropped
 * step shifts every later position, so it is penalised at each of them.
 */
export function alignSequence(
  predicted: readonly string[],
  gold: readonly string[]
): ConfusionCounts {
  const n = Math.min(predicted.length, gold.length);
  let eq = 0;
  for (let i = 0; i < n; i++) {
    if (predicted[i].trim() === gold[i].trim()) eq += 1;
  }
  return confusion(eq, predicted.length - eq, gold.length - eq);
}

export function alignSequences(
  predicted: SequenceCollection,
  gold: SequenceCollection
): SequenceResult {
  const predictedByAnchor = keyByAnchor(predicted);
  const goldByAnchor = keyByAnchor(gold);
  const anchors = [...new Set([...predictedByAnchor.keys(), ...goldByAnchor.keys()])].sort(
    compareAnchors
  );

  const accumulator = new ConfusionAccumulator([SEQUENCE_FIELD]);
  for (const anchor of anchors) {
    accumulator.add(
      SEQUENCE_FIELD,
      alignSequence(predictedByAnchor.get(anchor) ?? [], goldByAnchor.get(anchor) ?? []),
      anchor
    );
  }

  const summary = accumulator.finalize();
  return Object.freeze({ overall: summary.overall, anchors: summary.perAnchor });
}
