import { isNotApplicable } from '../utils/normalize';
import { countElements, isScalarField } from './comparators';
import { compareAnchors, confusion } from './confusion';
import type { AnchorPartition, ConfusionCounts, FieldSpec } from './types';

/**
 * Re-keys a collection by trimmed anchor. Entries with an empty anchor are
 * dropped; if two keys trim to the same anchor the later one wins.
 */
export function keyByAnchor<T>(collection: ReadonlyMap<string, T>): Map<string, T> {
  const entries = new Map<string, T>();
  for (const [key, value] of collection) {
    const anchor = key.trim();
    if (anchor) entries.set(anchor, value);
  }
  return entries;
}

export function partitionAnchors(
  predicted: ReadonlyMap<string, unknown>,
  gold: ReadonlyMap<string, unknown>
): AnchorPartition {
  const predictedKeys = new Set(keyByAnchor(predicted).keys());
  const goldKeys = new Set(keyByAnchor(gold).keys());

  const matched = [...goldKeys].filter((anchor) => predictedKeys.has(anchor));
  const missing = [...goldKeys].filter((anchor) => !predictedKeys.has(anchor));
  const extra = [...predictedKeys].filter((anchor) => !goldKeys.has(anchor));

  return Object.freeze({
    matched: Object.freeze(matched.sort(compareAnchors)),
    missing: Object.freeze(missing.sort(compareAnchors)),
    extra: Object.freeze(extra.sort(compareAnchors)),
  });
}

export type UnmatchedSide = 'gold' | 'predicted';

/**
 * Contribution of a field whose anchor exists on one side only. A gold-only
 * anchor produces false negatives, a predicted-only anchor false positives;
 * a not-applicable scalar has nothing to get wrong and counts as a hit.
 */
export function scoreUnmatchedField(
  spec: FieldSpec,
  raw: string,
  side: UnmatchedSide
): ConfusionCounts {
  if (isScalarField(spec)) {
    if (isNotApplicable(raw)) return confusion(1, 0, 0);
    return side === 'gold' ? confusion(0, 0, 1) : confusion(0, 1, 0);
  }

  const elements = countElements(spec, raw);
  return side === 'gold' ? confusion(0, 0, elements) : confusion(0, elements, 0);
}
