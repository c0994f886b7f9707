import {
  DEFAULT_BAND_TOLERANCE,
  DEFAULT_PERCENT_PRECISION,
  DEFAULT_SET_DELIMITER,
} from '../config/evaluation';
import { isNotApplicable, normalizeFormula, normalizeText } from '../utils/normalize';
import { confusion } from './confusion';
import { UnknownComparatorError } from './errors';
import type { ConfusionCounts, FieldSpec } from './types';

// 3-4 integer digits, not part of a longer number or a fraction.
const BAND_TOKEN = /(?<![\d.])\d{3,4}(?:\.\d+)?(?!\d)/g;
// Element symbol, whitespace, value: `C 45.23`. `C20H15O4` is not an entry.
const SERIES_ENTRY = /^([A-Za-z]+)\s+([+-]?\d+(?:\.\d+)?)/;

const BOTH_NOT_APPLICABLE = confusion(1, 0, 0);

export function parseNumbers(raw: string): Set<number> {
  const values = new Set<number>();
  for (const match of (raw || '').matchAll(BAND_TOKEN)) {
    values.add(roundHalfEven(parseFloat(match[0])));
  }
  return values;
}

export function parsePercentSeries(raw: string): Map<string, number> {
  const series = new Map<string, number>();
  for (const part of (raw || '').split(/[;,]/)) {
    const match = part.trim().match(SERIES_ENTRY);
    if (!match) continue;
    const [, key, value] = match;
    if (key === undefined || value === undefined) continue;
    series.set(key, parseFloat(value));
  }
  return series;
}

export function splitStringSet(raw: string, delimiter: string = DEFAULT_SET_DELIMITER): Set<string> {
  const elements = new Set<string>();
  for (const part of (raw || '').split(new RegExp(delimiter))) {
    if (isNotApplicable(part)) continue;
    elements.add(normalizeText(part));
  }
  return elements;
}

/** Rounds to the nearest integer; exact halves go to the even neighbour. */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return roundHalfEven(value * factor) / factor;
}

function ascending(a: number, b: number): number {
  return a - b;
}

/**
 * Greedy nearest-first assignment: gold values are visited in ascending order
 * and each takes the closest still-unmatched predicted value within
 * `tolerance` (ties go to the smaller predicted value). Not a minimum-cost
 * matching; an early gold value can take the value a later one needed.
 */
export function matchWithTolerance(
  predicted: ReadonlySet<number>,
  gold: ReadonlySet<number>,
  tolerance: number
): ConfusionCounts {
  const candidates = [...predicted].sort(ascending);
  const taken = new Array<boolean>(candidates.length).fill(false);
  let tp = 0;
  let fn = 0;

  for (const g of [...gold].sort(ascending)) {
    let best = -1;
    let bestDistance = Infinity;
    for (let index = 0; index < candidates.length; index++) {
      if (taken[index]) continue;
      const distance = Math.abs(candidates[index] - g);
      // candidates are ascending, so strict < keeps the smaller p on ties
      if (distance <= tolerance && distance < bestDistance) {
        best = index;
        bestDistance = distance;
      }
    }
    if (best >= 0) {
      taken[best] = true;
      tp += 1;
    } else {
      fn += 1;
    }
  }

  return confusion(tp, candidates.length - tp, fn);
}

function compareScalar(predicted: string, gold: string): ConfusionCounts {
  if (predicted && predicted === gold) {
    return confusion(1, 0, 0);
  }
  const differ = predicted !== gold;
  return confusion(0, predicted && differ ? 1 : 0, gold && differ ? 1 : 0);
}

function scalarValue(raw: string, normalize: (value: string) => string): string {
  return isNotApplicable(raw) ? '' : normalize(raw);
}

export function compareExactText(predicted: string, gold: string): ConfusionCounts {
  return compareScalar(scalarValue(predicted, normalizeText), scalarValue(gold, normalizeText));
}

export function compareFormula(predicted: string, gold: string): ConfusionCounts {
  return compareScalar(scalarValue(predicted, normalizeFormula), scalarValue(gold, normalizeFormula));
}

export function compareNumericSet(
  predicted: string,
  gold: string,
  tolerance: number = DEFAULT_BAND_TOLERANCE
): ConfusionCounts {
  return matchWithTolerance(parseNumbers(predicted), parseNumbers(gold), tolerance);
}

/**
 * A gold key whose predicted value differs counts only as a false negative;
 * false positives are reserved for predicted keys the gold series lacks.
 */
export function compareKeyedSeries(
  predicted: string,
  gold: string,
  precision: number = DEFAULT_PERCENT_PRECISION
): ConfusionCounts {
  const predictedSeries = parsePercentSeries(predicted);
  const goldSeries = parsePercentSeries(gold);
  let tp = 0;
  let fp = 0;
  let fn = 0;

  for (const key of [...goldSeries.keys()].sort()) {
    const expected = goldSeries.get(key);
    const actual = predictedSeries.get(key);
    if (
      expected !== undefined &&
      actual !== undefined &&
      roundTo(actual, precision) === roundTo(expected, precision)
    ) {
      tp += 1;
    } else {
      fn += 1;
    }
  }
  for (const key of predictedSeries.keys()) {
    if (!goldSeries.has(key)) fp += 1;
  }

  return confusion(tp, fp, fn);
}

export function compareStringSet(
  predicted: string,
  gold: string,
  delimiter: string = DEFAULT_SET_DELIMITER
): ConfusionCounts {
  const predictedSet = splitStringSet(predicted, delimiter);
  const goldSet = splitStringSet(gold, delimiter);
  let tp = 0;
  for (const element of predictedSet) {
    if (goldSet.has(element)) tp += 1;
  }
  return confusion(tp, predictedSet.size - tp, goldSet.size - tp);
}

function unknownComparator(spec: never): never {
  const value: unknown = spec;
  let name = '(unnamed)';
  let kind = String(value);
  if (typeof value === 'object' && value !== null) {
    if ('name' in value && typeof value.name === 'string') name = value.name;
    if ('kind' in value) kind = String(value.kind);
  }
  throw new UnknownComparatorError(name, kind);
}

export function compareField(spec: FieldSpec, predicted: string, gold: string): ConfusionCounts {
  if (isNotApplicable(predicted) && isNotApplicable(gold)) {
    return BOTH_NOT_APPLICABLE;
  }

  switch (spec.kind) {
    case 'ExactNormalizedText':
      return compareExactText(predicted, gold);
    case 'FormulaMatch':
      return compareFormula(predicted, gold);
    case 'NumericSetWithTolerance':
      return compareNumericSet(predicted, gold, spec.tolerance);
    case 'KeyedNumericSeries':
      return compareKeyedSeries(predicted, gold, spec.precision);
    case 'SetOfStrings':
      return compareStringSet(predicted, gold, spec.delimiter);
    default:
      return unknownComparator(spec);
  }
}

export function isScalarField(spec: FieldSpec): boolean {
  return spec.kind === 'ExactNormalizedText' || spec.kind === 'FormulaMatch';
}

/**
 * Number of elements a set-valued or series field holds. Scalar fields count
 * as one element unless not applicable.
 */
export function countElements(spec: FieldSpec, raw: string): number {
  switch (spec.kind) {
    case 'ExactNormalizedText':
    case 'FormulaMatch':
      return isNotApplicable(raw) ? 0 : 1;
    case 'NumericSetWithTolerance':
      return parseNumbers(raw).size;
    case 'KeyedNumericSeries':
      return parsePercentSeries(raw).size;
    case 'SetOfStrings':
      return splitStringSet(raw, spec.delimiter).size;
    default:
      return unknownComparator(spec);
  }
}

export function assertKnownComparators(specs: readonly FieldSpec[]): void {
  for (const spec of specs) {
    switch (spec.kind) {
      case 'ExactNormalizedText':
      case 'FormulaMatch':
      case 'NumericSetWithTolerance':
      case 'KeyedNumericSeries':
      case 'SetOfStrings':
        break;
      default:
        unknownComparator(spec);
    }
  }
}
