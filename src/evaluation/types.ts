export const COMPARATOR_KINDS = [
  'ExactNormalizedText',
  'FormulaMatch',
  'NumericSetWithTolerance',
  'KeyedNumericSeries',
  'SetOfStrings',
] as const;

export type ComparatorKind = (typeof COMPARATOR_KINDS)[number];

export function isComparatorKind(value: string): value is ComparatorKind {
  return COMPARATOR_KINDS.some((kind) => kind === value);
}

export interface ExactTextFieldSpec {
  name: string;
  kind: 'ExactNormalizedText';
}

export interface FormulaFieldSpec {
  name: string;
  kind: 'FormulaMatch';
}

export interface NumericSetFieldSpec {
  name: string;
  kind: 'NumericSetWithTolerance';
  /** Maximum absolute distance between a predicted and a gold value. */
  tolerance?: number;
}

export interface KeyedSeriesFieldSpec {
  name: string;
  kind: 'KeyedNumericSeries';
  /** Decimal places both values are rounded to before comparison. */
  precision?: number;
}

export interface StringSetFieldSpec {
  name: string;
  kind: 'SetOfStrings';
  /** RegExp source used to split the raw value into elements. */
  delimiter?: string;
}

export type FieldSpec =
  | ExactTextFieldSpec
  | FormulaFieldSpec
  | NumericSetFieldSpec
  | KeyedSeriesFieldSpec
  | StringSetFieldSpec;

export interface AnchoredRecord {
  anchor: string;
  fields: Readonly<Record<string, string>>;
}

export type RecordCollection = ReadonlyMap<string, AnchoredRecord>;

export type SequenceCollection = ReadonlyMap<string, readonly string[]>;

export interface ConfusionCounts {
  readonly tp: number;
  readonly fp: number;
  readonly fn: number;
}

export interface Rates {
  precision: number;
  recall: number;
  f1: number;
}

export interface ScoredCounts extends Rates {
  counts: ConfusionCounts;
}

export interface FieldScore extends ScoredCounts {
  field: string;
}

export interface AnchorScore extends ScoredCounts {
  anchor: string;
}

export interface AnchorPartition {
  matched: readonly string[];
  missing: readonly string[];
  extra: readonly string[];
}

export interface FieldMismatch {
  anchor: string;
  field: string;
  predicted: string;
  gold: string;
}

export interface SequenceResult {
  overall: ScoredCounts;
  anchors: readonly AnchorScore[];
}

export interface EvaluationResult {
  fields: readonly FieldScore[];
  overall: ScoredCounts;
  anchors: AnchorPartition;
  perAnchor: readonly AnchorScore[];
  sequences?: SequenceResult;
  mismatches?: readonly FieldMismatch[];
}
