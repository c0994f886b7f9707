import { keyByAnchor, partitionAnchors, scoreUnmatchedField } from './anchorMatcher';
import { compareField } from './comparators';
import { ConfusionAccumulator } from './confusion';
import { assertValidFieldSpecs } from './fieldSpecs';
import { alignSequences } from './sequenceAligner';
import type {
  AnchoredRecord,
  EvaluationResult,
  FieldMismatch,
  FieldSpec,
  RecordCollection,
  SequenceCollection,
} from './types';

export interface EvaluationInput {
  predicted: RecordCollection;
  gold: RecordCollection;
  fields: readonly FieldSpec[];
  predictedSequences?: SequenceCollection;
  goldSequences?: SequenceCollection;
}

export interface EvaluationOptions {
  /** Collect the raw values of every matched-anchor field that was not a clean hit. */
  debug?: boolean;
}

function fieldValue(record: AnchoredRecord | undefined, field: string): string {
  const value: unknown = record?.fields[field];
  return typeof value === 'string' ? value : '';
}

export function evaluate(input: EvaluationInput, options: EvaluationOptions = {}): EvaluationResult {
  assertValidFieldSpecs(input.fields);

  const predicted = keyByAnchor(input.predicted);
  const gold = keyByAnchor(input.gold);
  const anchors = partitionAnchors(predicted, gold);
  const accumulator = new ConfusionAccumulator(input.fields.map((spec) => spec.name));
  const mismatches: FieldMismatch[] = [];

  for (const anchor of anchors.matched) {
    const predictedRecord = predicted.get(anchor);
    const goldRecord = gold.get(anchor);
    for (const spec of input.fields) {
      const predictedRaw = fieldValue(predictedRecord, spec.name);
      const goldRaw = fieldValue(goldRecord, spec.name);
      const counts = compareField(spec, predictedRaw, goldRaw);
      accumulator.add(spec.name, counts, anchor);
      if (options.debug && (counts.fp > 0 || counts.fn > 0)) {
        mismatches.push(
          Object.freeze({ anchor, field: spec.name, predicted: predictedRaw, gold: goldRaw })
        );
      }
    }
  }

  for (const anchor of anchors.missing) {
    const goldRecord = gold.get(anchor);
    for (const spec of input.fields) {
      accumulator.add(
        spec.name,
        scoreUnmatchedField(spec, fieldValue(goldRecord, spec.name), 'gold'),
        anchor
      );
    }
  }

  for (const anchor of anchors.extra) {
    const predictedRecord = predicted.get(anchor);
    for (const spec of input.fields) {
      accumulator.add(
        spec.name,
        scoreUnmatchedField(spec, fieldValue(predictedRecord, spec.name), 'predicted'),
        anchor
      );
    }
  }

  const summary = accumulator.finalize();
  const result: EvaluationResult = {
    fields: summary.fields,
    overall: summary.overall,
    anchors,
    perAnchor: summary.perAnchor,
  };

  if (input.predictedSequences || input.goldSequences) {
    result.sequences = alignSequences(
      input.predictedSequences ?? new Map(),
      input.goldSequences ?? new Map()
    );
  }
  if (options.debug) {
    result.mismatches = Object.freeze(mismatches);
  }

  return Object.freeze(result);
}
