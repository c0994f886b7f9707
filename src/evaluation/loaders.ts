import { defaultLogger, type Logger } from '../utils/logger';
import { readJsonFile } from '../utils/jsonFile';
import { InputValidationError } from './errors';
import { EvaluationDocumentSchema, type FieldValue } from './schemas';
import type { AnchoredRecord, RecordCollection, SequenceCollection } from './types';

export interface RawRecord {
  anchor?: string | null;
  fields?: Record<string, FieldValue | undefined>;
}

export interface RawSequence {
  anchor?: string | null;
  steps: readonly string[];
}

export interface IndexResult<T> {
  collection: ReadonlyMap<string, T>;
  /** Anchors that appeared more than once; the last occurrence was kept. */
  duplicates: string[];
}

export interface LoadedInput {
  records: RecordCollection;
  sequences: SequenceCollection;
  duplicateRecordAnchors: string[];
  duplicateSequenceAnchors: string[];
}

// Arrays are joined on newline, which the default set delimiter splits on.
export function toFieldString(value: FieldValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (Array.isArray(value)) return value.map((item) => String(item)).join('\n');
  return String(value);
}

function indexByAnchor<E extends { anchor?: string | null }, T>(
  entries: readonly E[],
  build: (entry: E, anchor: string) => T,
  label: string,
  logger: Logger
): IndexResult<T> {
  const collection = new Map<string, T>();
  const duplicates = new Set<string>();

  entries.forEach((entry, index) => {
    const anchor = (entry.anchor ?? '').trim();
    if (!anchor) return;
    if (collection.has(anchor)) {
      duplicates.add(anchor);
      logger.warn(`Duplicate ${label} anchor "${anchor}"; keeping the last occurrence`, {
        anchor,
        index,
      });
    }
    collection.set(anchor, build(entry, anchor));
  });

  return { collection, duplicates: [...duplicates].sort() };
}

export function indexRecords(
  records: readonly RawRecord[],
  logger: Logger = defaultLogger
): IndexResult<AnchoredRecord> {
  return indexByAnchor(
    records,
    (record, anchor) => {
      const fields: Record<string, string> = {};
      for (const [name, value] of Object.entries(record.fields ?? {})) {
        fields[name] = toFieldString(value);
      }
      return Object.freeze({ anchor, fields: Object.freeze(fields) });
    },
    'record',
    logger
  );
}

export function indexSequences(
  sequences: readonly RawSequence[],
  logger: Logger = defaultLogger
): IndexResult<readonly string[]> {
  return indexByAnchor(
    sequences,
    (sequence) => Object.freeze([...sequence.steps]),
    'sequence',
    logger
  );
}

export function parseEvaluationInput(
  raw: unknown,
  source: string,
  logger: Logger = defaultLogger
): LoadedInput {
  const parsed = EvaluationDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InputValidationError(source, parsed.error);
  }

  const records = indexRecords(parsed.data.records, logger);
  const sequences = indexSequences(parsed.data.sequences, logger);

  return {
    records: records.collection,
    sequences: sequences.collection,
    duplicateRecordAnchors: records.duplicates,
    duplicateSequenceAnchors: sequences.duplicates,
  };
}

export async function loadEvaluationInput(
  path: string,
  logger: Logger = defaultLogger
): Promise<LoadedInput> {
  return parseEvaluationInput(await readJsonFile(path), path, logger);
}
