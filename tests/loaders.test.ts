import { describe, it, expect, jest } from '@jest/globals';
import path from 'path';
import { InputReadError, InputValidationError } from '../src/evaluation/errors';
import {
  indexRecords,
  loadEvaluationInput,
  parseEvaluationInput,
  toFieldString,
} from '../src/evaluation/loaders';
import type { Logger } from '../src/utils/logger';

function createMockLogger() {
  return {
    error: jest.fn<Logger['error']>(),
    warn: jest.fn<Logger['warn']>(),
    info: jest.fn<Logger['info']>(),
  };
}

describe('toFieldString', () => {
  it('coerces JSON values to raw strings', () => {
    expect(toFieldString(['A', 'B'])).toBe('A\nB');
    expect(toFieldString(42)).toBe('42');
    expect(toFieldString(null)).toBe('');
    expect(toFieldString(undefined)).toBe('');
  });
});

describe('parseEvaluationInput', () => {
  it('indexes records and sequences by trimmed anchor', () => {
    const logger = createMockLogger();
    const input = parseEvaluationInput(
      {
        records: [{ anchor: ' 1 ', fields: { names: ['A', 'B'], temperature: 25, solvent: null } }],
        sequences: [{ anchor: '1', steps: ['Add', 'Stir'] }],
      },
      'test input',
      logger
    );

    expect(input.records.get('1')).toEqual({
      anchor: '1',
      fields: { names: 'A\nB', temperature: '25', solvent: '' },
    });
    expect(input.sequences.get('1')).toEqual(['Add', 'Stir']);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('defaults missing sections to empty collections', () => {
    const input = parseEvaluationInput({}, 'empty', createMockLogger());
    expect(input.records.size).toBe(0);
    expect(input.sequences.size).toBe(0);
  });

  it('skips records without an anchor', () => {
    const input = parseEvaluationInput(
      { records: [{ anchor: '  ', fields: {} }, { fields: { names: 'A' } }, { anchor: null }] },
      'anchorless',
      createMockLogger()
    );
    expect(input.records.size).toBe(0);
  });

  it('rejects malformed documents', () => {
    expect(() => parseEvaluationInput({ records: [{ anchor: 1 }] }, 'bad', createMockLogger())).toThrow(
      InputValidationError
    );
  });
});

describe('indexRecords', () => {
  it('keeps the last record for a duplicate anchor and warns', () => {
    const logger = createMockLogger();
    const { collection, duplicates } = indexRecords(
      [
        { anchor: 'X', fields: { solvent: 'a' } },
        { anchor: 'X', fields: { solvent: 'b' } },
      ],
      logger
    );

    expect(collection.get('X')?.fields.solvent).toBe('b');
    expect(duplicates).toEqual(['X']);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      'Duplicate record anchor "X"; keeping the last occurrence',
      { anchor: 'X', index: 1 }
    );
  });
});

describe('loadEvaluationInput', () => {
  it('reads a document from disk', async () => {
    const input = await loadEvaluationInput(
      path.join(__dirname, 'fixtures', 'gold.json'),
      createMockLogger()
    );

    expect([...input.records.keys()]).toEqual(['1955705', '2001234']);
    expect(input.records.get('2001234')?.fields.productNames).toBe('Cage 2');
    expect(input.sequences.get('1955705')).toEqual(['Add', 'HeatChill', 'Filter']);
  });

  it('reports unreadable files', async () => {
    await expect(
      loadEvaluationInput(path.join(__dirname, 'fixtures', 'absent.json'), createMockLogger())
    ).rejects.toThrow(InputReadError);
  });
});
