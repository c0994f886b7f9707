import { describe, it, expect } from '@jest/globals';
import path from 'path';
import { loadFieldSpecs, parseFieldSpecs } from '../src/evaluation/fieldSpecs';
import {
  FieldSpecError,
  InputReadError,
  InputValidationError,
  UnknownComparatorError,
} from '../src/evaluation/errors';

const REGISTRY_PATH = path.join(__dirname, '..', 'config', 'characterisation-fields.json');

describe('characterisation field registry', () => {
  it('declares the characterisation fields in report order', async () => {
    const specs = await loadFieldSpecs(REGISTRY_PATH);

    expect(specs.map((spec) => `${spec.name}:${spec.kind}`)).toEqual([
      'productNames:SetOfStrings',
      'hnmr.shifts:ExactNormalizedText',
      'hnmr.solvent:ExactNormalizedText',
      'hnmr.temperature:ExactNormalizedText',
      'elementalAnalysis.chemicalFormula:FormulaMatch',
      'elementalAnalysis.weightPercentageCalculated:KeyedNumericSeries',
      'elementalAnalysis.weightPercentageExperimental:KeyedNumericSeries',
      'infrared.material:ExactNormalizedText',
      'infrared.bands:NumericSetWithTolerance',
    ]);
    expect(specs[8]).toEqual({ name: 'infrared.bands', kind: 'NumericSetWithTolerance', tolerance: 3 });
  });

  it('reports a missing registry file', async () => {
    await expect(loadFieldSpecs(path.join(__dirname, 'fixtures', 'absent.json'))).rejects.toThrow(
      InputReadError
    );
  });
});

describe('parseFieldSpecs', () => {
  it('keeps comparator parameters', () => {
    expect(
      parseFieldSpecs({
        fields: [
          { name: 'weights', kind: 'KeyedNumericSeries', precision: 1 },
          { name: 'names', kind: 'SetOfStrings', delimiter: ',' },
        ],
      })
    ).toEqual([
      { name: 'weights', kind: 'KeyedNumericSeries', precision: 1 },
      { name: 'names', kind: 'SetOfStrings', delimiter: ',' },
    ]);
  });

  it('rejects an unknown comparator kind', () => {
    expect(() => parseFieldSpecs({ fields: [{ name: 'yield', kind: 'Levenshtein' }] })).toThrow(
      UnknownComparatorError
    );
    try {
      parseFieldSpecs({ fields: [{ name: 'yield', kind: 'Levenshtein' }] });
    } catch (error) {
      expect(error).toBeInstanceOf(UnknownComparatorError);
      if (error instanceof UnknownComparatorError) {
        expect(error.field).toBe('yield');
        expect(error.kind).toBe('Levenshtein');
      }
    }
  });

  it('rejects invalid parameters and malformed documents', () => {
    expect(() =>
      parseFieldSpecs({ fields: [{ name: 'bands', kind: 'NumericSetWithTolerance', tolerance: -1 }] })
    ).toThrow(InputValidationError);
    expect(() => parseFieldSpecs({ fields: 'none' })).toThrow(InputValidationError);
  });

  it('rejects duplicate names and broken delimiters', () => {
    expect(() =>
      parseFieldSpecs({
        fields: [
          { name: 'a', kind: 'ExactNormalizedText' },
          { name: 'a', kind: 'FormulaMatch' },
        ],
      })
    ).toThrow('Field "a": declared more than once');
    expect(() =>
      parseFieldSpecs({ fields: [{ name: 'names', kind: 'SetOfStrings', delimiter: '(' }] })
    ).toThrow(FieldSpecError);
  });
});
