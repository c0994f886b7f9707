import { describe, it, expect } from '@jest/globals';
import { isNotApplicable, normalizeFormula, normalizeText } from '../src/utils/normalize';

describe('normalizeText', () => {
  it('trims, collapses whitespace and lower-cases', () => {
    expect(normalizeText('  Compound   1 ')).toBe('compound 1');
    expect(normalizeText('KBr\tpellet')).toBe('kbr pellet');
  });

  it('applies NFKC compatibility folding', () => {
    expect(normalizeText('ＫＢｒ')).toBe('kbr');
    expect(normalizeText('CDCl₃')).toBe('cdcl3');
  });

  it('handles empty input', () => {
    expect(normalizeText('')).toBe('');
    expect(normalizeText('   ')).toBe('');
  });
});

describe('isNotApplicable', () => {
  it('recognises the sentinel values', () => {
    for (const value of ['N/A', ' na ', 'Not  Stated', '-', '—', '', '   ']) {
      expect(isNotApplicable(value)).toBe(true);
    }
  });

  it('does not treat other placeholders as sentinels', () => {
    expect(isNotApplicable('none')).toBe(false);
    expect(isNotApplicable('n.a.')).toBe(false);
    expect(isNotApplicable('0')).toBe(false);
  });
});

describe('normalizeFormula', () => {
  it('removes all whitespace but keeps case', () => {
    expect(normalizeFormula(' C20 H14\nN2 O4 ')).toBe('C20H14N2O4');
    expect(normalizeFormula('Co')).not.toBe(normalizeFormula('CO'));
  });

  it('folds subscript digits', () => {
    expect(normalizeFormula('C₂H₆')).toBe('C2H6');
  });
});
