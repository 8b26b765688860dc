import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { normalizeText, enrichText, prepareText, extractMedicalHints } from '../src/services/normalizer.js';

describe('normalizeText', () => {
  it('collapses whitespace and removes spaces before punctuation', () => {
    expect(normalizeText('  Patient   has\tfever .\n\nNext ,  step ! ')).toBe('Patient has fever. Next, step!');
  });

  it('straightens curly quotes', () => {
    expect(normalizeText('“Take it” ‘daily’')).toBe('"Take it" \'daily\'');
  });

  it('returns empty string for empty or blank input', () => {
    expect(normalizeText('')).toBe('');
    expect(normalizeText(' \r\n\t ')).toBe('');
  });

  it('is idempotent', () => {
    const messy = fc.array(fc.constantFrom(' ', '\t', '\n', '\r', '.', ',', ';', '!', '?', '“', '”', '‘', '’', 'a', 'B', '7'), { maxLength: 40 }).map(parts => parts.join(''));
    fc.assert(fc.property(fc.oneof(fc.string(), fc.fullUnicodeString(), messy), text => {
      const once = normalizeText(text);
      expect(normalizeText(once)).toBe(once);
    }));
  });
});

describe('enrichText', () => {
  it('appends medication and condition hints', () => {
    expect(enrichText('Prescribing amoxicillin 250mg twice daily. Patient has ear infection.')).toBe(
      'Prescribing amoxicillin 250mg twice daily. Patient has ear infection.\n\nMedical Context:\n'
      + 'medication: amoxicillin 250mg\nmedication: amoxicillin 250mg twice\ncondition: ear infection',
    );
  });

  it('captures action phrases up to the sentence end', () => {
    expect(extractMedicalHints('Schedule dental cleaning next month. Refer to cardiology for echo.')).toEqual([
      'action: dental cleaning next month',
      'action: cardiology for echo',
    ]);
  });

  it('matches every-n-hours dosing', () => {
    expect(extractMedicalHints('Give tramadol 50mg every 8 hours')).toEqual(['medication: tramadol 50mg every 8 hours']);
  });

  it('leaves text without hints unchanged apart from normalization', () => {
    expect(enrichText('  Owner  asked about parking .')).toBe('Owner asked about parking.');
  });

  it('yields empty output for empty input', () => {
    expect(prepareText('')).toEqual({ normalized: '', enriched: '' });
  });
});
