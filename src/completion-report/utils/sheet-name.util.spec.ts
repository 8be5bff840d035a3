import { sanitizeSheetName, uniqueSheetName } from './sheet-name.util';

describe('sanitizeSheetName', () => {
  it('keeps only letters and digits and cuts at 31 characters', () => {
    const name = sanitizeSheetName('Intro to Safety & Health (2024) - Section A: Morning Group Extended');

    expect(name).toBe('IntrotoSafetyHealth2024SectionA');
    expect(name).toHaveLength(31);
    expect(name).toMatch(/^[A-Za-z0-9]+$/);
  });

  it('leaves a clean short name untouched', () => {
    expect(sanitizeSheetName('FLB01')).toBe('FLB01');
  });

  it('falls back to "Course" when nothing survives', () => {
    expect(sanitizeSheetName('--- ()')).toBe('Course');
    expect(sanitizeSheetName('')).toBe('Course');
  });
});

describe('uniqueSheetName', () => {
  it('returns the name when it is free', () => {
    expect(uniqueSheetName('FLB', new Set(['Enrollments']))).toBe('FLB');
  });

  it('adds a numeric suffix, ignoring case', () => {
    expect(uniqueSheetName('flb', new Set(['FLB']))).toBe('flb1');
    expect(uniqueSheetName('flb', new Set(['FLB', 'flb1']))).toBe('flb2');
  });

  it('shortens a 31 character name to fit the suffix', () => {
    const long = 'A'.repeat(31);
    expect(uniqueSheetName(long, new Set([long]))).toBe(`${'A'.repeat(30)}1`);
  });
});
