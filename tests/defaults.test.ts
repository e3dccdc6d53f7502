import { describe, expect, it } from 'vitest';
import {
  hasNumber,
  pickText,
  readNumber,
  readRecordList,
  readString,
  readStringList,
  readText,
} from '../src/utils/defaults';
import type { JsonObject } from '../src/types/json';

describe('default-valued accessors', () => {
  const source: JsonObject = {
    name: 'Jane Doe',
    year: 2020,
    score: '85%',
    bad_score: 'eighty',
    technologies: ['Python', 'SQL', ''],
    skills: ['Python', 3, 'Docker'],
    entries: [{ degree: 'BSc' }, 'stray', null],
  };

  it('reads strings with a fallback', () => {
    expect(readString(source, 'name')).toBe('Jane Doe');
    expect(readString(source, 'missing')).toBe('');
    expect(readString(source, 'year', 'n/a')).toBe('n/a');
  });

  it('renders numbers and string lists as text', () => {
    expect(readText(source, 'year')).toBe('2020');
    expect(readText(source, 'technologies')).toBe('Python, SQL');
    expect(readText(source, 'entries')).toBe('stray');
  });

  it('reads numbers, numeric strings and percentages', () => {
    expect(readNumber(source, 'year')).toBe(2020);
    expect(readNumber(source, 'score')).toBe(85);
    expect(readNumber(source, 'bad_score')).toBe(0);
    expect(readNumber(source, 'missing', 7)).toBe(7);
  });

  it('tells whether a usable number is present', () => {
    expect(hasNumber(source, 'score')).toBe(true);
    expect(hasNumber(source, 'bad_score')).toBe(false);
    expect(hasNumber(source, 'missing')).toBe(false);
  });

  it('keeps only the items of the expected kind in lists', () => {
    expect(readStringList(source, 'skills')).toEqual(['Python', 'Docker']);
    expect(readStringList(source, 'name')).toEqual([]);
    expect(readRecordList(source, 'entries')).toEqual([{ degree: 'BSc' }]);
  });

  it('picks non-empty text fields only', () => {
    expect(pickText({ degree: ' MSc ', institution: '', year: 2019 }, ['degree', 'institution', 'year'])).toEqual({
      degree: 'MSc',
      year: '2019',
    });
  });
});
