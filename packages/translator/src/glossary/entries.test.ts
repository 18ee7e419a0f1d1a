import { describe, it, expect } from 'vitest';
import { convertDictToTsv, convertTsvToDict, validateGlossaryTerm } from './entries.js';

describe('convertTsvToDict', () => {
  it('reads one entry per line and skips blank lines', () => {
    expect(convertTsvToDict('artist\tKünstler\n\nprize\tPreis\r\n')).toEqual({
      artist: 'Künstler',
      prize: 'Preis',
    });
  });

  it('trims whitespace around terms', () => {
    expect(convertTsvToDict('  artist \t Künstler  ')).toEqual({ artist: 'Künstler' });
  });

  it('accepts a custom separator', () => {
    expect(convertTsvToDict('artist,Künstler', ',')).toEqual({ artist: 'Künstler' });
  });

  it('rejects lines without a separator', () => {
    expect(() => convertTsvToDict('artist\tKünstler\nprize')).toThrow('Entry 2 does not contain separator: prize');
  });

  it('rejects lines with more than one separator', () => {
    expect(() => convertTsvToDict('a\tb\tc')).toThrow('Entry 1 contains more than one term separator: a\tb\tc');
  });

  it('rejects duplicate source terms', () => {
    expect(() => convertTsvToDict('artist\tKünstler\nartist\tMaler')).toThrow(
      'Entry 2 duplicates source term "artist"',
    );
  });
});

describe('convertDictToTsv', () => {
  it('writes one tab-separated entry per line', () => {
    expect(convertDictToTsv({ artist: 'Künstler', prize: 'Preis' })).toBe('artist\tKünstler\nprize\tPreis');
  });

  it('validates every term', () => {
    expect(() => convertDictToTsv({ artist: 'Künst\u0007ler' })).toThrow(
      'Term "Künst\u0007ler" contains invalid character',
    );
  });
});

describe('validateGlossaryTerm', () => {
  it('rejects empty terms and surrounding whitespace', () => {
    expect(() => validateGlossaryTerm('')).toThrow('Term "" is not a valid string');
    expect(() => validateGlossaryTerm(' artist')).toThrow('Term " artist" contains leading or trailing whitespace');
  });

  it('rejects line and paragraph separators', () => {
    expect(() => validateGlossaryTerm('a\u2028b')).toThrow('contains invalid character');
    expect(() => validateGlossaryTerm('a\u2029b')).toThrow('contains invalid character');
  });

  it('accepts ordinary terms', () => {
    expect(() => validateGlossaryTerm('Künstlerin')).not.toThrow();
  });
});
