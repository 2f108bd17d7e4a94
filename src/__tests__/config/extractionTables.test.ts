import { describe, expect, test } from 'vitest';
import { buildExtractionTables, getExtractionTables, loadExtractionTables } from '../../config/extractionTables';

describe('buildExtractionTables', () => {
  test('lowercases keys and lemmas', () => {
    const tables = buildExtractionTables({
      monthNames: { March: 3 },
      quarterToMonth: { First: 1 },
      misreportingLemmas: ['Restate'],
    });

    expect(tables.monthNames.get('march')).toBe(3);
    expect(tables.quarterToMonth.get('first')).toBe(1);
    expect(tables.misreportingLemmas.has('restate')).toBe(true);
    expect(Object.isFrozen(tables)).toBe(true);
  });

  test('rejects months outside 1-12', () => {
    expect(() =>
      buildExtractionTables({ monthNames: { smarch: 13 }, quarterToMonth: {}, misreportingLemmas: [] }),
    ).toThrow();
  });
});

describe('loadExtractionTables', () => {
  test('reads the bundled tables', () => {
    const tables = loadExtractionTables('data/extraction-tables.json');

    expect(tables.monthNames.get('sept')).toBe(9);
    expect(tables.quarterToMonth.get('last')).toBe(10);
    expect(tables.misreportingLemmas.has('file')).toBe(true);
  });

  test('names the file it could not read', () => {
    expect(() => loadExtractionTables('data/missing-tables.json')).toThrow(
      /Failed to read extraction tables from .*missing-tables\.json/,
    );
  });

  test('caches the process-wide tables', () => {
    expect(getExtractionTables()).toBe(getExtractionTables());
  });
});
