import {
  isRecord,
  readBoolean,
  readNumber,
  readRecord,
  readString,
} from '../../../src/utils/parse';

describe('parse helpers', () => {
  const source: Record<string, unknown> = {
    name: 'abc',
    count: 3,
    numeric: '42',
    blank: ' ',
    nested: { ok: true },
    list: [1, 2],
    flag: false,
  };

  it('should recognise plain objects only', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('x')).toBe(false);
  });

  it('should read typed fields', () => {
    expect(readString(source, 'name')).toBe('abc');
    expect(readString(source, 'count')).toBeUndefined();
    expect(readNumber(source, 'count')).toBe(3);
    expect(readNumber(source, 'numeric')).toBe(42);
    expect(readNumber(source, 'blank')).toBeUndefined();
    expect(readRecord(source, 'nested')).toEqual({ ok: true });
    expect(readRecord(source, 'list')).toBeUndefined();
    expect(readBoolean(source, 'flag')).toBe(false);
    expect(readBoolean(source, 'name')).toBeUndefined();
  });
});
