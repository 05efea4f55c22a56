import { describe, expect, it } from 'vitest';
import { isRecord, prefixKeys, setField, type DataRecord } from '../src/index.js';

describe('isRecord', () => {
  it('accepts plain and prototype-less objects', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord({ id: 1 })).toBe(true);
    expect(isRecord(Object.create(null))).toBe(true);
  });

  it('rejects arrays, dates, null and primitives', () => {
    expect(isRecord([])).toBe(false);
    expect(isRecord(new Date())).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('id')).toBe(false);
    expect(isRecord(false)).toBe(false);
  });
});

describe('prefixKeys', () => {
  it('qualifies every key', () => {
    expect(prefixKeys(['postid', 'post_name'], 'p.')).toEqual(['p.postid', 'p.post_name']);
  });

  it('returns an empty list for no keys', () => {
    expect(prefixKeys([], 'p.')).toEqual([]);
  });
});

describe('setField', () => {
  it('adds __proto__ as an own enumerable field', () => {
    const record: DataRecord = {};
    setField(record, '__proto__', { polluted: true });
    setField(record, 'id', 1);

    expect(Object.keys(record)).toEqual(['__proto__', 'id']);
    expect(Object.getPrototypeOf(record)).toBe(Object.prototype);
    expect(record.id).toBe(1);
  });

  it('overwrites an existing field', () => {
    const record: DataRecord = { id: 1 };
    setField(record, 'id', 2);

    expect(record).toEqual({ id: 2 });
  });
});
