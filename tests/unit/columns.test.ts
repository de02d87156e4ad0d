import { z } from 'zod';
import { decodeRow, encodeJson, encodeList, jsonObject, stringList, timestamp } from '../../src/utils/columns';
import { SerializationError } from '../../src/utils/errors';

const listRow = z.object({ keywords: stringList });

describe('column codecs', () => {
  it('should read an absent list as empty', () => {
    expect(decodeRow(listRow, { keywords: null }, 't').keywords).toEqual([]);
    expect(decodeRow(listRow, {}, 't').keywords).toEqual([]);
  });

  it('should read lists stored as parsed JSON or as text', () => {
    expect(decodeRow(listRow, { keywords: ['a', 'b'] }, 't').keywords).toEqual(['a', 'b']);
    expect(decodeRow(listRow, { keywords: '["a","b"]' }, 't').keywords).toEqual(['a', 'b']);
  });

  it('should raise SerializationError for unreadable list text', () => {
    expect(() => decodeRow(listRow, { keywords: 'not json' }, 'scammer_tactics')).toThrow(SerializationError);
  });

  it('should name the table and field in serialization errors', () => {
    expect(() => decodeRow(listRow, { keywords: [1, 2] }, 'scammer_tactics')).toThrow(
      'Unreadable scammer_tactics row: keywords.0: Expected string, received number'
    );
  });

  it('should read object columns stored as parsed JSON or as text', () => {
    const row = z.object({ details: jsonObject });
    expect(decodeRow(row, { details: { a: 1 } }, 't').details).toEqual({ a: 1 });
    expect(decodeRow(row, { details: '{"a":1}' }, 't').details).toEqual({ a: 1 });
    expect(decodeRow(row, { details: null }, 't').details).toBeNull();
  });

  it('should raise SerializationError for unreadable object text', () => {
    const row = z.object({ details: jsonObject });
    expect(() => decodeRow(row, { details: '{broken' }, 'system_logs')).toThrow(
      'Unreadable system_logs row: details: Expected object, received string'
    );
  });

  it('should normalise timestamps to ISO strings', () => {
    const row = z.object({ at: timestamp });
    expect(decodeRow(row, { at: new Date(Date.UTC(2026, 0, 2, 3, 4, 5)) }, 't').at).toBe('2026-01-02T03:04:05.000Z');
  });

  it('should encode missing lists as an empty JSON array', () => {
    expect(encodeList(undefined)).toBe('[]');
    expect(encodeList(['x'])).toBe('["x"]');
  });

  it('should encode missing objects as null', () => {
    expect(encodeJson(undefined)).toBeNull();
    expect(encodeJson({ a: 1 })).toBe('{"a":1}');
  });
});
