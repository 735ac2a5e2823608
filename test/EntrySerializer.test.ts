import { describe, expect, it } from 'vitest';
import { EntrySerializer } from '../src/storage/entry';
import { CorruptEntryError } from '../src/common/Errors';

describe('EntrySerializer', () => {
  describe('filenameFor()', () => {
    it('should hash the UTF-8 key bytes', () => {
      expect(EntrySerializer.hashKey('')).toBe(
        'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
      );
      expect(EntrySerializer.filenameFor('abc')).toBe(
        'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad.json'
      );
    });
  });

  describe('serialize()', () => {
    it('should encode the value as base64 and the expiry as RFC 3339', () => {
      const json = EntrySerializer.serialize({
        key: 'greeting',
        value: Buffer.from('hello'),
        expiry: new Date(Date.UTC(2024, 5, 1, 8, 30, 0, 250)),
      });

      expect(json).toBe('{"Expiry":"2024-06-01T08:30:00.250Z","Key":"greeting","Value":"aGVsbG8="}');
    });
  });

  describe('deserialize()', () => {
    it('should accept records with a numeric UTC offset', () => {
      const entry = EntrySerializer.deserialize(
        '{"Expiry":"2024-06-01T10:30:00+02:00","Key":"k","Value":"AAEC"}',
        'k'
      );

      expect(entry.key).toBe('k');
      expect(entry.value).toEqual(Buffer.from([0, 1, 2]));
      expect(entry.expiry.toISOString()).toBe('2024-06-01T08:30:00.000Z');
    });

    it('should read a null value as empty bytes', () => {
      const entry = EntrySerializer.deserialize(
        '{"Expiry":"2024-06-01T08:30:00Z","Key":"k","Value":null}',
        'k'
      );

      expect(entry.value.length).toBe(0);
    });

    it('should reject invalid JSON', () => {
      expect(() => EntrySerializer.deserialize('nope', 'file.json')).toThrow(
        'Corrupt entry file.json: invalid JSON'
      );
    });

    it('should name the offending field', () => {
      expect(() =>
        EntrySerializer.deserialize('{"Expiry":"yesterday","Key":"k","Value":""}', 'k')
      ).toThrow(CorruptEntryError);
      expect(() =>
        EntrySerializer.deserialize('{"Expiry":"2024-06-01T08:30:00Z","Key":"","Value":""}', 'k')
      ).toThrow(/Key:/);
    });
  });
});
