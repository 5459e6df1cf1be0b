import { canTransition, predecessorsOf, wasSent } from '../utils/messageStatus';
import { canonicalJson, contentHash, getString, parseTimestamp, toJsonValue, truncate } from '../utils/payload';

describe('message status machine', () => {
  it('should only move forward', () => {
    expect(canTransition('pending', 'sent')).toBe(true);
    expect(canTransition('pending', 'failed')).toBe(true);
    expect(canTransition('sent', 'delivered')).toBe(true);
    expect(canTransition('sent', 'read')).toBe(true);
    expect(canTransition('delivered', 'read')).toBe(true);
    expect(canTransition('read', 'delivered')).toBe(false);
    expect(canTransition('delivered', 'sent')).toBe(false);
    expect(canTransition('sent', 'failed')).toBe(false);
    expect(canTransition('failed', 'sent')).toBe(false);
  });

  it('should list the statuses a move may start from', () => {
    expect(predecessorsOf('read')).toEqual(['sent', 'delivered']);
    expect(predecessorsOf('delivered')).toEqual(['sent']);
    expect(predecessorsOf('failed')).toEqual(['pending']);
    expect(predecessorsOf('pending')).toEqual([]);
  });

  it('should treat sent and later statuses as accepted by the platform', () => {
    expect(wasSent('sent')).toBe(true);
    expect(wasSent('delivered')).toBe(true);
    expect(wasSent('read')).toBe(true);
    expect(wasSent('pending')).toBe(false);
    expect(wasSent('failed')).toBe(false);
  });
});

describe('payload helpers', () => {
  it('should read epoch seconds, epoch milliseconds and ISO strings', () => {
    expect(parseTimestamp(1714564800)).toEqual(new Date('2024-05-01T12:00:00.000Z'));
    expect(parseTimestamp(1714564800000)).toEqual(new Date('2024-05-01T12:00:00.000Z'));
    expect(parseTimestamp('1714564800')).toEqual(new Date('2024-05-01T12:00:00.000Z'));
    expect(parseTimestamp('2024-05-01T12:00:00Z')).toEqual(new Date('2024-05-01T12:00:00.000Z'));
    expect(parseTimestamp('yesterday')).toBeUndefined();
    expect(parseTimestamp(undefined)).toBeUndefined();
  });

  it('should stringify numeric ids', () => {
    expect(getString(1784140)).toBe('1784140');
    expect(getString('17841400000000001')).toBe('17841400000000001');
    expect(getString(null)).toBe('');
  });

  it('should sort keys at every depth', () => {
    expect(canonicalJson({ b: [{ d: 1, c: 2 }], a: null })).toBe('{"a":null,"b":[{"c":2,"d":1}]}');
    expect(contentHash({ a: 1, b: 2 })).toBe(contentHash({ b: 2, a: 1 }));
    expect(contentHash({ a: 1 })).not.toBe(contentHash({ a: 2 }));
  });

  it('should drop values JSON cannot carry', () => {
    expect(toJsonValue({ a: undefined, b: Number.NaN, c: [1, 'x'] })).toEqual({ b: null, c: [1, 'x'] });
  });

  it('should truncate long text', () => {
    expect(truncate('abcdef', 3)).toBe('abc...');
    expect(truncate('abc', 3)).toBe('abc');
  });
});
