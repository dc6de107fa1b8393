import { describe, it, expect } from 'vitest';
import { isQuietHours, localMinutes } from '../src/QuietHours';

const TOKYO = { start: '00:00', end: '04:59', timeZone: 'Asia/Tokyo' };
const WRAPPING = { start: '23:00', end: '04:59', timeZone: 'UTC' };

describe('localMinutes', () => {
    it('should read the wall clock of the given time zone', () => {
        expect(localMinutes(new Date('2026-10-18T00:00:00Z'), 'Asia/Tokyo')).toBe(540);
        expect(localMinutes(new Date('2026-10-18T15:30:00Z'), 'Asia/Tokyo')).toBe(30);
    });
});

describe('isQuietHours', () => {
    it.each([
        ['2026-10-17T15:00:00Z', true], // 00:00 local
        ['2026-10-17T17:30:00Z', true], // 02:30 local
        ['2026-10-17T19:59:59Z', true], // 04:59:59 local
        ['2026-10-17T20:00:00Z', false], // 05:00 local
        ['2026-10-17T14:59:00Z', false], // 23:59 local
        ['2026-10-18T03:00:00Z', false], // 12:00 local
    ])('should treat %s as quiet=%s in Asia/Tokyo', (iso, expected) => {
        expect(isQuietHours(new Date(iso), TOKYO)).toBe(expected);
    });

    it.each([
        ['2026-10-18T23:30:00Z', true],
        ['2026-10-18T02:00:00Z', true],
        ['2026-10-18T12:00:00Z', false],
        ['2026-10-18T22:59:00Z', false],
    ])('should handle a window that wraps midnight (%s)', (iso, expected) => {
        expect(isQuietHours(new Date(iso), WRAPPING)).toBe(expected);
    });
});
