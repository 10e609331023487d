import { describe, it, expect } from 'vitest';
import { formatMac, parseLastActive, parseLeaseSeconds } from '../../src/tracker/normalize/FieldNormalizers.js';

const CANONICAL_MAC = /^[0-9A-F]{2}(:[0-9A-F]{2}){5}$/;

describe('formatMac', () => {
    it.each([
        ['aa-bb-cc-dd-ee-ff', 'AA:BB:CC:DD:EE:FF'],
        ['AA:BB:CC:DD:EE:FF', 'AA:BB:CC:DD:EE:FF'],
        ['0011.2233.4455', '00:11:22:33:44:55'],
        ['  a1b2c3d4e5f6\n', 'A1:B2:C3:D4:E5:F6'],
    ])('formats %j as %s', (raw, expected) => {
        const mac = formatMac(raw);
        expect(mac).toBe(expected);
        expect(mac).toMatch(CANONICAL_MAC);
    });

    it.each([
        'aa-bb-cc-dd-ee',
        'aa:bb:cc:dd:ee:ff:00',
        'not a mac',
        '',
        ' 00-11-22 ',
    ])('returns %j unchanged when it does not hold 12 hex digits', raw => {
        expect(formatMac(raw)).toBe(raw);
    });
});

describe('parseLeaseSeconds', () => {
    it('sums hours and minutes', () => {
        expect(parseLeaseSeconds('2 hour 30 min')).toBe(9000);
    });

    it('parses seconds alone', () => {
        expect(parseLeaseSeconds('45 sec')).toBe(45);
    });

    it('accepts plural units, missing spaces and any case', () => {
        expect(parseLeaseSeconds('1 Hours 2mins 3 SECONDS')).toBe(3723);
    });

    it('keeps an explicit zero as a number', () => {
        expect(parseLeaseSeconds('0 hour 0 min')).toBe(0);
    });

    it('returns the trimmed text when nothing matches', () => {
        expect(parseLeaseSeconds('garbage')).toBe('garbage');
        expect(parseLeaseSeconds('  Infinite \t')).toBe('Infinite');
    });

    it('returns text for input that cannot be scanned', () => {
        expect(parseLeaseSeconds(undefined)).toBe('');
        expect(parseLeaseSeconds(86400)).toBe('86400');
    });
});

describe('parseLastActive', () => {
    it('converts a 12-hour timestamp to ISO-8601', () => {
        expect(parseLastActive('04/06/2025 04:04:31 PM')).toBe('2025-04-06T16:04:31');
    });

    it('maps midnight and noon', () => {
        expect(parseLastActive('12/31/2024 12:00:00 AM')).toBe('2024-12-31T00:00:00');
        expect(parseLastActive('01/01/2025 12:15:00 pm')).toBe('2025-01-01T12:15:00');
    });

    it('accepts single-digit fields and surrounding whitespace', () => {
        expect(parseLastActive('  4/6/2025 9:05:07 AM\n')).toBe('2025-04-06T09:05:07');
        expect(parseLastActive('4/6/2025 4:4:31 PM')).toBe('2025-04-06T16:04:31');
    });

    it('returns the trimmed text when it does not parse', () => {
        expect(parseLastActive('not a date')).toBe('not a date');
        expect(parseLastActive(' 2025-04-06 16:04:31 ')).toBe('2025-04-06 16:04:31');
    });

    it('rejects impossible calendar and clock values', () => {
        expect(parseLastActive('02/30/2025 01:00:00 PM')).toBe('02/30/2025 01:00:00 PM');
        expect(parseLastActive('13/01/2025 01:00:00 PM')).toBe('13/01/2025 01:00:00 PM');
        expect(parseLastActive('01/01/2025 13:00:00 PM')).toBe('01/01/2025 13:00:00 PM');
        expect(parseLastActive('01/01/2025 00:30:00 AM')).toBe('01/01/2025 00:30:00 AM');
        expect(parseLastActive('01/01/0000 01:00:00 AM')).toBe('01/01/0000 01:00:00 AM');
    });

    it('accepts February 29th in a leap year only', () => {
        expect(parseLastActive('02/29/2024 11:59:59 PM')).toBe('2024-02-29T23:59:59');
        expect(parseLastActive('02/29/2025 11:59:59 PM')).toBe('02/29/2025 11:59:59 PM');
    });
});
