import { LEASE_UNIT_SECONDS } from '../../config/constants.js';
import type { LastActiveValue, LeaseValue } from '../types.js';

const NON_HEX = /[^0-9A-F]/g;
const LEASE_PART = /(\d+)\s*(hour|min|sec)/gi;
const LAST_ACTIVE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})\s+(\d{1,2}):(\d{1,2}):(\d{1,2})\s*(AM|PM)$/i;

type LeaseUnit = keyof typeof LEASE_UNIT_SECONDS;

function isLeaseUnit(unit: string): unit is LeaseUnit {
    return Object.prototype.hasOwnProperty.call(LEASE_UNIT_SECONDS, unit);
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/**
 * Colon-separated uppercase MAC (`AA:BB:CC:DD:EE:FF`) when the input holds
 * exactly 12 hex digits once every other character is removed. Anything else
 * comes back exactly as given.
 */
export function formatMac(raw: string): string {
    const hex = raw.toUpperCase().replace(NON_HEX, '');
    if (hex.length !== 12) return raw;
    return hex.match(/.{2}/g)?.join(':') ?? raw;
}

/**
 * Sum of every `<n> hour|min|sec` part, in seconds. Text with no such part
 * is returned trimmed, so `"0 sec"` (0) stays distinct from `"n/a"`.
 */
export function parseLeaseSeconds(raw: unknown): LeaseValue {
    if (typeof raw !== 'string') return String(raw ?? '').trim();

    let total = 0;
    let matched = false;
    for (const [, value, unit] of raw.matchAll(LEASE_PART)) {
        const key = unit.toLowerCase();
        if (!isLeaseUnit(key)) continue;
        total += parseInt(value, 10) * LEASE_UNIT_SECONDS[key];
        matched = true;
    }

    return matched ? total : raw.trim();
}

/**
 * `MM/DD/YYYY hh:mm:ss AM/PM` to `YYYY-MM-DDTHH:mm:ss`. Unparseable or
 * out-of-range values are returned trimmed.
 */
export function parseLastActive(raw: string): LastActiveValue {
    const text = raw.trim();
    const match = LAST_ACTIVE.exec(text);
    if (!match) return text;

    const [, mm, dd, yyyy, hh, mi, ss, meridiem] = match;
    const month = parseInt(mm, 10);
    const day = parseInt(dd, 10);
    const year = parseInt(yyyy, 10);
    const hour12 = parseInt(hh, 10);
    const minute = parseInt(mi, 10);
    const second = parseInt(ss, 10);

    if (year < 1 || month < 1 || month > 12 || hour12 < 1 || hour12 > 12 || minute > 59 || second > 59) {
        return text;
    }
    const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
    if (day < 1 || day > daysInMonth) return text;

    const hour = (hour12 % 12) + (meridiem.toUpperCase() === 'PM' ? 12 : 0);
    return `${pad(year, 4)}-${pad(month)}-${pad(day)}T${pad(hour)}:${pad(minute)}:${pad(second)}`;
}
