import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RowParseError } from '../../src/shared/errors.js';
import { parseDeviceRecord, parseDeviceRecords } from '../../src/tracker/normalize/DeviceRowParser.js';
import { RawDeviceRecord } from '../../src/tracker/types.js';
import { silentLogger } from '../helpers/fakes.js';

const phoneRow = ['Active', 'Wireless', 'MyPhone', '192.168.10.5', 'aa-bb-cc-dd-ee-ff', 'DHCP', '1 hour 0 min', '04/06/2025 04:04:31 PM', 'x'];

const cells = (values: string[]): RawDeviceRecord => ({ kind: 'cells', cells: values });
const firmware = (entry: unknown): RawDeviceRecord => ({ kind: 'firmware', entry });

describe('parseDeviceRecord', () => {
    describe('table cells', () => {
        it('normalizes a complete nine-cell row', () => {
            expect(parseDeviceRecord(cells(phoneRow))).toEqual({
                status: 'Active',
                connectionType: 'Wireless',
                name: 'MyPhone',
                ipv4: '192.168.10.5',
                mac: 'AA:BB:CC:DD:EE:FF',
                allocation: 'DHCP',
                lease: 3600,
                lastActive: '2025-04-06T16:04:31',
                isActive: true,
                isWireless: true
            });
        });

        it('defaults an empty name to Unknown and trims passthrough cells', () => {
            const device = parseDeviceRecord(cells([' Inactive ', ' Ethernet ', '   ', ' 10.0.0.2 ', 'bad-mac', ' Static ', 'n/a', 'never', '']));

            expect(device.status).toBe('Inactive');
            expect(device.connectionType).toBe('Ethernet');
            expect(device.name).toBe('Unknown');
            expect(device.ipv4).toBe('10.0.0.2');
            expect(device.mac).toBe('bad-mac');
            expect(device.allocation).toBe('Static');
            expect(device.lease).toBe('n/a');
            expect(device.lastActive).toBe('never');
            expect(device.isActive).toBe(false);
            expect(device.isWireless).toBe(false);
        });

        it.each([
            ['ACTIVE', true],
            ['active', true],
            ['Inactive', false],
            ['Standby', false],
            ['', false],
        ])('derives isActive for status %j', (status, expected) => {
            const row = [...phoneRow];
            row[0] = status;
            expect(parseDeviceRecord(cells(row)).isActive).toBe(expected);
        });

        it('treats any connection type containing "wireless" as wireless', () => {
            const row = [...phoneRow];
            row[1] = '802.11ac WIRELESS 5GHz';
            expect(parseDeviceRecord(cells(row)).isWireless).toBe(true);
        });

        it.each([8, 10])('rejects a row with %i cells', count => {
            const row = Array.from({ length: count }, (_, i) => phoneRow[i] ?? 'extra');
            expect(() => parseDeviceRecord(cells(row))).toThrow(RowParseError);
        });
    });

    describe('firmware entries', () => {
        const entry = {
            Active: true,
            InterfaceType: 'Wireless',
            HostName: 'Laptop',
            IPAddress: '192.168.10.20',
            MACAddress: '11:22:33:aa:bb:cc',
            AddressSource: 'DHCP',
            LeaseTimeRemaining: 7200,
            X_ALU_COM_LastActiveTime: '04/06/2025 04:04:31 PM'
        };

        it('derives status from the Active flag and passes lease and last-active through', () => {
            expect(parseDeviceRecord(firmware(entry))).toEqual({
                status: 'Active',
                connectionType: 'Wireless',
                name: 'Laptop',
                ipv4: '192.168.10.20',
                mac: '11:22:33:AA:BB:CC',
                allocation: 'DHCP',
                lease: 7200,
                lastActive: '04/06/2025 04:04:31 PM',
                isActive: true,
                isWireless: true
            });
        });

        it('keeps a malformed MAC exactly as given', () => {
            const device = parseDeviceRecord(firmware({ ...entry, MACAddress: ' bad mac ' }));
            expect(device.mac).toBe(' bad mac ');
        });

        it('maps Active=false to Inactive', () => {
            const device = parseDeviceRecord(firmware({ ...entry, Active: false }));
            expect(device.status).toBe('Inactive');
            expect(device.isActive).toBe(false);
        });

        it('keeps a textual lease as trimmed text without parsing it', () => {
            const device = parseDeviceRecord(firmware({ ...entry, LeaseTimeRemaining: ' 1 hour 0 min ' }));
            expect(device.lease).toBe('1 hour 0 min');
        });

        it('fills missing fields with empty text and Unknown name', () => {
            const device = parseDeviceRecord(firmware({ Active: false }));
            expect(device).toEqual({
                status: 'Inactive',
                connectionType: '',
                name: 'Unknown',
                ipv4: '',
                mac: '',
                allocation: '',
                lease: '',
                lastActive: '',
                isActive: false,
                isWireless: false
            });
        });

        it.each([
            ['a non-object entry', 'not an object'],
            ['an array entry', [1, 2, 3]],
            ['a missing Active flag', { HostName: 'x' }],
            ['a textual Active flag', { Active: 'true' }],
            ['a nested field value', { Active: true, HostName: { first: 'x' } }],
        ])('rejects %s', (_label, value) => {
            expect(() => parseDeviceRecord(firmware(value))).toThrow(RowParseError);
        });
    });
});

describe('parseDeviceRecords', () => {
    let logger: ReturnType<typeof silentLogger>;

    beforeEach(() => {
        logger = silentLogger();
        vi.spyOn(logger, 'warn');
    });

    it('skips bad rows without stopping the batch', () => {
        const records = [
            cells(phoneRow),
            cells(phoneRow.slice(0, 4)),
            firmware({ Active: 'yes' }),
            cells([...phoneRow.slice(0, 8), 'y']),
        ];

        const { devices, skipped } = parseDeviceRecords(records, logger);

        expect(devices).toHaveLength(2);
        expect(skipped).toBe(2);
        expect(skipped).toBe(records.length - devices.length);
        expect(logger.warn).toHaveBeenCalledTimes(2);
        expect(logger.warn).toHaveBeenNthCalledWith(1, '[DeviceRowParser] Row 1 skipped: Expected 9 cells, got 4');
    });

    it('keeps input order', () => {
        const second = [...phoneRow];
        second[2] = 'Second';
        const { devices } = parseDeviceRecords([cells(phoneRow), cells(second)], logger);
        expect(devices.map(d => d.name)).toEqual(['MyPhone', 'Second']);
    });
});
