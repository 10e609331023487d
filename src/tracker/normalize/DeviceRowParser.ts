import { DEVICE_ROW_CELL_COUNT, UNKNOWN_DEVICE_NAME } from '../../config/constants.js';
import { RowParseError } from '../../shared/errors.js';
import type { RunLogger } from '../../shared/logging/Logger.js';
import { Validators } from '../../shared/utils/index.js';
import type { CanonicalDevice, FirmwareDeviceEntry, LeaseValue, RawDeviceRecord } from '../types.js';
import { formatMac, parseLastActive, parseLeaseSeconds } from './FieldNormalizers.js';

interface DeviceFields {
    status: string;
    connectionType: string;
    name: string;
    ipv4: string;
    mac: string;
    allocation: string;
    lease: LeaseValue;
    lastActive: string;
}

export interface ParsedBatch {
    devices: CanonicalDevice[];
    skipped: number;
}

function text(value: unknown, field: string): string {
    if (value === undefined || value === null) return '';
    if (typeof value === 'string') return value.trim();
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    throw new RowParseError(`Field ${field} has unsupported type ${typeof value}`);
}

function isFirmwareEntry(value: unknown): value is FirmwareDeviceEntry {
    return Validators.object(value);
}

function fromCells(cells: readonly string[]): DeviceFields {
    if (cells.length !== DEVICE_ROW_CELL_COUNT) {
        throw new RowParseError(`Expected ${DEVICE_ROW_CELL_COUNT} cells, got ${cells.length}`);
    }
    const [status, connectionType, name, ipv4, mac, allocation, lease, lastActive] = cells;
    return {
        status: status.trim(),
        connectionType: connectionType.trim(),
        name: name.trim(),
        ipv4: ipv4.trim(),
        mac: formatMac(mac),
        allocation: allocation.trim(),
        lease: parseLeaseSeconds(lease),
        lastActive: parseLastActive(lastActive),
    };
}

/**
 * Firmware entries carry lease and last-active values already in the
 * firmware's own representation; they are passed through, not re-parsed.
 */
function fromFirmware(entry: unknown): DeviceFields {
    if (!isFirmwareEntry(entry)) {
        throw new RowParseError('Device entry is not an object');
    }
    if (typeof entry.Active !== 'boolean') {
        throw new RowParseError(`Active flag is not a boolean: ${JSON.stringify(entry.Active)}`);
    }

    const lease = entry.LeaseTimeRemaining;
    return {
        status: entry.Active ? 'Active' : 'Inactive',
        connectionType: text(entry.InterfaceType, 'InterfaceType'),
        name: text(entry.HostName, 'HostName'),
        ipv4: text(entry.IPAddress, 'IPAddress'),
        mac: typeof entry.MACAddress === 'string'
            ? formatMac(entry.MACAddress)
            : formatMac(text(entry.MACAddress, 'MACAddress')),
        allocation: text(entry.AddressSource, 'AddressSource'),
        lease: typeof lease === 'number' && Number.isFinite(lease)
            ? Math.trunc(lease)
            : text(lease, 'LeaseTimeRemaining'),
        lastActive: text(entry.X_ALU_COM_LastActiveTime, 'X_ALU_COM_LastActiveTime'),
    };
}

/**
 * Normalize one raw record. Throws RowParseError when the record cannot be
 * turned into a device.
 */
export function parseDeviceRecord(record: RawDeviceRecord): CanonicalDevice {
    const fields = record.kind === 'cells' ? fromCells(record.cells) : fromFirmware(record.entry);
    return {
        ...fields,
        name: fields.name || UNKNOWN_DEVICE_NAME,
        isActive: fields.status.toLowerCase() === 'active',
        isWireless: fields.connectionType.toLowerCase().includes('wireless'),
    };
}

/**
 * Normalize a batch. A record that fails is logged with its index and
 * skipped; the rest of the batch continues.
 */
export function parseDeviceRecords(records: readonly RawDeviceRecord[], logger: RunLogger): ParsedBatch {
    const devices: CanonicalDevice[] = [];
    let skipped = 0;

    records.forEach((record, index) => {
        try {
            devices.push(parseDeviceRecord(record));
        } catch (error) {
            skipped++;
            const message = error instanceof Error ? error.message : String(error);
            logger.warn(`[DeviceRowParser] Row ${index} skipped: ${message}`);
        }
    });

    return { devices, skipped };
}
