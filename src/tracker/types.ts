/**
 * Lease remaining: whole seconds when the firmware text parsed, otherwise the
 * trimmed original text.
 */
export type LeaseValue = number | string;

/**
 * Last activity: ISO-8601 local timestamp when the firmware text parsed,
 * otherwise the trimmed original text.
 */
export type LastActiveValue = string;

export interface CanonicalDevice {
    status: string;
    connectionType: string;
    name: string;
    ipv4: string;
    mac: string;
    allocation: string;
    lease: LeaseValue;
    lastActive: LastActiveValue;
    isActive: boolean;
    isWireless: boolean;
}

/**
 * One entry of the firmware's in-page device list. Fields are loosely typed
 * on the wire; the row parser checks them.
 */
export interface FirmwareDeviceEntry {
    Active?: unknown;
    InterfaceType?: unknown;
    HostName?: unknown;
    IPAddress?: unknown;
    MACAddress?: unknown;
    AddressSource?: unknown;
    LeaseTimeRemaining?: unknown;
    X_ALU_COM_LastActiveTime?: unknown;
}

/**
 * Raw device record, tagged by where it came from.
 */
export type RawDeviceRecord =
    | { kind: 'cells'; cells: readonly string[] }
    | { kind: 'firmware'; entry: unknown };

export type ExtractionSource = 'js-state' | 'html-table' | 'offline-html';

export interface ExtractionResult {
    source: ExtractionSource;
    devices: CanonicalDevice[];
    /** Rows dropped by the row parser */
    skipped: number;
}
