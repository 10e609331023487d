import type { RunLogger } from '../../shared/logging/Logger.js';
import { ErrorHandler, FileSystemHelper } from '../../shared/utils/index.js';
import { CanonicalDevice } from '../types.js';

interface Column {
    header: string;
    width: number;
    value: (device: CanonicalDevice) => string;
}

export const REPORT_COLUMNS: readonly Column[] = [
    { header: 'Status', width: 8, value: d => d.status },
    { header: 'Name', width: 20, value: d => d.name },
    { header: 'IP Address', width: 15, value: d => d.ipv4 },
    { header: 'MAC Address', width: 20, value: d => d.mac },
    { header: 'Last Active', width: 25, value: d => d.lastActive },
];

export const RULE_WIDTH = 120;

const formatRow = (cells: string[]) =>
    cells.map((cell, i) => cell.padEnd(REPORT_COLUMNS[i].width)).join('');

/**
 * Fixed-width summary, one line per device in the order given.
 */
export function renderTable(devices: readonly CanonicalDevice[]): string[] {
    const rule = '-'.repeat(RULE_WIDTH);
    return [
        'Device list summary:',
        rule,
        formatRow(REPORT_COLUMNS.map(c => c.header)),
        rule,
        ...devices.map(device => formatRow(REPORT_COLUMNS.map(c => c.value(device)))),
    ];
}

export class ReportSink {
    private readonly files: FileSystemHelper;

    constructor(
        private readonly logger: RunLogger,
        private readonly write: (line: string) => void = line => process.stdout.write(`${line}\n`)
    ) {
        this.files = new FileSystemHelper(new ErrorHandler(logger));
    }

    print(devices: readonly CanonicalDevice[]): void {
        this.write('');
        renderTable(devices).forEach(line => this.write(line));
    }

    writeJson(devices: readonly CanonicalDevice[], filePath: string): boolean {
        const saved = this.files.writeJSON(filePath, devices);
        if (saved) {
            this.logger.info(`[ReportSink] Full report saved to ${filePath}`);
        }
        return saved;
    }
}
