export * from './tracker/types.js';
export { formatMac, parseLeaseSeconds, parseLastActive } from './tracker/normalize/FieldNormalizers.js';
export { parseDeviceRecord, parseDeviceRecords, type ParsedBatch } from './tracker/normalize/DeviceRowParser.js';
export { DeviceListExtractor, type ExtractorOptions } from './tracker/extract/DeviceListExtractor.js';
export { readTableRows } from './tracker/extract/HtmlTableParser.js';
export { ReportSink, renderTable } from './tracker/report/ReportSink.js';
export { RouterSession } from './tracker/session/RouterSession.js';
export { DebugCapture } from './tracker/debug/DebugCapture.js';
export { TrackerRunner, ExitCode, type RunContext, type RunMode } from './tracker/runner.js';
export { type AppConfig, DEFAULT_CONFIG, loadConfigFile, configFromEnv, resolveConfig } from './config/AppConfig.js';
export { createRunLogger, closeRunLogger, type RunLogger } from './shared/logging/Logger.js';
export * from './shared/errors.js';
