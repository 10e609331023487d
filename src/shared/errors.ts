/**
 * Error taxonomy for a tracker run.
 *
 * Stage errors (authentication, extraction) abort the run; row errors are
 * contained by the row parser; config errors fall back to defaults.
 */

export type TrackerErrorCode =
    | 'AUTHENTICATION_FAILURE'
    | 'EXTRACTION_FAILURE'
    | 'ROW_PARSE_FAILURE'
    | 'CONFIG_LOAD_FAILURE';

export class TrackerError extends Error {
    constructor(
        message: string,
        readonly code: TrackerErrorCode,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class AuthenticationError extends TrackerError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'AUTHENTICATION_FAILURE', options);
    }
}

export class ExtractionError extends TrackerError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'EXTRACTION_FAILURE', options);
    }
}

export class RowParseError extends TrackerError {
    constructor(message: string, readonly rowIndex?: number) {
        super(message, 'ROW_PARSE_FAILURE');
    }
}

export class ConfigLoadError extends TrackerError {
    constructor(message: string, readonly filePath: string, options?: { cause?: unknown }) {
        super(message, 'CONFIG_LOAD_FAILURE', options);
    }
}
