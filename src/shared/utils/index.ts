/**
 * Shared Utilities
 *
 * Error handling, file system operations and JSON validation.
 */

export {
    ErrorHandler,
    ErrorSeverity,
    type ErrorContext,
    type ErrorInfo
} from './ErrorHandler.js';

export {
    FileSystemHelper
} from './FileSystemHelper.js';

export {
    JsonValidator,
    Validators,
    createObjectValidator,
    type Validator,
    type ValidationResult
} from './JsonValidator.js';
