export type ExportErrorCode =
    | 'SOURCE_NOT_FOUND'
    | 'INVALID_SOURCE'
    | 'WRITE_FAILED'
    | 'EXPORT_FAILED';

export class ExportError extends Error {
    readonly code: ExportErrorCode;

    constructor(code: ExportErrorCode, message: string) {
        super(message);
        this.name = 'ExportError';
        this.code = code;
    }
}

export function isExportError(error: unknown): error is ExportError {
    return error instanceof ExportError;
}

export function asExportError(error: unknown, fallbackCode: ExportErrorCode, fallbackMessage: string): ExportError {
    if (isExportError(error)) {
        return error;
    }
    if (error instanceof Error) {
        return new ExportError(fallbackCode, error.message);
    }
    return new ExportError(fallbackCode, fallbackMessage);
}
