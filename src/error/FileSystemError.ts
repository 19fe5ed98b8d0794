export type FileSystemErrorType = 'not_found' | 'not_readable' | 'creation_failed' | 'operation_failed';

/** Which input root a missing-directory error refers to */
export type InputDirectoryRole = 'variables' | 'templates';

/**
 * Error thrown for filesystem problems: missing input roots, unreadable files
 * and failed writes.
 */
export class FileSystemError extends Error {
    public readonly errorType: FileSystemErrorType;
    public readonly path: string;
    public readonly operation: string;
    public readonly originalError?: Error;

    constructor(
        errorType: FileSystemErrorType,
        message: string,
        path: string,
        operation: string,
        originalError?: Error
    ) {
        super(message);
        this.name = 'FileSystemError';
        this.errorType = errorType;
        this.path = path;
        this.operation = operation;
        this.originalError = originalError;
        Object.setPrototypeOf(this, FileSystemError.prototype);
    }

    /**
     * The variables root or the template source does not exist.
     */
    static inputDirectoryNotFound(role: InputDirectoryRole, path: string): FileSystemError {
        const label = role === 'variables' ? 'Variables' : 'Templates';
        return new FileSystemError('not_found', `${label} not found in "${path}"`, path, `${role}_directory_access`);
    }

    static fileNotFound(path: string): FileSystemError {
        return new FileSystemError('not_found', 'Options file not found', path, 'file_read');
    }

    static directoryCreationFailed(path: string, originalError: Error): FileSystemError {
        return new FileSystemError(
            'creation_failed',
            `Failed to create directory: ${originalError.message || 'Unknown error'}`,
            path,
            'directory_create',
            originalError
        );
    }

    static operationFailed(operation: string, path: string, originalError: Error): FileSystemError {
        return new FileSystemError(
            'operation_failed',
            `Failed to ${operation}: ${originalError.message || 'Unknown error'}`,
            path,
            operation,
            originalError
        );
    }

    /** True when this error reports a missing input root of the given role */
    isMissingInput(role: InputDirectoryRole): boolean {
        return this.errorType === 'not_found' && this.operation === `${role}_directory_access`;
    }
}
