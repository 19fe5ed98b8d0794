import { describe, expect, it } from 'vitest';
import { FileSystemError } from '../../src/error/FileSystemError';

describe('FileSystemError', () => {
    it('should create a FileSystemError with correct properties', () => {
        const originalError = new Error('Original error');
        const error = new FileSystemError('not_found', 'File not found', '/test/path', 'read', originalError);

        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('FileSystemError');
        expect(error.message).toBe('File not found');
        expect(error.errorType).toBe('not_found');
        expect(error.path).toBe('/test/path');
        expect(error.operation).toBe('read');
        expect(error.originalError).toBe(originalError);
    });

    it('should create a missing variables root error', () => {
        const error = FileSystemError.inputDirectoryNotFound('variables', '/work/vars');

        expect(error.errorType).toBe('not_found');
        expect(error.message).toBe('Variables not found in "/work/vars"');
        expect(error.path).toBe('/work/vars');
        expect(error.operation).toBe('variables_directory_access');
        expect(error.isMissingInput('variables')).toBe(true);
        expect(error.isMissingInput('templates')).toBe(false);
    });

    it('should create a missing template source error', () => {
        const error = FileSystemError.inputDirectoryNotFound('templates', '/work/templates');

        expect(error.message).toBe('Templates not found in "/work/templates"');
        expect(error.operation).toBe('templates_directory_access');
        expect(error.isMissingInput('templates')).toBe(true);
    });

    it('should create a missing options file error', () => {
        const error = FileSystemError.fileNotFound('/work/stratarender.yaml');

        expect(error.errorType).toBe('not_found');
        expect(error.message).toBe('Options file not found');
        expect(error.operation).toBe('file_read');
        expect(error.isMissingInput('variables')).toBe(false);
    });

    it('should create a directory creation failed error', () => {
        const originalError = new Error('Permission denied');
        const error = FileSystemError.directoryCreationFailed('/output', originalError);

        expect(error.errorType).toBe('creation_failed');
        expect(error.message).toBe('Failed to create directory: Permission denied');
        expect(error.path).toBe('/output');
        expect(error.operation).toBe('directory_create');
        expect(error.originalError).toBe(originalError);
    });

    it('should create an operation failed error', () => {
        const originalError = new Error('EISDIR');
        const error = FileSystemError.operationFailed('write rendered template', '/output/a', originalError);

        expect(error.errorType).toBe('operation_failed');
        expect(error.message).toBe('Failed to write rendered template: EISDIR');
        expect(error.operation).toBe('write rendered template');
    });

    it('should fall back to a generic reason for errors without a message', () => {
        const error = FileSystemError.operationFailed('read variables file', '/vars/a.yaml', new Error(''));

        expect(error.message).toBe('Failed to read variables file: Unknown error');
    });
});
