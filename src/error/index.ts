export { ArgumentError } from './ArgumentError';
export { ConfigurationError, formatIssues } from './ConfigurationError';
export type { ConfigurationErrorType } from './ConfigurationError';
export { FileSystemError } from './FileSystemError';
export type { FileSystemErrorType, InputDirectoryRole } from './FileSystemError';
export { ParseError } from './ParseError';
export type { ParseFailureReason } from './ParseError';
export { StructuralMismatchError } from './StructuralMismatchError';
export { RenderError } from './RenderError';
export type { RenderFailureKind } from './RenderError';
