import {Data} from 'effect';

/**
 * File system operation failed (read, write, stat)
 */
export class FileSystemError extends Data.TaggedError('FileSystemError')<{
	readonly operation: 'read' | 'write' | 'mkdir' | 'stat';
	readonly path: string;
	readonly cause: string;
}> {}

/**
 * Configuration file is missing, unparseable or structurally invalid
 */
export class ConfigError extends Data.TaggedError('ConfigError')<{
	readonly configPath: string;
	readonly reason: 'missing' | 'parse' | 'validation';
	readonly details: string;
}> {}

/**
 * A settings value failed validation
 */
export class ValidationError extends Data.TaggedError('ValidationError')<{
	readonly field: string;
	readonly constraint: string;
	readonly receivedValue: unknown;
}> {}

/**
 * Requested position is not defined in the desk configuration.
 * User-correctable; the controller state is left untouched.
 */
export class InvalidPositionError extends Data.TaggedError(
	'InvalidPositionError',
)<{
	readonly position: string;
	readonly available: readonly string[];
}> {}

/**
 * The desk configuration could not be read while validating a position change.
 */
export class ConfigUnavailableError extends Data.TaggedError(
	'ConfigUnavailableError',
)<{
	readonly configPath: string;
	readonly reason: string;
	readonly details: string;
}> {}

/**
 * The external desk command could not be started or exited with a failure.
 * Only ever logged; the position bookkeeping goes on regardless.
 */
export class DeskMoveError extends Data.TaggedError('DeskMoveError')<{
	readonly position: string;
	readonly command: string;
	readonly cause: string;
}> {}

export class InvalidDwellDurationError extends Data.TaggedError(
	'InvalidDwellDurationError',
)<{
	readonly durationMs: number;
}> {}

export class ControllerDisposedError extends Data.TaggedError(
	'ControllerDisposedError',
)<{
	readonly position: string;
}> {}

export type PositionChangeError =
	| InvalidPositionError
	| ConfigUnavailableError
	| ControllerDisposedError;

export type AppError =
	| FileSystemError
	| ConfigError
	| ValidationError
	| PositionChangeError
	| DeskMoveError
	| InvalidDwellDurationError;

/**
 * Human-readable message for any application error
 */
export function formatAppError(error: AppError): string {
	switch (error._tag) {
		case 'FileSystemError':
			return `File ${error.operation} failed for ${error.path}: ${error.cause}`;
		case 'ConfigError':
			return `Invalid configuration at ${error.configPath} (${error.reason}): ${error.details}`;
		case 'ValidationError':
			return `Invalid value for ${error.field}: ${error.constraint}`;
		case 'InvalidPositionError':
			return error.available.length > 0
				? `Unknown position "${error.position}". Available: ${error.available.join(', ')}`
				: `Unknown position "${error.position}". No positions are configured.`;
		case 'ConfigUnavailableError':
			return `Desk configuration unavailable at ${error.configPath} (${error.reason}): ${error.details}`;
		case 'ControllerDisposedError':
			return `Cannot move to "${error.position}": controller is shut down`;
		case 'DeskMoveError':
			return `Desk command "${error.command}" failed for "${error.position}": ${error.cause}`;
		case 'InvalidDwellDurationError':
			return `Dwell duration must be a positive number of milliseconds, got ${error.durationMs}`;
	}
}
