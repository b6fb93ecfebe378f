import { StatusCode } from './types.js';

/**
 * Base class for errors raised by the join operators.
 */
export class OrderedJoinError extends Error {
	public code: number;
	public cause?: Error;

	constructor(message: string, code: number = StatusCode.ERROR, cause?: Error) {
		super(message);
		this.code = code;
		this.name = 'OrderedJoinError';
		this.cause = cause;

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, OrderedJoinError);
		}
	}
}

/**
 * Error thrown when an API is used incorrectly
 */
export class MisuseError extends OrderedJoinError {
	constructor(message: string = "API misuse") {
		super(message, StatusCode.MISUSE);
		this.name = 'MisuseError';
		Object.setPrototypeOf(this, MisuseError.prototype);
	}
}

/**
 * Error thrown at call time when a required argument is missing or has the wrong shape.
 * Raised before any element of either input is read.
 */
export class InvalidArgumentError extends MisuseError {
	public argumentName: string;

	constructor(argumentName: string, message: string = `Argument '${argumentName}' is required`) {
		super(message);
		this.argumentName = argumentName;
		this.name = 'InvalidArgumentError';
		Object.setPrototypeOf(this, InvalidArgumentError.prototype);
	}
}

/**
 * Helper function to throw a MisuseError
 * @returns Never (always throws)
 */
export function misuseError(message: string): never {
	throw new MisuseError(message);
}
