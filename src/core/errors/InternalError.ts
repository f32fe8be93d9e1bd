/**
 * Raised when the date/time engine reaches a state its own construction should rule out.
 * Callers abort the current name and keep going with the next one.
 */
export class InternalError extends Error {
	readonly code = 'INTERNAL';

	constructor(
		message: string,
		readonly input?: string,
	) {
		super(input === undefined ? message : `${message} (input: ${JSON.stringify(input)})`);
		this.name = 'InternalError';
	}
}

export function isNodeError(err: unknown): err is NodeJS.ErrnoException {
	return typeof err === 'object' && err !== null && 'code' in err;
}

export function hasErrorCode(err: unknown, ...codes: string[]): err is NodeJS.ErrnoException {
	return isNodeError(err) && typeof err.code === 'string' && codes.includes(err.code);
}
