/**
 * Failure raised by the request client for any non-2xx response
 */
export class ApiError extends Error {
	readonly statusCode: number;
	readonly errorType?: string;

	constructor(statusCode: number, message: string, errorType?: string) {
		super(message);
		this.name = 'ApiError';
		this.statusCode = statusCode;
		this.errorType = errorType;
	}

	/** Caller must re-authenticate */
	get isUnauthorized(): boolean {
		return this.statusCode === 401;
	}

	get isForbidden(): boolean {
		return this.statusCode === 403;
	}

	get isNotFound(): boolean {
		return this.statusCode === 404;
	}

	get isValidationError(): boolean {
		return this.statusCode === 400;
	}

	get isServerError(): boolean {
		return this.statusCode >= 500;
	}

	toString(): string {
		return `ApiError(${this.statusCode}): ${this.message}${this.errorType ? ` (${this.errorType})` : ''}`;
	}
}

/**
 * User-facing message for a failed mutation. Every failure rolls back the
 * same way; only the wording differs.
 */
export function describeMutationError(error: unknown): string {
	if (error instanceof ApiError) {
		if (error.isUnauthorized) return 'Your session has expired. Please sign in again.';
		if (error.isForbidden) return 'You do not have permission to do that.';
		if (error.isNotFound) return 'That record no longer exists.';
		if (error.isValidationError) return error.message;
		if (error.isServerError) return 'Server error. Please try again.';
		return error.message;
	}
	return 'Network error. Check your connection and try again.';
}
