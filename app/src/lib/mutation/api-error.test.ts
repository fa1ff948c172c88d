import { describe, it, expect } from 'vitest';
import { ApiError, describeMutationError } from './api-error.js';

describe('ApiError', () => {
	it('should classify status codes', () => {
		expect(new ApiError(401, 'x').isUnauthorized).toBe(true);
		expect(new ApiError(403, 'x').isForbidden).toBe(true);
		expect(new ApiError(404, 'x').isNotFound).toBe(true);
		expect(new ApiError(400, 'x').isValidationError).toBe(true);
		expect(new ApiError(503, 'x').isServerError).toBe(true);
		expect(new ApiError(400, 'x').isServerError).toBe(false);
	});

	it('should format with the error type', () => {
		expect(String(new ApiError(401, 'Token expired', 'Unauthorized'))).toBe(
			'ApiError(401): Token expired (Unauthorized)'
		);
		expect(String(new ApiError(500, 'Internal'))).toBe('ApiError(500): Internal');
	});

	it('should be an Error', () => {
		const error = new ApiError(404, 'Game not found');
		expect(error).toBeInstanceOf(Error);
		expect(error.name).toBe('ApiError');
		expect(error.message).toBe('Game not found');
	});
});

describe('describeMutationError', () => {
	it('should word each failure class for the user', () => {
		expect(describeMutationError(new ApiError(401, 'x'))).toBe('Your session has expired. Please sign in again.');
		expect(describeMutationError(new ApiError(403, 'x'))).toBe('You do not have permission to do that.');
		expect(describeMutationError(new ApiError(404, 'x'))).toBe('That record no longer exists.');
		expect(describeMutationError(new ApiError(400, 'Invalid result code'))).toBe('Invalid result code');
		expect(describeMutationError(new ApiError(502, 'x'))).toBe('Server error. Please try again.');
		expect(describeMutationError(new TypeError('fetch failed'))).toBe(
			'Network error. Check your connection and try again.'
		);
	});
});
