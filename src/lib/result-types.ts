/**
 * Result Type Utilities
 *
 * Re-exports and small helpers for the Result pattern using neverthrow.
 * Resolver operations return Results instead of throwing.
 */

import {
	Result as NeverthrowResult,
	ok as neverthrowOk,
	err as neverthrowErr,
} from 'neverthrow';

export type Result<T, E> = NeverthrowResult<T, E>;
export const ok = neverthrowOk;
export const err = neverthrowErr;

/**
 * Combine multiple Results into a single Result
 *
 * @param results - Array of Results to combine
 * @returns Result with array of values or first error
 */
export function combineResults<T, E>(
	results: readonly Result<T, E>[]
): Result<T[], E> {
	const values: T[] = [];

	for (const result of results) {
		if (result.isErr()) {
			return err(result.error);
		}
		values.push(result.value);
	}

	return ok(values);
}

/**
 * Execute a synchronous function and wrap result in Result type
 *
 * @param fn - Synchronous function to execute
 * @param errorHandler - Function to convert errors to type E
 */
export function trySync<T, E>(
	fn: () => T,
	errorHandler: (error: unknown) => E
): Result<T, E> {
	try {
		return ok(fn());
	} catch (error) {
		return err(errorHandler(error));
	}
}
