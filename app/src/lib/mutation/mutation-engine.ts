/**
 * Optimistic mutation executor
 *
 * Runs one mutation against a collection in four steps:
 * 1. publish `optimisticUpdate(live)`
 * 2. await `apiCall()`
 * 3. on success publish `applyResult(live, result)`
 * 4. on failure publish `rollback(live)` and notify
 *
 * "live" is the collection value at the moment of each step, never a copy
 * taken earlier, so a mutation that settles in between keeps its effect.
 * There is no locking and no retry.
 */

import type { CollectionStore } from './collection-store.js';
import { describeMutationError } from './api-error.js';
import { consoleNotifier, type Notifier } from './notifier.js';

export interface MutationDescriptor<T, R> {
	optimisticUpdate: (current: T) => T;
	apiCall: () => Promise<R>;
	applyResult: (current: T, result: R) => T;
	/** Undo the optimistic edit on the live value; do not restore a snapshot */
	rollback: (current: T) => T;
	successMessage?: string;
	errorMessage?: (error: unknown) => string;
}

export type MutationResult<R> =
	| { ok: true; value: R }
	| { ok: false; reason: 'not-ready' }
	| { ok: false; reason: 'not-found'; message: string }
	| { ok: false; reason: 'failed'; error: unknown; message: string };

export class MutationEngine {
	private notifier: Notifier;

	constructor(notifier: Notifier = consoleNotifier) {
		this.notifier = notifier;
	}

	/**
	 * Never throws for a failed `apiCall`; the failure is rolled back,
	 * notified and returned.
	 *
	 * Resolves to `not-ready` without calling the API when the collection has
	 * no data yet.
	 */
	async mutate<T, R>(
		collection: CollectionStore<T>,
		descriptor: MutationDescriptor<T, R>
	): Promise<MutationResult<R>> {
		const initial = collection.get();
		if (initial.status !== 'data') {
			return { ok: false, reason: 'not-ready' };
		}

		collection.setData(descriptor.optimisticUpdate(initial.value));

		let result: R;
		try {
			result = await descriptor.apiCall();
		} catch (error) {
			if (!collection.update(descriptor.rollback)) {
				console.warn(`[Mutation] ${collection.name}: no data to roll back against`);
			}

			const message = descriptor.errorMessage?.(error) ?? describeMutationError(error);
			console.warn(`[Mutation] ${collection.name}: rolled back -`, error);
			this.notifier.error(message);
			return { ok: false, reason: 'failed', error, message };
		}

		if (!collection.update((live) => descriptor.applyResult(live, result))) {
			console.warn(`[Mutation] ${collection.name}: collection reset before result could be applied`);
		}

		if (descriptor.successMessage) {
			this.notifier.success(descriptor.successMessage);
		}
		return { ok: true, value: result };
	}

	/**
	 * Report a mutation rejected before it started (unknown id etc.)
	 */
	reject(message: string): MutationResult<never> {
		this.notifier.error(message);
		return { ok: false, reason: 'not-found', message };
	}
}
