/**
 * Published value of a named collection
 *
 * One writer at a time by construction (single-threaded event loop), any
 * number of readers. Readers subscribe to be told about every replacement.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';

export type AsyncValue<T> =
	| { status: 'loading' }
	| { status: 'data'; value: T }
	| { status: 'error'; error: unknown };

export type CollectionListener<T> = (next: AsyncValue<T>, previous: AsyncValue<T>) => void;

export class CollectionStore<T> {
	readonly name: string;
	private store: StoreApi<AsyncValue<T>>;

	constructor(name: string, initial: AsyncValue<T> = { status: 'loading' }) {
		this.name = name;
		this.store = createStore<AsyncValue<T>>()(() => initial);
	}

	get(): AsyncValue<T> {
		return this.store.getState();
	}

	/**
	 * Current value, or undefined while loading or failed
	 */
	value(): T | undefined {
		const current = this.store.getState();
		return current.status === 'data' ? current.value : undefined;
	}

	set(next: AsyncValue<T>): void {
		this.store.setState(next, true);
	}

	setData(value: T): void {
		this.set({ status: 'data', value });
	}

	/**
	 * Replace the live value with `fn(live)`
	 *
	 * @returns false (and leaves the store alone) when there is no data
	 */
	update(fn: (current: T) => T): boolean {
		const current = this.store.getState();
		if (current.status !== 'data') return false;
		this.setData(fn(current.value));
		return true;
	}

	subscribe(listener: CollectionListener<T>): () => void {
		return this.store.subscribe(listener);
	}
}
