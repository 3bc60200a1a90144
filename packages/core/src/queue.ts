/**
 * Ordered, unbounded message queue.
 *
 * Entries leave strictly from the front. The array is compacted once the
 * consumed prefix dominates, so push and shift are O(1) amortized.
 */

import type { OutboundMessage } from '@relaylog/sdk';

export interface QueuedEntry {
	readonly message: OutboundMessage;
	/** Settles the producer's result handle. Called exactly once. */
	readonly resolve: (delivered: boolean) => void;
}

const COMPACT_THRESHOLD = 1024;

export class MessageQueue<T = QueuedEntry> {
	private items: T[] = [];
	private head = 0;

	push(item: T): void {
		this.items.push(item);
	}

	shift(): T | undefined {
		if (this.head >= this.items.length) return undefined;
		const item = this.items[this.head];
		this.head++;

		if (this.head === this.items.length) {
			this.items = [];
			this.head = 0;
		} else if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.items.length) {
			this.items = this.items.slice(this.head);
			this.head = 0;
		}
		return item;
	}

	get size(): number {
		return this.items.length - this.head;
	}

	get isEmpty(): boolean {
		return this.size === 0;
	}
}
