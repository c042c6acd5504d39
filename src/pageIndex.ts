/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import { debugIndex } from "./debug.js";
import { ReentrantIndexMutationError } from "./errors.js";

/**
 * Receives every change of a {@link PageIndex}.
 */
export interface IIndexSubscriber {
	onIndexChanged(index: number): void;
}

/**
 * The part of a {@link PageIndex} that can be handed out without letting the holder move it.
 */
export interface IReadonlyPageIndex {
	readonly currentIndex: number;
	readonly subscriberCount: number;
	addSub(...subscribers: IIndexSubscriber[]): void;
}

/**
 * Cursor into a page sequence that notifies its subscribers after every change.
 *
 * @remarks
 * The index does no bounds checking; callers validate the new position before mutating it.
 * Subscribers are notified synchronously, in the order they were added, before the mutating
 * call returns. A subscriber that mutates the index from inside its callback gets a
 * {@link ReentrantIndexMutationError} and the index keeps the value being notified.
 */
export class PageIndex implements IReadonlyPageIndex {
	private readonly subscribers: IIndexSubscriber[] = [];
	private current = 0;
	private notifying = false;

	public get currentIndex(): number {
		return this.current;
	}

	public get subscriberCount(): number {
		return this.subscribers.length;
	}

	/**
	 * Adds subscribers to the end of the notification list. Duplicates are notified once per entry.
	 */
	public addSub(...subscribers: IIndexSubscriber[]): void {
		this.subscribers.push(...subscribers);
	}

	public set(index: number): void {
		this.mutate(index);
	}

	public incr(): void {
		this.mutate(this.current + 1);
	}

	public decr(): void {
		this.mutate(this.current - 1);
	}

	private mutate(index: number): void {
		if (this.notifying) {
			throw new ReentrantIndexMutationError();
		}
		debugIndex(`index ${this.current} -> ${index}`);
		this.current = index;
		this.notifying = true;
		try {
			for (const subscriber of this.subscribers) {
				subscriber.onIndexChanged(index);
			}
		} finally {
			this.notifying = false;
		}
	}
}
