/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

/**
 * Error types raised by the paginator.
 */
export const paginatorErrorTypes = {
	/**
	 * `spawn` was called while a run is already in progress.
	 */
	alreadyRunningError: "alreadyRunningError",
	/**
	 * A navigation or lookup would move the cursor outside the page sequence.
	 */
	indexOutOfBoundsError: "indexOutOfBoundsError",
	/**
	 * `update` was called before the widget rendered any message.
	 */
	nilMessageError: "nilMessageError",
	/**
	 * A page index subscriber tried to move the index while it was being notified.
	 */
	reentrantIndexMutationError: "reentrantIndexMutationError",
} as const;

export type PaginatorErrorType = (typeof paginatorErrorTypes)[keyof typeof paginatorErrorTypes];

/**
 * Base class of every error the paginator raises.
 */
export abstract class PaginatorError extends Error {
	public abstract readonly errorType: PaginatorErrorType;

	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

export class AlreadyRunningError extends PaginatorError {
	public readonly errorType = paginatorErrorTypes.alreadyRunningError;

	constructor() {
		super("Paginator is already running");
	}
}

export class IndexOutOfBoundsError extends PaginatorError {
	public readonly errorType = paginatorErrorTypes.indexOutOfBoundsError;

	/**
	 * @param index - The cursor position that was requested.
	 * @param pageCount - Number of pages at the time of the request.
	 */
	constructor(
		public readonly index: number,
		public readonly pageCount: number,
	) {
		super(`Index ${index} is out of bounds for ${pageCount} page(s)`);
	}
}

export class NilMessageError extends PaginatorError {
	public readonly errorType = paginatorErrorTypes.nilMessageError;

	constructor() {
		super("Paginator has no message to update");
	}
}

export class ReentrantIndexMutationError extends PaginatorError {
	public readonly errorType = paginatorErrorTypes.reentrantIndexMutationError;

	constructor() {
		super("Page index mutated from inside a subscriber callback");
	}
}

/**
 * Checks whether an unknown error was raised by the paginator, optionally of a given type.
 */
export function isPaginatorError(error: unknown, errorType?: PaginatorErrorType): error is PaginatorError {
	if (!(error instanceof PaginatorError)) {
		return false;
	}
	return errorType === undefined || error.errorType === errorType;
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
