/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import { TypedEventEmitter } from "@fluid-internal/client-utils";
import type { IEvent } from "@fluidframework/core-interfaces";
import winston from "winston";

import { debug } from "./debug.js";
import {
	AlreadyRunningError,
	getErrorMessage,
	IndexOutOfBoundsError,
	NilMessageError,
} from "./errors.js";
import { NavigationEmoji } from "./navigation.js";
import { formatPageFooter, type IPage } from "./page.js";
import { PageIndex, type IIndexSubscriber, type IReadonlyPageIndex } from "./pageIndex.js";
import type {
	IChatSession,
	IMessageReaction,
	IWidget,
	IWidgetFactory,
	IWidgetMessage,
} from "./widget.js";

export interface IPaginatorOptions {
	/**
	 * Wrap to the first page after the last one, and to the last page before the first one.
	 */
	loop: boolean;
	deleteMessageWhenDone: boolean;
	deleteReactionsWhenDone: boolean;
	/**
	 * Color given to the current page when a run ends. Absent or negative disables it.
	 */
	colorWhenDone?: number;
	numericInputPrompt: string;
	numericInputTimeoutMs: number;
}

export const defaultPaginatorOptions: Readonly<IPaginatorOptions> = {
	loop: false,
	deleteMessageWhenDone: false,
	deleteReactionsWhenDone: false,
	numericInputPrompt: "Insert a page number to go to",
	numericInputTimeoutMs: 10_000,
};

/**
 * Events emitted by the {@link Paginator}.
 */
export interface IPaginatorEvents extends IEvent {
	/**
	 * Emitted after every change of the current page index, including wraps and jumps.
	 */
	(event: "pageChanged", listener: (index: number) => void): void;
	/**
	 * Emitted when a run starts, before the widget renders the first page.
	 */
	(event: "spawn", listener: () => void): void;
	/**
	 * Emitted when a run has ended and its teardown has finished.
	 */
	(event: "stopped", listener: () => void): void;
}

const pageNumberPattern = /^[+-]?\d+$/;

/**
 * Parses a 1-based page number typed by a user.
 */
export function parsePageNumber(content: string): number | undefined {
	const trimmed = content.trim();
	return pageNumberPattern.test(trimmed) ? Number.parseInt(trimmed, 10) : undefined;
}

/**
 * Navigable multi-page message driven by reactions on a widget.
 *
 * @remarks
 * Every read or write of the cursor and of the running flag happens in a synchronous section with
 * no `await` inside it, so concurrently delivered reactions are applied one at a time. Widget and
 * session calls are only made once that section has finished.
 */
export class Paginator<TPage extends IPage = IPage>
	extends TypedEventEmitter<IPaginatorEvents>
	implements IIndexSubscriber
{
	public readonly widget: IWidget<TPage>;

	public loop: boolean;
	public deleteMessageWhenDone: boolean;
	public deleteReactionsWhenDone: boolean;
	public colorWhenDone: number | undefined;
	public numericInputPrompt: string;
	public numericInputTimeoutMs: number;

	private readonly pageList: TPage[] = [];
	private readonly cursor = new PageIndex();
	private isRunning = false;

	/**
	 * @param session - Chat session used to delete the message and its reactions after a run.
	 * @param channelId - Channel the paginator is spawned in.
	 * @param widgetFactory - Creates the widget that renders the pages and delivers reactions.
	 */
	constructor(
		public readonly session: IChatSession,
		public readonly channelId: string,
		widgetFactory: IWidgetFactory<TPage>,
		options: Partial<IPaginatorOptions> = {},
	) {
		super();
		this.loop = options.loop ?? defaultPaginatorOptions.loop;
		this.deleteMessageWhenDone =
			options.deleteMessageWhenDone ?? defaultPaginatorOptions.deleteMessageWhenDone;
		this.deleteReactionsWhenDone =
			options.deleteReactionsWhenDone ?? defaultPaginatorOptions.deleteReactionsWhenDone;
		this.colorWhenDone = options.colorWhenDone;
		this.numericInputPrompt =
			options.numericInputPrompt ?? defaultPaginatorOptions.numericInputPrompt;
		this.numericInputTimeoutMs =
			options.numericInputTimeoutMs ?? defaultPaginatorOptions.numericInputTimeoutMs;

		this.widget = widgetFactory.createWidget(session, channelId);
		this.cursor.addSub(this);
		this.addHandlers();
	}

	/**
	 * The pages in display order. Use {@link Paginator.add} to append.
	 */
	public get pages(): readonly TPage[] {
		return this.pageList;
	}

	/**
	 * The page cursor. It moves only through the navigation methods.
	 */
	public get index(): IReadonlyPageIndex {
		return this.cursor;
	}

	public get running(): boolean {
		return this.isRunning;
	}

	public onIndexChanged(index: number): void {
		this.emit("pageChanged", index);
	}

	/**
	 * Renders the current page and runs the widget until it terminates.
	 *
	 * @remarks
	 * Teardown runs once however the widget's run loop ends. A rejection of the run loop is
	 * re-raised after teardown.
	 */
	public async spawn(): Promise<void> {
		if (this.isRunning) {
			throw new AlreadyRunningError();
		}
		this.isRunning = true;

		let page: TPage;
		try {
			page = this.page();
		} catch (error) {
			this.isRunning = false;
			throw error;
		}

		try {
			debug(`spawning in channel ${this.channelId} at page ${this.cursor.currentIndex}`);
			this.emit("spawn");
			await this.widget.spawn(page);
		} finally {
			await this.teardown();
			this.isRunning = false;
			debug(`stopped in channel ${this.channelId}`);
			this.emit("stopped");
		}
	}

	public add(...pages: TPage[]): void {
		this.pageList.push(...pages);
	}

	/**
	 * Returns the page at the current index.
	 */
	public page(): TPage {
		const current = this.cursor.currentIndex;
		if (!this.isInBounds(current)) {
			throw new IndexOutOfBoundsError(current, this.pageList.length);
		}
		return this.pageList[current];
	}

	public nextPage(): void {
		const next = this.cursor.currentIndex + 1;
		if (this.isInBounds(next)) {
			this.cursor.incr();
			return;
		}
		if (this.loop && this.pageList.length > 0) {
			this.cursor.set(0);
			return;
		}
		throw new IndexOutOfBoundsError(next, this.pageList.length);
	}

	public previousPage(): void {
		const previous = this.cursor.currentIndex - 1;
		if (this.isInBounds(previous)) {
			this.cursor.decr();
			return;
		}
		if (this.loop && this.pageList.length > 0) {
			this.cursor.set(this.pageList.length - 1);
			return;
		}
		throw new IndexOutOfBoundsError(previous, this.pageList.length);
	}

	/**
	 * Jumps to the page at the given 0-based index. Not affected by {@link Paginator.loop}.
	 */
	public goto(index: number): void {
		if (!this.isInBounds(index)) {
			throw new IndexOutOfBoundsError(index, this.pageList.length);
		}
		this.cursor.set(index);
	}

	/**
	 * Pushes the current page to the widget's message.
	 */
	public async update(): Promise<IWidgetMessage> {
		if (this.widget.message === undefined) {
			throw new NilMessageError();
		}
		if (this.widget.refreshAfterAction && this.widget.refreshTimerState === "active") {
			try {
				await this.widget.refreshTimeout();
			} catch (error) {
				debug(`refreshing the widget timeout failed: ${getErrorMessage(error)}`);
			}
		}
		const page = this.page();
		return this.widget.updateEmbed(page);
	}

	/**
	 * Sets the footer of every page to its position out of the page count.
	 */
	public setPageFooters(): void {
		this.pageList.forEach((page, index) => {
			page.footer = { text: formatPageFooter(index, this.pageList.length) };
		});
	}

	private isInBounds(index: number): boolean {
		return Number.isInteger(index) && index >= 0 && index < this.pageList.length;
	}

	private addHandlers(): void {
		this.widget.handle(NavigationEmoji.beginning, async () => this.navigate(() => this.goto(0)));
		this.widget.handle(NavigationEmoji.left, async () => this.navigate(() => this.previousPage()));
		this.widget.handle(NavigationEmoji.right, async () => this.navigate(() => this.nextPage()));
		this.widget.handle(NavigationEmoji.end, async () =>
			this.navigate(() => this.goto(this.pageList.length - 1)),
		);
		this.widget.handle(NavigationEmoji.numbers, async (widget, reaction) =>
			this.gotoRequestedPage(widget, reaction),
		);
	}

	/**
	 * Applies a navigation step and re-renders. Failures are traced and otherwise dropped: the
	 * reacting user sees no error. A step that moved the cursor before failing, such as one whose
	 * `pageChanged` listener threw, still re-renders.
	 */
	private async navigate(step: () => void): Promise<void> {
		const before = this.cursor.currentIndex;
		try {
			step();
		} catch (error) {
			debug(`navigation ignored: ${getErrorMessage(error)}`);
			if (this.cursor.currentIndex === before) {
				return;
			}
		}

		try {
			await this.update();
		} catch (error) {
			debug(`re-render after navigation failed: ${getErrorMessage(error)}`);
		}
	}

	private async gotoRequestedPage(widget: IWidget<TPage>, reaction: IMessageReaction): Promise<void> {
		let content: string;
		try {
			const reply = await widget.queryInput(
				this.numericInputPrompt,
				reaction.userId,
				this.numericInputTimeoutMs,
			);
			content = reply.content;
		} catch (error) {
			debug(`page number request from ${reaction.userId} abandoned: ${getErrorMessage(error)}`);
			return;
		}

		const pageNumber = parsePageNumber(content);
		if (pageNumber === undefined) {
			debug(`ignoring page number reply "${content}" from ${reaction.userId}`);
			return;
		}
		await this.navigate(() => this.goto(pageNumber - 1));
	}

	private async teardown(): Promise<void> {
		const message = this.widget.message;

		if (this.deleteMessageWhenDone && message !== undefined) {
			await this.cleanup("delete the message", async () =>
				this.session.deleteMessage(message.channelId, message.id),
			);
		} else if (this.colorWhenDone !== undefined && this.colorWhenDone >= 0) {
			const color = this.colorWhenDone;
			await this.cleanup("apply the completion color", async () => {
				this.page().color = color;
				await this.update();
			});
		}

		if (this.deleteReactionsWhenDone && message !== undefined) {
			await this.cleanup("remove the reactions", async () =>
				this.session.removeAllReactions(this.widget.channelId, message.id),
			);
		}
	}

	private async cleanup(action: string, step: () => Promise<unknown>): Promise<void> {
		try {
			await step();
		} catch (error) {
			winston.warn(
				`Paginator in channel ${this.channelId} could not ${action}: ${getErrorMessage(error)}`,
			);
		}
	}
}
