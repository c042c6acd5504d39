/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

/**
 * Handle to a message the widget rendered.
 */
export interface IWidgetMessage {
	readonly id: string;
	readonly channelId: string;
}

/**
 * A reaction added to the widget's message by a user.
 */
export interface IMessageReaction {
	readonly emoji: string;
	readonly userId: string;
	readonly messageId: string;
	readonly channelId: string;
}

/**
 * A text message sent in reply to {@link IWidget.queryInput}.
 */
export interface IReplyMessage {
	readonly id: string;
	readonly userId: string;
	readonly content: string;
}

/**
 * State of the widget's inactivity timer.
 *
 * - `absent`: no timer was ever started (the widget has no timeout, or has not spawned yet).
 * - `active`: the timer is running and can be refreshed.
 * - `expired`: the timer fired and the widget's run loop is ending.
 */
export type RefreshTimerState = "absent" | "active" | "expired";

export type ReactionHandler<TPage> = (
	widget: IWidget<TPage>,
	reaction: IMessageReaction,
) => Promise<void>;

/**
 * Interactive message collaborator: renders content, shows reaction controls and delivers
 * reaction events to the registered handlers.
 */
export interface IWidget<TPage> {
	readonly channelId: string;

	/**
	 * The rendered message, once the widget has sent one.
	 */
	readonly message: IWidgetMessage | undefined;

	/**
	 * Whether the inactivity timer should be refreshed after each handled action.
	 */
	readonly refreshAfterAction: boolean;

	readonly refreshTimerState: RefreshTimerState;

	/**
	 * Registers the handler run whenever a user adds the given reaction.
	 */
	handle(emoji: string, handler: ReactionHandler<TPage>): void;

	/**
	 * Renders the initial content and runs until the widget terminates.
	 *
	 * @remarks
	 * Rejects if the initial content could not be sent or the run loop failed.
	 */
	spawn(initialPage: TPage): Promise<void>;

	/**
	 * Replaces the displayed content.
	 */
	updateEmbed(page: TPage): Promise<IWidgetMessage>;

	/**
	 * Asks a user for a single text reply.
	 *
	 * @remarks
	 * Rejects when no reply from that user arrives within `timeoutMs`.
	 */
	queryInput(prompt: string, userId: string, timeoutMs: number): Promise<IReplyMessage>;

	/**
	 * Extends the inactivity timer.
	 */
	refreshTimeout(): Promise<void>;
}

/**
 * Chat service calls used to clean up after a run.
 */
export interface IChatSession {
	deleteMessage(channelId: string, messageId: string): Promise<void>;
	removeAllReactions(channelId: string, messageId: string): Promise<void>;
}

export interface IWidgetFactory<TPage> {
	createWidget(session: IChatSession, channelId: string): IWidget<TPage>;
}
