/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

/**
 * Reaction-driven multi-page messages for chat bots.
 *
 * @packageDocumentation
 */

export {
	createConfigProvider,
	defaultConfigPath,
	getLoggingConfig,
	getPaginatorOptions,
} from "./config.js";
export {
	AlreadyRunningError,
	IndexOutOfBoundsError,
	isPaginatorError,
	NilMessageError,
	PaginatorError,
	paginatorErrorTypes,
	ReentrantIndexMutationError,
	type PaginatorErrorType,
} from "./errors.js";
export { configureLogging, type IWinstonConfig } from "./logger.js";
export { NavigationEmoji, paginatorControls } from "./navigation.js";
export { formatPageFooter, type IPage, type IPageFooter } from "./page.js";
export { PageIndex, type IIndexSubscriber, type IReadonlyPageIndex } from "./pageIndex.js";
export {
	defaultPaginatorOptions,
	Paginator,
	parsePageNumber,
	type IPaginatorEvents,
	type IPaginatorOptions,
} from "./paginator.js";
export type {
	IChatSession,
	IMessageReaction,
	IReplyMessage,
	IWidget,
	IWidgetFactory,
	IWidgetMessage,
	ReactionHandler,
	RefreshTimerState,
} from "./widget.js";
