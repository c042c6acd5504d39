/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

/**
 * Reaction emoji a paginator's widget shows as controls on its message.
 */
export const NavigationEmoji = {
	beginning: "⏪",
	left: "⬅",
	right: "➡",
	end: "⏩",
	numbers: "🔢",
} as const;

export type NavigationEmoji = (typeof NavigationEmoji)[keyof typeof NavigationEmoji];

/**
 * The controls a paginator binds, in the order a widget should display them.
 */
export const paginatorControls: readonly NavigationEmoji[] = [
	NavigationEmoji.beginning,
	NavigationEmoji.left,
	NavigationEmoji.right,
	NavigationEmoji.end,
	NavigationEmoji.numbers,
];
