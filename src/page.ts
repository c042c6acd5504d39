/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

export interface IPageFooter {
	text: string;
	iconUrl?: string;
}

/**
 * One unit of paginated content.
 *
 * @remarks
 * Pages are opaque to the paginator apart from the footer, which {@link Paginator.setPageFooters}
 * rewrites, and the color, which is set when a run ends with a completion color configured.
 * Callers extend this with whatever their chat surface renders.
 */
export interface IPage {
	footer?: IPageFooter;
	color?: number;
}

export function formatPageFooter(index: number, pageCount: number): string {
	return `Page #${index + 1} out of ${pageCount}`;
}
