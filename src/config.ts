/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import { fileURLToPath } from "node:url";

import nconf from "nconf";
import type { Provider } from "nconf";

import type { IWinstonConfig } from "./logger.js";
import { defaultPaginatorOptions, type IPaginatorOptions } from "./paginator.js";

export const defaultConfigPath = fileURLToPath(new URL("../config.json", import.meta.url));

const defaultLoggingConfig: IWinstonConfig = {
	colorize: true,
	json: false,
	label: "paginator",
	level: "info",
	timestamp: true,
};

/**
 * Creates the configuration provider: command line arguments first, then environment variables
 * (nested keys separated by `__`, e.g. `paginator__loop=true`), then the JSON config file.
 */
export function createConfigProvider(configPath: string = defaultConfigPath): Provider {
	return new nconf.Provider().argv().env({ separator: "__" }).file(configPath);
}

function readBoolean(value: unknown, fallback: boolean): boolean {
	if (typeof value === "boolean") {
		return value;
	}
	if (value === "true" || value === "false") {
		return value === "true";
	}
	return fallback;
}

function readNumber(value: unknown): number | undefined {
	if (typeof value === "number") {
		return Number.isFinite(value) ? value : undefined;
	}
	if (typeof value === "string" && value.trim() !== "") {
		const parsed = Number(value);
		return Number.isFinite(parsed) ? parsed : undefined;
	}
	return undefined;
}

function readString(value: unknown, fallback: string): string {
	return typeof value === "string" && value !== "" ? value : fallback;
}

/**
 * Reads the `paginator` section of the configuration.
 */
export function getPaginatorOptions(config: Provider): IPaginatorOptions {
	const get = (key: string): unknown => config.get(`paginator:${key}`);

	const colorWhenDone = readNumber(get("colorWhenDone"));
	const timeout = readNumber(get("numericInputTimeoutMs"));
	return {
		loop: readBoolean(get("loop"), defaultPaginatorOptions.loop),
		deleteMessageWhenDone: readBoolean(
			get("deleteMessageWhenDone"),
			defaultPaginatorOptions.deleteMessageWhenDone,
		),
		deleteReactionsWhenDone: readBoolean(
			get("deleteReactionsWhenDone"),
			defaultPaginatorOptions.deleteReactionsWhenDone,
		),
		colorWhenDone: colorWhenDone !== undefined && colorWhenDone >= 0 ? colorWhenDone : undefined,
		numericInputPrompt: readString(
			get("numericInputPrompt"),
			defaultPaginatorOptions.numericInputPrompt,
		),
		numericInputTimeoutMs:
			timeout !== undefined && timeout > 0 ? timeout : defaultPaginatorOptions.numericInputTimeoutMs,
	};
}

/**
 * Reads the `logger` section of the configuration.
 */
export function getLoggingConfig(config: Provider): IWinstonConfig {
	const get = (key: string): unknown => config.get(`logger:${key}`);

	return {
		colorize: readBoolean(get("colorize"), defaultLoggingConfig.colorize),
		json: readBoolean(get("json"), defaultLoggingConfig.json),
		label: readString(get("label"), defaultLoggingConfig.label),
		level: readString(get("level"), defaultLoggingConfig.level),
		timestamp: readBoolean(get("timestamp"), defaultLoggingConfig.timestamp),
	};
}
