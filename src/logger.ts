/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import registerDebug from "debug";
import winston from "winston";

export interface IWinstonConfig {
	colorize: boolean;
	json: boolean;
	label: string;
	level: string;
	timestamp: boolean;
}

/**
 * Configures the default behavior of the Winston logger based on the provided config
 */
export function configureLogging(config: IWinstonConfig): void {
	const formats = [winston.format.label({ label: config.label })];
	if (config.timestamp) {
		formats.push(winston.format.timestamp());
	}
	if (config.colorize) {
		formats.push(winston.format.colorize());
	}
	formats.push(config.json ? winston.format.json() : winston.format.simple());

	winston.configure({
		format: winston.format.combine(...formats),
		transports: [
			new winston.transports.Console({
				handleExceptions: true,
				level: config.level,
			}),
		],
	});

	// Forward all debug library logs through winston
	registerDebug.log = (message: string, ...args: unknown[]) => winston.info(message, ...args);
	// winston adds the timestamp, so debug only prefixes the namespace
	registerDebug.formatArgs = function (this: registerDebug.Debugger, args: unknown[]) {
		args[0] = `${this.namespace} ${String(args[0])}`;
	};
}
