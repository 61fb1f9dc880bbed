/*
 * Copyright (C) 2026 Fluxer Contributors
 *
 * This file is part of Fluxer.
 *
 * Fluxer is free software: you can redistribute it and/or modify
 * it under the terms of the GNU Affero General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * Fluxer is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU Affero General Public License for more details.
 *
 * You should have received a copy of the GNU Affero General Public License
 * along with Fluxer. If not, see <https://www.gnu.org/licenses/>.
 */

import {Config} from '@petclinic/visits/src/Config';
import type {ILogger} from '@petclinic/visits/src/ILogger';
import pino from 'pino';

type Level = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export class PinoLogger implements ILogger {
	constructor(private readonly logger: pino.Logger) {}

	private write(level: Level, objOrMsg: object | string, msg?: string): void {
		if (typeof objOrMsg === 'string') {
			this.logger[level](objOrMsg);
		} else {
			this.logger[level](objOrMsg, msg);
		}
	}

	trace = (objOrMsg: object | string, msg?: string): void => this.write('trace', objOrMsg, msg);
	debug = (objOrMsg: object | string, msg?: string): void => this.write('debug', objOrMsg, msg);
	info = (objOrMsg: object | string, msg?: string): void => this.write('info', objOrMsg, msg);
	warn = (objOrMsg: object | string, msg?: string): void => this.write('warn', objOrMsg, msg);
	error = (objOrMsg: object | string, msg?: string): void => this.write('error', objOrMsg, msg);
	fatal = (objOrMsg: object | string, msg?: string): void => this.write('fatal', objOrMsg, msg);

	child(bindings: Record<string, unknown>): ILogger {
		return new PinoLogger(this.logger.child(bindings));
	}
}

let activeLogger: ILogger | null = null;

function getActiveLogger(): ILogger {
	if (!activeLogger) {
		activeLogger = new PinoLogger(
			pino({
				level: Config.logLevel,
				base: {service: 'petclinic-visits'},
				serializers: {error: pino.stdSerializers.err},
			}),
		);
	}
	return activeLogger;
}

export function initializeLogger(logger: ILogger): void {
	activeLogger = logger;
}

export const Logger: ILogger = {
	trace: (objOrMsg, msg) => getActiveLogger().trace(objOrMsg, msg),
	debug: (objOrMsg, msg) => getActiveLogger().debug(objOrMsg, msg),
	info: (objOrMsg, msg) => getActiveLogger().info(objOrMsg, msg),
	warn: (objOrMsg, msg) => getActiveLogger().warn(objOrMsg, msg),
	error: (objOrMsg, msg) => getActiveLogger().error(objOrMsg, msg),
	fatal: (objOrMsg, msg) => getActiveLogger().fatal(objOrMsg, msg),
	child: (bindings) => getActiveLogger().child(bindings),
};
