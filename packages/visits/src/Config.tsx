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

import process from 'node:process';
import {z} from 'zod';

type Env = Record<string, string | undefined>;

function required(env: Env, key: string): string {
	const value = env[key];
	if (!value) {
		throw new Error(`Missing required environment variable: ${key}`);
	}
	return value;
}

function optional(env: Env, key: string): string | undefined {
	return env[key] || undefined;
}

function optionalInt(env: Env, key: string, defaultValue: number): number {
	const value = env[key];
	if (!value) return defaultValue;
	const parsed = Number.parseInt(value, 10);
	return Number.isNaN(parsed) ? defaultValue : parsed;
}

function parseCommaSeparated(value: string): Array<string> {
	return value
		.split(',')
		.map((item) => item.trim())
		.filter((item) => item.length > 0);
}

const ConfigSchema = z
	.object({
		nodeEnv: z.enum(['development', 'production', 'test']),
		logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),

		database: z.object({
			backend: z.enum(['cassandra', 'memory']),
		}),

		cassandra: z.object({
			hosts: z.array(z.string()).min(1),
			keyspace: z.string().regex(/^[A-Za-z][A-Za-z0-9_]{0,47}$/, 'Invalid keyspace name'),
			localDc: z.string(),
			username: z.string().optional(),
			password: z.string().optional(),
			readTimeoutMs: z.number().int().positive(),
			fetchSize: z.number().int().positive(),
		}),
	})
	.refine((config) => (config.cassandra.username === undefined) === (config.cassandra.password === undefined), {
		message: 'CASSANDRA_USERNAME and CASSANDRA_PASSWORD must be set together',
		path: ['cassandra', 'username'],
	});

export type VisitsConfig = z.infer<typeof ConfigSchema>;

export function buildConfig(env: Env = process.env): VisitsConfig {
	return ConfigSchema.parse({
		nodeEnv: optional(env, 'NODE_ENV') ?? 'production',
		logLevel: optional(env, 'LOG_LEVEL') ?? 'info',
		database: {
			backend: optional(env, 'VISITS_DATABASE_BACKEND') ?? 'cassandra',
		},
		cassandra: {
			hosts: parseCommaSeparated(optional(env, 'CASSANDRA_HOSTS') ?? 'localhost'),
			keyspace: required(env, 'CASSANDRA_KEYSPACE'),
			localDc: optional(env, 'CASSANDRA_LOCAL_DC') ?? 'datacenter1',
			username: optional(env, 'CASSANDRA_USERNAME'),
			password: optional(env, 'CASSANDRA_PASSWORD'),
			readTimeoutMs: optionalInt(env, 'CASSANDRA_READ_TIMEOUT_MS', 12_000),
			fetchSize: optionalInt(env, 'CASSANDRA_FETCH_SIZE', 100),
		},
	});
}

export const Config = buildConfig();
