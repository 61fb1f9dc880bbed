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

import cassandra from 'cassandra-driver';

const KEY_SEPARATOR = '\u0000';

export type KvRow = Record<string, unknown>;

export interface KvEntry {
	key: string;
	value: KvRow;
}

interface KvIndex {
	column: string;
	entries: Map<string, Set<string>>;
}

interface KvTable {
	rows: Map<string, KvRow>;
	indexes: Map<string, KvIndex>;
}

/**
 * Sorts like Cassandra's `uuid` type: by version first, time-based UUIDs by
 * their timestamp, then by the remaining bytes.
 */
function uuidSortKey(uuid: string): string {
	const hex = uuid.replace(/-/g, '').toLowerCase();
	const version = hex.charAt(12);
	if (version !== '1') return `${version}${hex}`;
	return `${version}${hex.slice(13, 16)}${hex.slice(8, 12)}${hex.slice(0, 8)}${hex.slice(16)}`;
}

export function encodeKeyPart(value: unknown): string {
	if (value === null || value === undefined) return '';
	if (value instanceof cassandra.types.Uuid) return uuidSortKey(value.toString());
	if (value instanceof cassandra.types.LocalDate) return value.toString();
	if (Buffer.isBuffer(value)) return value.toString('hex');
	if (value instanceof Date) return value.toISOString();
	return String(value);
}

/**
 * Encodes primary key values so that lexical order of the encoded keys follows
 * clustering order, and the encoding of a partition key is a prefix of the
 * encoding of every row in that partition.
 */
export function encodeKey(values: ReadonlyArray<unknown>): string {
	return values.map((value) => `${encodeKeyPart(value)}${KEY_SEPARATOR}`).join('');
}

export class MemoryKV {
	private readonly tables = new Map<string, KvTable>();

	createTable(name: string): boolean {
		if (this.tables.has(name)) return false;
		this.tables.set(name, {rows: new Map(), indexes: new Map()});
		return true;
	}

	hasTable(name: string): boolean {
		return this.tables.has(name);
	}

	createIndex(tableName: string, indexName: string, column: string): boolean {
		const table = this.getTable(tableName);
		for (const existing of this.tables.values()) {
			if (existing.indexes.has(indexName)) return false;
		}
		const index: KvIndex = {column, entries: new Map()};
		for (const [key, row] of table.rows) {
			addToIndex(index, key, row);
		}
		table.indexes.set(indexName, index);
		return true;
	}

	hasIndexOn(tableName: string, column: string): boolean {
		const table = this.getTable(tableName);
		for (const index of table.indexes.values()) {
			if (index.column === column) return true;
		}
		return false;
	}

	get(tableName: string, key: string): KvRow | undefined {
		return this.getTable(tableName).rows.get(key);
	}

	put(tableName: string, key: string, value: KvRow): void {
		const table = this.getTable(tableName);
		const existing = table.rows.get(key);
		for (const index of table.indexes.values()) {
			if (existing) removeFromIndex(index, key, existing);
			addToIndex(index, key, value);
		}
		table.rows.set(key, value);
	}

	delete(tableName: string, key: string): void {
		const table = this.getTable(tableName);
		const existing = table.rows.get(key);
		if (!existing) return;
		for (const index of table.indexes.values()) {
			removeFromIndex(index, key, existing);
		}
		table.rows.delete(key);
	}

	scan(tableName: string, prefix?: string): Array<KvEntry> {
		const entries: Array<KvEntry> = [];
		for (const [key, value] of this.getTable(tableName).rows) {
			if (prefix === undefined || key.startsWith(prefix)) {
				entries.push({key, value});
			}
		}
		return entries.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
	}

	lookupIndex(tableName: string, column: string, value: unknown): Array<KvEntry> {
		const table = this.getTable(tableName);
		for (const index of table.indexes.values()) {
			if (index.column !== column) continue;
			const entries: Array<KvEntry> = [];
			for (const key of index.entries.get(encodeKeyPart(value)) ?? []) {
				const row = table.rows.get(key);
				if (row) entries.push({key, value: row});
			}
			return entries.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
		}
		throw new Error(`No secondary index on ${tableName}.${column}`);
	}

	clear(): void {
		this.tables.clear();
	}

	private getTable(name: string): KvTable {
		const table = this.tables.get(name);
		if (!table) {
			throw new Error(`unconfigured table ${name}`);
		}
		return table;
	}
}

function addToIndex(index: KvIndex, key: string, row: KvRow): void {
	const value = row[index.column];
	if (value === null || value === undefined) return;
	const indexKey = encodeKeyPart(value);
	const keys = index.entries.get(indexKey) ?? new Set<string>();
	keys.add(key);
	index.entries.set(indexKey, keys);
}

function removeFromIndex(index: KvIndex, key: string, row: KvRow): void {
	const value = row[index.column];
	if (value === null || value === undefined) return;
	const indexKey = encodeKeyPart(value);
	const keys = index.entries.get(indexKey);
	if (!keys) return;
	keys.delete(key);
	if (keys.size === 0) index.entries.delete(indexKey);
}

let store: MemoryKV | null = null;

export function getKvStore(): MemoryKV {
	if (!store) {
		store = new MemoryKV();
	}
	return store;
}

export function clearKvStore(): void {
	store?.clear();
}
