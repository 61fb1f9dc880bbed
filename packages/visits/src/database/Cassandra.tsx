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
import {encodeKey, encodeKeyPart, getKvStore, type KvRow} from '@petclinic/visits/src/database/MemoryKV';
import {Logger} from '@petclinic/visits/src/Logger';
import {raceAbort} from '@petclinic/visits/src/utils/AbortUtils';
import cassandra from 'cassandra-driver';

function getIsDev(): boolean {
	return Config.nodeEnv === 'development';
}

function getUseMemory(): boolean {
	return Config.database.backend === 'memory';
}

const colors = {
	reset: '\x1b[0m',
	dim: '\x1b[2m',
	bold: '\x1b[1m',
	cyan: '\x1b[36m',
	yellow: '\x1b[33m',
	green: '\x1b[32m',
	magenta: '\x1b[35m',
	blue: '\x1b[34m',
	white: '\x1b[37m',
} as const;

function formatValue(value: unknown): string {
	if (value === null) return `${colors.dim}null${colors.reset}`;
	if (value === undefined) return `${colors.dim}undefined${colors.reset}`;
	if (typeof value === 'string') {
		const truncated = value.length > 50 ? `${value.slice(0, 50)}...` : value;
		return `${colors.green}"${truncated}"${colors.reset}`;
	}
	if (typeof value === 'number' || typeof value === 'bigint') {
		return `${colors.yellow}${value}${colors.reset}`;
	}
	if (typeof value === 'boolean') {
		return `${colors.magenta}${value}${colors.reset}`;
	}
	if (value instanceof cassandra.types.Uuid) {
		return `${colors.cyan}uuid(${value.toString()})${colors.reset}`;
	}
	if (value instanceof cassandra.types.LocalDate) {
		return `${colors.cyan}date(${value.toString()})${colors.reset}`;
	}
	if (value instanceof Date) {
		return `${colors.cyan}Date(${value.toISOString()})${colors.reset}`;
	}
	if (value instanceof Buffer) {
		return `${colors.dim}Buffer(${value.length} bytes)${colors.reset}`;
	}
	return String(value);
}

function formatParams(params: Record<string, unknown>): string {
	const entries = Object.entries(params);
	if (entries.length === 0) return `${colors.dim}(no params)${colors.reset}`;
	return entries.map(([k, v]) => `  ${colors.blue}:${k}${colors.reset} = ${formatValue(v)}`).join('\n');
}

function getQueryType(cql: string): string {
	const trimmed = cql.trim().toUpperCase();
	if (trimmed.startsWith('SELECT')) return 'SELECT';
	if (trimmed.startsWith('INSERT')) return 'INSERT';
	if (trimmed.startsWith('UPDATE')) return 'UPDATE';
	if (trimmed.startsWith('DELETE')) return 'DELETE';
	if (trimmed.startsWith('CREATE')) return 'SCHEMA';
	return 'QUERY';
}

function formatCql(cql: string): string {
	return cql
		.replace(/\s+/g, ' ')
		.replace(/\s*;\s*$/, '')
		.trim();
}

function logQuery(
	queryType: string,
	cql: string,
	params: Record<string, unknown>,
	durationMs: number,
	rowCount?: number,
): void {
	if (!getIsDev()) return;

	const typeColors: Record<string, string> = {
		SELECT: colors.cyan,
		INSERT: colors.green,
		UPDATE: colors.yellow,
		DELETE: colors.magenta,
		SCHEMA: colors.blue,
		QUERY: colors.white,
	};

	const typeColor = typeColors[queryType] || colors.white;
	const durationColor = durationMs > 100 ? colors.yellow : durationMs > 50 ? colors.dim : colors.green;

	const lines = [
		`${colors.dim}┌──${colors.reset} ${typeColor}${colors.bold}${queryType}${colors.reset} ${colors.dim}──────────────────────────────────────${colors.reset}`,
		`${colors.dim}│${colors.reset} ${formatCql(cql)}`,
		`${colors.dim}│${colors.reset}`,
		...formatParams(params)
			.split('\n')
			.map((line) => `${colors.dim}│${colors.reset}${line}`),
		`${colors.dim}│${colors.reset}`,
		`${colors.dim}└──${colors.reset} ${durationColor}${durationMs.toFixed(2)}ms${colors.reset}${rowCount !== undefined ? ` ${colors.dim}(${rowCount} rows)${colors.reset}` : ''}`,
	];

	Logger.debug(lines.join('\n'));
}

export type ColumnName<Row> = Extract<keyof Row, string>;

export type CassandraParam =
	| string
	| number
	| bigint
	| boolean
	| Buffer
	| Date
	| cassandra.types.Uuid
	| cassandra.types.LocalDate
	| null;

export type CassandraParams = Record<string, CassandraParam>;

export type CassandraRow = KvRow;

export type CqlType = 'uuid' | 'timeuuid' | 'text' | 'date' | 'timestamp' | 'int' | 'bigint' | 'boolean' | 'blob';

export type KvAction = 'select' | 'upsert' | 'delete' | 'createTable' | 'createIndex';

export interface IndexSpec<Row extends object = Record<string, unknown>> {
	name: string;
	column: ColumnName<Row>;
}

export interface KvTableSpec<Row extends object = Record<string, unknown>> {
	name: string;
	columns: ReadonlyArray<ColumnName<Row>>;
	primaryKey: ReadonlyArray<ColumnName<Row>>;
	partitionKey: ReadonlyArray<ColumnName<Row>>;
}

export interface KvQueryMeta {
	action: KvAction;
	table: KvTableSpec;
	where?: ReadonlyArray<WhereExpr<CassandraRow>>;
	limit?: number;
	columns?: ReadonlyArray<string>;
	allowFiltering?: boolean;
	index?: IndexSpec;
}

export interface PreparedQuery<P extends CassandraParams = CassandraParams> {
	cql: string;
	params: P;
	kvMeta?: KvQueryMeta;
}

export interface CassandraPage {
	rows: Array<CassandraRow>;
	pageState?: string | null;
}

/** The part of `cassandra.Client` this module drives. */
export interface CassandraExecutor {
	execute(query: string, params?: CassandraParams, options?: cassandra.QueryOptions): Promise<CassandraPage>;
	shutdown(): Promise<void>;
}

export interface StreamOptions {
	signal?: AbortSignal;
	fetchSize?: number;
}

export function prepared<P extends CassandraParams>(cql: string, params: P, kvMeta?: KvQueryMeta): PreparedQuery<P> {
	return {cql, params, kvMeta};
}

export function isCassandraParam(value: unknown): value is CassandraParam {
	if (value === null) return true;
	const t = typeof value;
	if (t === 'string' || t === 'number' || t === 'bigint' || t === 'boolean') return true;
	return (
		value instanceof Date ||
		Buffer.isBuffer(value) ||
		value instanceof cassandra.types.Uuid ||
		value instanceof cassandra.types.LocalDate
	);
}

let client: CassandraExecutor | null = null;

export function setInjectedCassandraClient(injected: CassandraExecutor | null): void {
	client = injected;
}

function getClient(): CassandraExecutor {
	if (client) return client;

	if (getUseMemory()) {
		throw new Error('Cassandra client not available in memory mode');
	}

	const clientOptions: cassandra.ClientOptions = {
		contactPoints: Config.cassandra.hosts,
		keyspace: Config.cassandra.keyspace,
		localDataCenter: Config.cassandra.localDc,
		socketOptions: {
			readTimeout: Config.cassandra.readTimeoutMs,
		},
		encoding: {
			map: Map,
			set: Set,
			useUndefinedAsUnset: false,
			useBigIntAsLong: true,
			useBigIntAsVarint: true,
		},
	};

	if (Config.cassandra.username && Config.cassandra.password) {
		clientOptions.credentials = {
			username: Config.cassandra.username,
			password: Config.cassandra.password,
		};
	}

	client = new cassandra.Client(clientOptions);
	return client;
}

export async function shutdownCassandra(): Promise<void> {
	if (!client) return;
	const current = client;
	client = null;
	await current.shutdown();
}

function isUnsafePreparedStatement(query: string): boolean {
	const tokens = query.trim().split(/\s+/);
	return tokens.length >= 2 && tokens[0].toLowerCase() === 'select' && tokens[1] === '*';
}

function assertNoUndefinedParams(params: Record<string, unknown>): void {
	for (const [k, v] of Object.entries(params)) {
		if (v === undefined) {
			throw new Error(
				`Undefined value at ":${k}". This project forbids undefined in Cassandra params; use null explicitly.`,
			);
		}
	}
}

function normalizeExecuteArgs<P extends CassandraParams>(
	queryOrPrepared: string | PreparedQuery<P>,
	params?: P,
): PreparedQuery<P> {
	if (typeof queryOrPrepared === 'string') {
		if (!params) {
			throw new Error('Missing params object for Cassandra query execution');
		}
		return {cql: queryOrPrepared, params};
	}
	return queryOrPrepared;
}

const kvMetaRegistry = new Map<string, KvQueryMeta>();

function normalizeCqlForRegistry(cql: string): string {
	return cql.replace(/\s+/g, ' ').trim();
}

function registerKvMeta(cql: string, meta: KvQueryMeta): void {
	kvMetaRegistry.set(normalizeCqlForRegistry(cql), meta);
}

function metaOrThrow<P extends CassandraParams>(prepared: PreparedQuery<P>): KvQueryMeta {
	if (prepared.kvMeta) return prepared.kvMeta;
	const registry = kvMetaRegistry.get(normalizeCqlForRegistry(prepared.cql));
	if (registry) return registry;
	throw new Error('Memory backend requires kvMeta on PreparedQuery objects');
}

function paramsToRow(table: KvTableSpec, params: CassandraParams): KvRow {
	const row: KvRow = {};
	for (const col of table.columns) {
		if (params[col] !== undefined) {
			row[col] = params[col];
		}
	}
	return row;
}

function pkFromParams(table: KvTableSpec, params: CassandraParams): KvRow {
	const pk: KvRow = {};
	for (const col of table.primaryKey) {
		pk[col] = params[col];
	}
	return pk;
}

function partitionPrefixFromWhere(
	table: KvTableSpec,
	where: ReadonlyArray<WhereExpr<CassandraRow>>,
	params: CassandraParams,
): string | null {
	if (table.partitionKey.length === 0) return null;
	const values: Array<unknown> = [];
	for (const partCol of table.partitionKey) {
		const clause = where.find((w) => w.kind === 'eq' && w.col === partCol);
		if (!clause) return null;
		values.push(params[clause.param]);
	}
	return encodeKey(values);
}

function matchesWhere(row: KvRow, expr: WhereExpr<CassandraRow>, params: CassandraParams): boolean {
	const value = encodeKeyPart(row[expr.col]);
	const expected = encodeKeyPart(params[expr.param]);
	switch (expr.kind) {
		case 'eq':
			return value === expected;
		case 'gt':
			return value > expected;
		default: {
			const _exhaustive: never = expr;
			return _exhaustive;
		}
	}
}

const FILTERING_REQUIRED_MESSAGE =
	'Cannot execute this query as it might involve data filtering and thus may have unpredictable performance. ' +
	'If you want to execute this query despite the performance unpredictability, use ALLOW FILTERING';

function candidateRowsMemory(meta: KvQueryMeta, params: CassandraParams): Array<KvRow> {
	const kv = getKvStore();
	const whereClauses = meta.where ?? [];
	const prefix = partitionPrefixFromWhere(meta.table, whereClauses, params);
	if (prefix !== null || whereClauses.length === 0) {
		return kv.scan(meta.table.name, prefix ?? undefined).map((e) => e.value);
	}
	const indexed = whereClauses.find((w) => w.kind === 'eq' && kv.hasIndexOn(meta.table.name, w.col));
	if (indexed) {
		return kv.lookupIndex(meta.table.name, indexed.col, params[indexed.param]).map((e) => e.value);
	}
	if (meta.allowFiltering) {
		return kv.scan(meta.table.name).map((e) => e.value);
	}
	throw new Error(FILTERING_REQUIRED_MESSAGE);
}

async function executeQueryMemory<P extends CassandraParams = CassandraParams>(
	queryOrPrepared: string | PreparedQuery<P>,
	params?: P,
): Promise<Array<CassandraRow>> {
	const prepared = normalizeExecuteArgs(queryOrPrepared, params);
	const startTime = performance.now();
	const rows = runMemoryStatement(prepared);
	logQuery(getQueryType(prepared.cql), prepared.cql, prepared.params, performance.now() - startTime, rows.length);
	return rows;
}

function runMemoryStatement(prepared: PreparedQuery): Array<CassandraRow> {
	const meta = metaOrThrow(prepared);
	const bound = prepared.params;
	const kv = getKvStore();

	switch (meta.action) {
		case 'select': {
			const whereClauses = meta.where ?? [];
			const filtered = candidateRowsMemory(meta, bound).filter((r) =>
				whereClauses.every((w) => matchesWhere(r, w, bound)),
			);
			const limited = typeof meta.limit === 'number' ? filtered.slice(0, meta.limit) : filtered;
			const projection = meta.columns ?? meta.table.columns;
			return limited.map((r) => {
				const projected: KvRow = {};
				for (const col of projection) {
					projected[col] = r[col] ?? null;
				}
				return projected;
			});
		}

		case 'upsert': {
			const row = paramsToRow(meta.table, bound);
			const pk = pkFromParams(meta.table, bound);
			const key = encodeKey(meta.table.primaryKey.map((c) => pk[c]));
			const existing = kv.get(meta.table.name, key) ?? {};
			kv.put(meta.table.name, key, {...existing, ...row, ...pk});
			return [];
		}

		case 'delete': {
			const pk = pkFromParams(meta.table, bound);
			kv.delete(meta.table.name, encodeKey(meta.table.primaryKey.map((c) => pk[c])));
			return [];
		}

		case 'createTable': {
			kv.createTable(meta.table.name);
			return [];
		}

		case 'createIndex': {
			if (!meta.index) {
				throw new Error(`CREATE INDEX on "${meta.table.name}" is missing its index definition`);
			}
			kv.createIndex(meta.table.name, meta.index.name, meta.index.column);
			return [];
		}

		default: {
			const _exhaustive: never = meta.action;
			throw new Error(`Unsupported memory action ${String(_exhaustive)}`);
		}
	}
}

function summarizeParams(params: Record<string, unknown>): Record<string, unknown> {
	const paramSummary: Record<string, unknown> = {};
	for (const [k, v] of Object.entries(params)) {
		if (typeof v === 'string') paramSummary[k] = {type: 'string', len: v.length};
		else if (typeof v === 'bigint') paramSummary[k] = {type: 'bigint'};
		else if (typeof v === 'number') paramSummary[k] = {type: 'number'};
		else if (typeof v === 'boolean') paramSummary[k] = {type: 'boolean'};
		else if (v instanceof Buffer) paramSummary[k] = {type: 'buffer', len: v.length};
		else if (v instanceof cassandra.types.Uuid) paramSummary[k] = {type: 'uuid'};
		else if (v instanceof cassandra.types.LocalDate) paramSummary[k] = {type: 'date'};
		else if (v instanceof Date) paramSummary[k] = {type: 'timestamp'};
		else if (v === null) paramSummary[k] = {type: 'null'};
		else paramSummary[k] = {type: typeof v};
	}
	return paramSummary;
}

function logQueryFailure(err: unknown, cql: string, params: Record<string, unknown>): void {
	const errorMessage = err instanceof Error ? err.message : String(err);
	Logger.warn({error: errorMessage, query: cql, params: summarizeParams(params)}, 'Cassandra query failed');
}

export async function executeQuery<P extends CassandraParams = CassandraParams>(
	queryOrPrepared: string | PreparedQuery<P>,
	params?: P,
): Promise<Array<CassandraRow>> {
	if (getUseMemory()) {
		return executeQueryMemory(queryOrPrepared, params);
	}

	const {cql, params: bound} = normalizeExecuteArgs(queryOrPrepared, params);

	if (isUnsafePreparedStatement(cql)) {
		throw new Error('Cannot prepare a statement that looks like `SELECT *`');
	}

	assertNoUndefinedParams(bound);

	const startTime = performance.now();
	const queryType = getQueryType(cql);

	try {
		const result = await getClient().execute(cql, bound, {prepare: true});
		const rows = result.rows;
		logQuery(queryType, cql, bound, performance.now() - startTime, rows.length);
		return rows;
	} catch (err: unknown) {
		logQueryFailure(err, cql, bound);
		throw err;
	}
}

/**
 * Lazily yields the rows of a read. The statement runs on first iteration and
 * each further page is requested with the previous page's `pageState` once the
 * consumer has taken every row before it.
 */
export async function* streamRows<P extends CassandraParams = CassandraParams>(
	queryOrPrepared: string | PreparedQuery<P>,
	params?: P,
	options: StreamOptions = {},
): AsyncGenerator<CassandraRow, void, undefined> {
	const {signal} = options;
	signal?.throwIfAborted();

	if (getUseMemory()) {
		const rows = await executeQueryMemory(queryOrPrepared, params);
		for (const row of rows) {
			signal?.throwIfAborted();
			yield row;
		}
		return;
	}

	const {cql, params: bound} = normalizeExecuteArgs(queryOrPrepared, params);

	if (isUnsafePreparedStatement(cql)) {
		throw new Error('Cannot prepare a statement that looks like `SELECT *`');
	}

	assertNoUndefinedParams(bound);

	const startTime = performance.now();
	let rowCount = 0;

	try {
		const fetchSize = options.fetchSize ?? Config.cassandra.fetchSize;
		let pageState: string | undefined;
		do {
			const pending = getClient().execute(cql, bound, {prepare: true, fetchSize, pageState});
			const page = await (signal ? raceAbort(pending, signal) : pending);
			for (const row of page.rows) {
				signal?.throwIfAborted();
				rowCount++;
				yield row;
			}
			pageState = page.pageState || undefined;
		} while (pageState);
		logQuery(getQueryType(cql), cql, bound, performance.now() - startTime, rowCount);
	} catch (err: unknown) {
		if (!signal?.aborted) {
			logQueryFailure(err, cql, bound);
		}
		throw err;
	}
}

export async function fetchOne<P extends CassandraParams = CassandraParams>(
	queryOrPrepared: PreparedQuery<P> | string,
	params?: P,
): Promise<CassandraRow | null> {
	const [row] = await executeQuery(queryOrPrepared, params);
	return row ?? null;
}

export async function fetchMany<P extends CassandraParams = CassandraParams>(
	queryOrPrepared: PreparedQuery<P> | string,
	params?: P,
): Promise<Array<CassandraRow>> {
	return executeQuery(queryOrPrepared, params);
}

export async function upsertOne<P extends CassandraParams = CassandraParams>(
	queryOrPrepared: PreparedQuery<P> | string,
	params?: P,
): Promise<void> {
	await executeQuery(queryOrPrepared, params);
}

export async function deleteOneOrMany<P extends CassandraParams = CassandraParams>(
	queryOrPrepared: PreparedQuery<P> | string,
	params?: P,
): Promise<void> {
	await executeQuery(queryOrPrepared, params);
}

export async function executeSchemaStatement(statement: PreparedQuery): Promise<void> {
	if (getUseMemory()) {
		await executeQueryMemory(statement);
		return;
	}

	const startTime = performance.now();
	try {
		await getClient().execute(statement.cql);
		logQuery('SCHEMA', statement.cql, {}, performance.now() - startTime);
	} catch (err: unknown) {
		logQueryFailure(err, statement.cql, {});
		throw err;
	}
}

export type WhereExpr<Row extends object> =
	| {kind: 'eq'; col: ColumnName<Row>; param: string}
	| {kind: 'gt'; col: ColumnName<Row>; param: string};

interface SelectOptions<Row extends object> {
	columns?: ReadonlyArray<ColumnName<Row>>;
	where?: WhereExpr<Row> | ReadonlyArray<WhereExpr<Row>>;
	limit?: number;
	allowFiltering?: boolean;
}

export interface Table<Row extends object, PK extends ColumnName<Row>, PartKey extends PK = PK> {
	name: string;
	columns: ReadonlyArray<ColumnName<Row>>;
	primaryKey: ReadonlyArray<PK>;
	partitionKey: ReadonlyArray<PartKey>;
	clusteringKey: ReadonlyArray<PK>;
	indexes: ReadonlyArray<IndexSpec<Row>>;

	selectCql(opts?: SelectOptions<Row>): string;

	paramsFromRow(row: Row): CassandraParams;

	upsertAll(row: Row): PreparedQuery;

	deleteByPk(pk: Pick<Row, PK>): PreparedQuery;

	createTable(): PreparedQuery;

	createIndex(name: string): PreparedQuery;

	where: {
		eq: <K extends ColumnName<Row>>(col: K, param?: string) => WhereExpr<Row>;
		gt: <K extends ColumnName<Row>>(col: K, param?: string) => WhereExpr<Row>;
	};
}

function compileWhere<Row extends object>(w: WhereExpr<Row>): string {
	switch (w.kind) {
		case 'eq':
			return `${w.col} = :${w.param}`;
		case 'gt':
			return `${w.col} > :${w.param}`;
		default: {
			const _exhaustive: never = w;
			return _exhaustive;
		}
	}
}

function includesColumn(list: ReadonlyArray<string>, col: string): boolean {
	return list.includes(col);
}

export function defineTable<Row extends object, PK extends ColumnName<Row>, PartKey extends PK = PK>(def: {
	name: string;
	columns: ReadonlyArray<ColumnName<Row>>;
	columnTypes: Record<ColumnName<Row>, CqlType>;
	primaryKey: ReadonlyArray<PK>;
	partitionKey: ReadonlyArray<PartKey>;
	clusteringOrder?: 'ASC' | 'DESC';
	indexes?: ReadonlyArray<IndexSpec<Row>>;
}): Table<Row, PK, PartKey> {
	const columns = [...def.columns];
	const pk = [...def.primaryKey];
	const partitionKey = [...def.partitionKey];
	const clusteringKey = pk.filter((c) => !includesColumn(partitionKey, c));
	const indexes = [...(def.indexes ?? [])];
	const tableSpec: KvTableSpec = {
		name: def.name,
		columns,
		primaryKey: pk,
		partitionKey,
	};

	if (partitionKey.length === 0 || !partitionKey.every((c) => includesColumn(pk, c))) {
		throw new Error(`Table "${def.name}" must declare a non-empty partitionKey drawn from its primaryKey`);
	}

	const nonPkColumns = columns.filter((c) => !includesColumn(pk, c));

	const normalizeWhereArray = (
		where?: WhereExpr<Row> | ReadonlyArray<WhereExpr<Row>>,
	): ReadonlyArray<WhereExpr<Row>> => {
		if (!where) return [];
		if (isWhereList(where)) return where;
		return [where];
	};

	const updateAll =
		nonPkColumns.length > 0
			? `UPDATE ${def.name}
SET ${nonPkColumns.map((c) => `${c} = :${c}`).join(', ')}
WHERE ${pk.map((k) => `${k} = :${k}`).join(' AND ')};
`
			: `INSERT INTO ${def.name} (${columns.join(', ')}) VALUES (${columns.map((c) => `:${c}`).join(', ')});`;
	registerKvMeta(updateAll, {action: 'upsert', table: tableSpec});

	function toParam(col: string, value: unknown): CassandraParam {
		if (!isCassandraParam(value)) {
			throw new Error(`Value for "${def.name}.${col}" is not a supported Cassandra parameter`);
		}
		return value;
	}

	function paramsFromRow(row: Row): CassandraParams {
		const params: CassandraParams = {};
		for (const c of columns) {
			const v = row[c];
			if (v === undefined) {
				throw new Error(
					`Row is missing value for "${def.name}.${c}". Full-row upserts require every column to be present.`,
				);
			}
			params[c] = toParam(c, v);
		}
		return params;
	}

	function selectCql(opts: SelectOptions<Row> = {}): string {
		const selectCols = (opts.columns ?? columns).join(', ');

		const clauses = normalizeWhereArray(opts.where);
		const where = clauses.length > 0 ? ` WHERE ${clauses.map((c) => compileWhere<Row>(c)).join(' AND ')}` : '';
		const limit = typeof opts.limit === 'number' ? ` LIMIT ${opts.limit}` : '';
		const filtering = opts.allowFiltering ? ' ALLOW FILTERING' : '';

		const cql = `SELECT ${selectCols} FROM ${def.name}${where}${limit}${filtering};`;
		registerKvMeta(cql, {
			action: 'select',
			table: tableSpec,
			where: clauses,
			limit: opts.limit,
			columns: opts.columns ?? columns,
			allowFiltering: opts.allowFiltering ?? false,
		});
		return cql;
	}

	const deleteByPkCql = `DELETE FROM ${def.name} WHERE ${pk.map((k) => `${k} = :${k}`).join(' AND ')};`;

	function deleteByPk(pkValues: Pick<Row, PK>): PreparedQuery {
		const params: CassandraParams = {};
		for (const k of pk) params[k] = toParam(k, pkValues[k]);
		return prepared(deleteByPkCql, params, {
			action: 'delete',
			table: tableSpec,
			where: pk.map((col): WhereExpr<Row> => ({kind: 'eq', col, param: col})),
		});
	}

	const clusteringOrder =
		clusteringKey.length > 0
			? ` WITH CLUSTERING ORDER BY (${clusteringKey.map((c) => `${c} ${def.clusteringOrder ?? 'ASC'}`).join(', ')})`
			: '';
	const primaryKeyCql = [`(${partitionKey.join(', ')})`, ...clusteringKey].join(', ');
	const createTableCql = `CREATE TABLE IF NOT EXISTS ${def.name} (${columns
		.map((c) => `${c} ${def.columnTypes[c]}`)
		.join(', ')}, PRIMARY KEY (${primaryKeyCql}))${clusteringOrder};`;

	function createTable(): PreparedQuery {
		return prepared(createTableCql, {}, {action: 'createTable', table: tableSpec});
	}

	function createIndex(name: string): PreparedQuery {
		const index: {name: string; column: string} | undefined = indexes.find((i) => i.name === name);
		if (!index) {
			throw new Error(`Table "${def.name}" declares no index named "${name}"`);
		}
		const cql = `CREATE INDEX IF NOT EXISTS ${index.name} ON ${def.name} (${index.column});`;
		return prepared(cql, {}, {action: 'createIndex', table: tableSpec, index});
	}

	return {
		name: def.name,
		columns: def.columns,
		primaryKey: def.primaryKey,
		partitionKey,
		clusteringKey,
		indexes,

		selectCql,

		paramsFromRow,

		upsertAll(row: Row) {
			return prepared(updateAll, paramsFromRow(row), {action: 'upsert', table: tableSpec});
		},

		deleteByPk,

		createTable,
		createIndex,

		where: {
			eq: (col, param) => ({kind: 'eq', col, param: param ?? col}),
			gt: (col, param) => ({kind: 'gt', col, param: param ?? col}),
		},
	};
}

function isWhereList<Row extends object>(
	where: WhereExpr<Row> | ReadonlyArray<WhereExpr<Row>>,
): where is ReadonlyArray<WhereExpr<Row>> {
	return Array.isArray(where);
}
