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
import {
	defineTable,
	executeQuery,
	executeSchemaStatement,
	fetchMany,
	fetchOne,
	isCassandraParam,
	streamRows,
	upsertOne,
} from '@petclinic/visits/src/database/Cassandra';
import {getKvStore} from '@petclinic/visits/src/database/MemoryKV';
import type {VisitRow} from '@petclinic/visits/src/database/types/VisitTypes';
import {initializeLogger} from '@petclinic/visits/src/Logger';
import {VisitsByPet} from '@petclinic/visits/src/Tables';
import {NoopLogger} from '@petclinic/visits/src/test/mocks/NoopLogger';
import {createCheckup, createVaccination, PET_1, PET_2, VISIT_1} from '@petclinic/visits/src/test/VisitFixtures';
import {types} from 'cassandra-driver';
import {describe, expect, it, vi} from 'vitest';

const ALL_COLUMNS = 'pet_id, visit_id, description, visit_date';

describe('defineTable', () => {
	it('builds the table and index definitions', () => {
		expect(VisitsByPet.createTable().cql).toBe(
			'CREATE TABLE IF NOT EXISTS petclinic_visit_by_pet (pet_id uuid, visit_id uuid, description text, visit_date date, PRIMARY KEY ((pet_id), visit_id)) WITH CLUSTERING ORDER BY (visit_id ASC);',
		);
		expect(VisitsByPet.createIndex('petclinic_idx_visitid').cql).toBe(
			'CREATE INDEX IF NOT EXISTS petclinic_idx_visitid ON petclinic_visit_by_pet (visit_id);',
		);
	});

	it('rejects an index the table does not declare', () => {
		expect(() => VisitsByPet.createIndex('missing_idx')).toThrow(
			'Table "petclinic_visit_by_pet" declares no index named "missing_idx"',
		);
	});

	it('splits the primary key into partition and clustering columns', () => {
		expect(VisitsByPet.partitionKey).toEqual(['pet_id']);
		expect(VisitsByPet.clusteringKey).toEqual(['visit_id']);
	});

	it('builds select statements', () => {
		expect(VisitsByPet.selectCql()).toBe(`SELECT ${ALL_COLUMNS} FROM petclinic_visit_by_pet;`);
		expect(VisitsByPet.selectCql({where: VisitsByPet.where.eq('pet_id')})).toBe(
			`SELECT ${ALL_COLUMNS} FROM petclinic_visit_by_pet WHERE pet_id = :pet_id;`,
		);
		expect(VisitsByPet.selectCql({where: VisitsByPet.where.eq('visit_id'), allowFiltering: true})).toBe(
			`SELECT ${ALL_COLUMNS} FROM petclinic_visit_by_pet WHERE visit_id = :visit_id ALLOW FILTERING;`,
		);
		expect(
			VisitsByPet.selectCql({
				columns: ['visit_id'],
				where: [VisitsByPet.where.eq('pet_id'), VisitsByPet.where.gt('visit_id', 'after_visit_id')],
				limit: 2,
			}),
		).toBe('SELECT visit_id FROM petclinic_visit_by_pet WHERE pet_id = :pet_id AND visit_id > :after_visit_id LIMIT 2;');
	});

	it('builds full-row upserts and key deletes', () => {
		const upsert = VisitsByPet.upsertAll(createCheckup().toRow());
		expect(upsert.cql).toBe(
			'UPDATE petclinic_visit_by_pet\nSET description = :description, visit_date = :visit_date\nWHERE pet_id = :pet_id AND visit_id = :visit_id;\n',
		);
		expect(upsert.params.description).toBe('checkup');

		const row = createCheckup().toRow();
		const remove = VisitsByPet.deleteByPk({pet_id: row.pet_id, visit_id: row.visit_id});
		expect(remove.cql).toBe('DELETE FROM petclinic_visit_by_pet WHERE pet_id = :pet_id AND visit_id = :visit_id;');
		expect(Object.keys(remove.params)).toEqual(['pet_id', 'visit_id']);
	});

	it('requires the partition key to come from the primary key', () => {
		expect(() =>
			defineTable<VisitRow, 'visit_id'>({
				name: 'broken_table',
				columns: ['pet_id', 'visit_id', 'description', 'visit_date'],
				columnTypes: {pet_id: 'uuid', visit_id: 'uuid', description: 'text', visit_date: 'date'},
				primaryKey: ['visit_id'],
				partitionKey: [],
			}),
		).toThrow('Table "broken_table" must declare a non-empty partitionKey drawn from its primaryKey');
	});
});

describe('isCassandraParam', () => {
	it('accepts driver values and null', () => {
		expect(isCassandraParam(null)).toBe(true);
		expect(isCassandraParam('text')).toBe(true);
		expect(isCassandraParam(types.Uuid.fromString(PET_1))).toBe(true);
		expect(isCassandraParam(types.LocalDate.fromString('2023-01-01'))).toBe(true);
	});

	it('rejects undefined and plain objects', () => {
		expect(isCassandraParam(undefined)).toBe(false);
		expect(isCassandraParam({pet_id: PET_1})).toBe(false);
	});
});

describe('memory backend', () => {
	const FOR_PET_CQL = VisitsByPet.selectCql({where: VisitsByPet.where.eq('pet_id')});
	const BY_ID_UNFILTERED_CQL = VisitsByPet.selectCql({where: VisitsByPet.where.eq('visit_id')});

	it('rejects statements against a table that was never created', async () => {
		await expect(upsertOne(VisitsByPet.upsertAll(createCheckup().toRow()))).rejects.toThrow(
			'unconfigured table petclinic_visit_by_pet',
		);
	});

	it('requires params for raw statements', async () => {
		await expect(executeQuery(FOR_PET_CQL)).rejects.toThrow('Missing params object for Cassandra query execution');
	});

	it('fetches a single row or null', async () => {
		await executeSchemaStatement(VisitsByPet.createTable());
		await upsertOne(VisitsByPet.upsertAll(createCheckup().toRow()));

		const row = await fetchOne(FOR_PET_CQL, {pet_id: types.Uuid.fromString(PET_1)});
		const missing = await fetchOne(FOR_PET_CQL, {pet_id: types.Uuid.fromString(PET_2)});

		expect(row?.description).toBe('checkup');
		expect(missing).toBeNull();
	});

	it('refuses to filter on an unindexed column without ALLOW FILTERING', async () => {
		await executeSchemaStatement(VisitsByPet.createTable());
		await upsertOne(VisitsByPet.upsertAll(createCheckup().toRow()));

		await expect(executeQuery(BY_ID_UNFILTERED_CQL, {visit_id: types.Uuid.fromString(VISIT_1)})).rejects.toThrow(
			/use ALLOW FILTERING$/,
		);
	});

	it('answers the same query through the index once it exists', async () => {
		await executeSchemaStatement(VisitsByPet.createTable());
		await executeSchemaStatement(VisitsByPet.createIndex('petclinic_idx_visitid'));
		await upsertOne(VisitsByPet.upsertAll(createCheckup().toRow()));

		const rows = await executeQuery(BY_ID_UNFILTERED_CQL, {visit_id: types.Uuid.fromString(VISIT_1)});
		expect(rows).toHaveLength(1);
		expect(rows[0].description).toBe('checkup');
		expect(getKvStore().hasIndexOn('petclinic_visit_by_pet', 'visit_id')).toBe(true);
	});

	it('stops streaming when the signal is already aborted', async () => {
		await executeSchemaStatement(VisitsByPet.createTable());
		const controller = new AbortController();
		controller.abort(new Error('stopped'));

		const rows: Array<unknown> = [];
		const iterate = async () => {
			for await (const row of streamRows(FOR_PET_CQL, {pet_id: types.Uuid.fromString(PET_1)}, {signal: controller.signal})) {
				rows.push(row);
			}
		};

		await expect(iterate()).rejects.toThrow('stopped');
		expect(rows).toEqual([]);
	});

	it('stops streaming when the signal aborts between rows', async () => {
		await executeSchemaStatement(VisitsByPet.createTable());
		await upsertOne(VisitsByPet.upsertAll(createCheckup().toRow()));
		await upsertOne(VisitsByPet.upsertAll(createVaccination().toRow()));
		const controller = new AbortController();

		const seen: Array<unknown> = [];
		const iterate = async () => {
			for await (const row of streamRows(FOR_PET_CQL, {pet_id: types.Uuid.fromString(PET_1)}, {signal: controller.signal})) {
				seen.push(row.description);
				controller.abort(new Error('enough'));
			}
		};

		await expect(iterate()).rejects.toThrow('enough');
		expect(seen).toEqual(['checkup']);
	});

	it('logs each statement at debug in development', async () => {
		const logger = new NoopLogger();
		const debug = vi.spyOn(logger, 'debug');
		const originalNodeEnv = Config.nodeEnv;
		initializeLogger(logger);
		Config.nodeEnv = 'development';
		try {
			await executeSchemaStatement(VisitsByPet.createTable());
			await fetchMany(FOR_PET_CQL, {pet_id: types.Uuid.fromString(PET_1)});
		} finally {
			Config.nodeEnv = originalNodeEnv;
			initializeLogger(new NoopLogger());
		}

		expect(debug).toHaveBeenCalledTimes(2);
		const [schemaLines, selectLines] = debug.mock.calls.map(([message]) => String(message).split('\n'));
		expect(schemaLines[0]).toContain('SCHEMA');
		expect(selectLines[1]).toBe(
			'\x1b[2m│\x1b[0m SELECT pet_id, visit_id, description, visit_date FROM petclinic_visit_by_pet WHERE pet_id = :pet_id',
		);
		expect(selectLines[selectLines.length - 1]).toContain('(0 rows)');
	});
});
