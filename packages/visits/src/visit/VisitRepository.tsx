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

import type {PetID, VisitID} from '@petclinic/visits/src/BrandedTypes';
import {deleteOneOrMany, fetchMany, streamRows, upsertOne} from '@petclinic/visits/src/database/Cassandra';
import type {Visit} from '@petclinic/visits/src/models/Visit';
import {VisitsByPet} from '@petclinic/visits/src/Tables';
import {IVisitRepository, type VisitReadOptions} from '@petclinic/visits/src/visit/IVisitRepository';
import {mapVisitRowToVisit, mapVisitToRow} from '@petclinic/visits/src/visit/VisitMappers';
import {types} from 'cassandra-driver';

const FETCH_ALL_VISITS_CQL = VisitsByPet.selectCql();

const FETCH_VISITS_FOR_PET_CQL = VisitsByPet.selectCql({
	where: VisitsByPet.where.eq('pet_id'),
});

// Served by the visit id index once it exists, by a filtering scan before that.
const FETCH_VISIT_BY_ID_CQL = VisitsByPet.selectCql({
	where: VisitsByPet.where.eq('visit_id'),
	allowFiltering: true,
});

const createFetchPageCql = (limit: number) =>
	VisitsByPet.selectCql({
		where: VisitsByPet.where.eq('pet_id'),
		limit,
	});

const createFetchPageAfterCql = (limit: number) =>
	VisitsByPet.selectCql({
		where: [VisitsByPet.where.eq('pet_id'), VisitsByPet.where.gt('visit_id', 'after_visit_id')],
		limit,
	});

export class VisitRepository extends IVisitRepository {
	async *findAll(options: VisitReadOptions = {}): AsyncGenerator<Visit, void, undefined> {
		for await (const row of streamRows(FETCH_ALL_VISITS_CQL, {}, options)) {
			yield mapVisitRowToVisit(row);
		}
	}

	async *findAllForPet(petId: PetID, options: VisitReadOptions = {}): AsyncGenerator<Visit, void, undefined> {
		const params = {pet_id: types.Uuid.fromString(petId)};
		for await (const row of streamRows(FETCH_VISITS_FOR_PET_CQL, params, options)) {
			yield mapVisitRowToVisit(row);
		}
	}

	async *findById(visitId: VisitID, options: VisitReadOptions = {}): AsyncGenerator<Visit, void, undefined> {
		const params = {visit_id: types.Uuid.fromString(visitId)};
		for await (const row of streamRows(FETCH_VISIT_BY_ID_CQL, params, options)) {
			yield mapVisitRowToVisit(row);
		}
	}

	async upsert(visit: Visit): Promise<void> {
		await upsertOne(VisitsByPet.upsertAll(mapVisitToRow(visit)));
	}

	async delete(visit: Visit): Promise<void> {
		const row = mapVisitToRow(visit);
		await deleteOneOrMany(VisitsByPet.deleteByPk({pet_id: row.pet_id, visit_id: row.visit_id}));
	}

	async listForPetPage(petId: PetID, limit: number, afterVisitId?: VisitID): Promise<Array<Visit>> {
		if (!Number.isInteger(limit) || limit < 1) {
			throw new RangeError(`Page limit must be a positive integer, got ${limit}`);
		}
		const petUuid = types.Uuid.fromString(petId);
		const rows = afterVisitId
			? await fetchMany(createFetchPageAfterCql(limit), {
					pet_id: petUuid,
					after_visit_id: types.Uuid.fromString(afterVisitId),
				})
			: await fetchMany(createFetchPageCql(limit), {pet_id: petUuid});
		return rows.map(mapVisitRowToVisit);
	}
}
