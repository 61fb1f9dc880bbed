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

import {createPetID, createVisitID, VisitDateSchema} from '@petclinic/visits/src/BrandedTypes';
import type {CassandraRow} from '@petclinic/visits/src/database/Cassandra';
import type {VisitRow} from '@petclinic/visits/src/database/types/VisitTypes';
import {Visit} from '@petclinic/visits/src/models/Visit';
import {MalformedVisitRowError} from '@petclinic/visits/src/visit/VisitErrors';
import {types} from 'cassandra-driver';
import {z} from 'zod';

const StoredVisitDateSchema = z
	.instanceof(types.LocalDate)
	.transform((date) => date.toString())
	.pipe(VisitDateSchema);

const VisitRowSchema = z.object({
	pet_id: z.instanceof(types.Uuid),
	visit_id: z.instanceof(types.Uuid),
	description: z.string().nullable(),
	visit_date: StoredVisitDateSchema.nullable(),
});

export interface VisitResponse {
	id: string;
	pet_id: string;
	visit_date: string | null;
	description: string | null;
}

export function mapVisitRowToVisit(row: CassandraRow): Visit {
	const result = VisitRowSchema.safeParse(row);
	if (!result.success) {
		throw new MalformedVisitRowError(
			result.error.issues.map((issue) => `${issue.path.join('.') || '(row)'}: ${issue.message}`),
		);
	}
	const {pet_id, visit_id, visit_date, description} = result.data;
	return new Visit({
		id: createVisitID(visit_id.toString()),
		petId: createPetID(pet_id.toString()),
		date: visit_date,
		description,
	});
}

export function mapVisitToRow(visit: Visit): VisitRow {
	return visit.toRow();
}

export function mapVisitToResponse(visit: Visit): VisitResponse {
	return {
		id: visit.id,
		pet_id: visit.petId,
		visit_date: visit.date,
		description: visit.description,
	};
}
