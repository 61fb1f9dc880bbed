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

import {executeSchemaStatement} from '@petclinic/visits/src/database/Cassandra';
import {VISIT_ID_INDEX, VisitsByPet} from '@petclinic/visits/src/Tables';

export async function ensureVisitTable(): Promise<void> {
	await executeSchemaStatement(VisitsByPet.createTable());
}

export async function ensureVisitIndex(): Promise<void> {
	await executeSchemaStatement(VisitsByPet.createIndex(VISIT_ID_INDEX));
}

/** Creates the visit table and its visit id index when absent. Safe to run on every start. */
export async function ensureSchema(): Promise<void> {
	await ensureVisitTable();
	await ensureVisitIndex();
}
