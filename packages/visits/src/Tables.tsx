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

import {defineTable} from '@petclinic/visits/src/database/Cassandra';
import {VISIT_COLUMNS, type VisitRow} from '@petclinic/visits/src/database/types/VisitTypes';

export const VISIT_ID_INDEX = 'petclinic_idx_visitid';

export const VisitsByPet = defineTable<VisitRow, 'pet_id' | 'visit_id', 'pet_id'>({
	name: 'petclinic_visit_by_pet',
	columns: VISIT_COLUMNS,
	columnTypes: {
		pet_id: 'uuid',
		visit_id: 'uuid',
		description: 'text',
		visit_date: 'date',
	},
	primaryKey: ['pet_id', 'visit_id'],
	partitionKey: ['pet_id'],
	clusteringOrder: 'ASC',
	indexes: [{name: VISIT_ID_INDEX, column: 'visit_id'}],
});
