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

import type {PetID, VisitDate, VisitID} from '@petclinic/visits/src/BrandedTypes';
import type {VisitRow} from '@petclinic/visits/src/database/types/VisitTypes';
import {types} from 'cassandra-driver';

export interface VisitFields {
	id: VisitID;
	petId: PetID;
	date: VisitDate | null;
	description: string | null;
}

export class Visit {
	readonly id: VisitID;
	readonly petId: PetID;
	readonly date: VisitDate | null;
	readonly description: string | null;

	constructor(fields: VisitFields) {
		this.id = fields.id;
		this.petId = fields.petId;
		this.date = fields.date;
		this.description = fields.description;
	}

	equals(other: Visit): boolean {
		return (
			this.id === other.id &&
			this.petId === other.petId &&
			this.date === other.date &&
			this.description === other.description
		);
	}

	toRow(): VisitRow {
		return {
			pet_id: types.Uuid.fromString(this.petId),
			visit_id: types.Uuid.fromString(this.id),
			description: this.description,
			visit_date: this.date === null ? null : types.LocalDate.fromString(this.date),
		};
	}
}
