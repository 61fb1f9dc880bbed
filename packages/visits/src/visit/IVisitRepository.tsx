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
import type {Visit} from '@petclinic/visits/src/models/Visit';

export interface VisitReadOptions {
	signal?: AbortSignal;
}

export abstract class IVisitRepository {
	abstract findAll(options?: VisitReadOptions): AsyncIterable<Visit>;
	abstract findAllForPet(petId: PetID, options?: VisitReadOptions): AsyncIterable<Visit>;
	abstract findById(visitId: VisitID, options?: VisitReadOptions): AsyncIterable<Visit>;
	abstract upsert(visit: Visit): Promise<void>;
	abstract delete(visit: Visit): Promise<void>;
	abstract listForPetPage(petId: PetID, limit: number, afterVisitId?: VisitID): Promise<Array<Visit>>;
}
