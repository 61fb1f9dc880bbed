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
import {Logger} from '@petclinic/visits/src/Logger';
import {Owner} from '@petclinic/visits/src/models/Owner';
import type {Pet} from '@petclinic/visits/src/models/Pet';
import type {Visit} from '@petclinic/visits/src/models/Visit';
import type {IVisitRepository, VisitReadOptions} from '@petclinic/visits/src/visit/IVisitRepository';
import {type PopulateOptions, VisitPopulationService} from '@petclinic/visits/src/visit/VisitPopulationService';
import {ensureSchema} from '@petclinic/visits/src/visit/VisitSchema';

export class VisitService {
	private readonly populationService: VisitPopulationService;

	constructor(private readonly visitRepository: IVisitRepository) {
		this.populationService = new VisitPopulationService(visitRepository);
	}

	async ensureSchema(): Promise<void> {
		await ensureSchema();
	}

	listAllVisits(options?: VisitReadOptions): AsyncIterable<Visit> {
		return this.visitRepository.findAll(options);
	}

	listVisitsForPet(petId: PetID, options?: VisitReadOptions): AsyncIterable<Visit> {
		return this.visitRepository.findAllForPet(petId, options);
	}

	findVisitById(visitId: VisitID, options?: VisitReadOptions): AsyncIterable<Visit> {
		return this.visitRepository.findById(visitId, options);
	}

	async getVisitById(visitId: VisitID, options?: VisitReadOptions): Promise<Visit | null> {
		const matches: Array<Visit> = [];
		for await (const visit of this.visitRepository.findById(visitId, options)) {
			matches.push(visit);
		}
		if (matches.length > 1) {
			Logger.warn(
				{visitId, petIds: matches.map((visit) => visit.petId)},
				'Visit id is shared by more than one pet, returning the first match',
			);
		}
		return matches[0] ?? null;
	}

	async listVisitsForPetPage(petId: PetID, limit: number, afterVisitId?: VisitID): Promise<Array<Visit>> {
		return this.visitRepository.listForPetPage(petId, limit, afterVisitId);
	}

	async upsertVisit(visit: Visit): Promise<void> {
		await this.visitRepository.upsert(visit);
	}

	async deleteVisit(visit: Visit): Promise<void> {
		await this.visitRepository.delete(visit);
	}

	populateVisits(pet: Pet, options?: PopulateOptions): Promise<Pet>;
	populateVisits(owner: Owner, options?: PopulateOptions): Promise<Owner>;
	async populateVisits(target: Pet | Owner, options?: PopulateOptions): Promise<Pet | Owner> {
		if (target instanceof Owner) {
			return this.populationService.populateVisitsForOwner(target, options);
		}
		return this.populationService.populateVisitsForPet(target, options);
	}
}
