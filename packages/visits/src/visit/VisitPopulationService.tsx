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

import type {VisitID} from '@petclinic/visits/src/BrandedTypes';
import {Logger} from '@petclinic/visits/src/Logger';
import type {Owner} from '@petclinic/visits/src/models/Owner';
import type {Pet} from '@petclinic/visits/src/models/Pet';
import type {Visit} from '@petclinic/visits/src/models/Visit';
import {raceAbort} from '@petclinic/visits/src/utils/AbortUtils';
import type {IVisitRepository} from '@petclinic/visits/src/visit/IVisitRepository';
import {OwnerVisitPopulationError} from '@petclinic/visits/src/visit/VisitErrors';

export interface PopulateOptions {
	signal?: AbortSignal;
}

interface PetFailure {
	pet: Pet;
	error: unknown;
}

/**
 * Fills the visit collections of pets, and of every pet an owner has, from the
 * by-pet partition. A pet's collection is replaced wholesale once its query has
 * been fully read, so a failed or cancelled population leaves it as it was.
 */
export class VisitPopulationService {
	private readonly petQueues = new WeakMap<Pet, Promise<void>>();

	constructor(private readonly visitRepository: IVisitRepository) {}

	async populateVisitsForPet(pet: Pet, options: PopulateOptions = {}): Promise<Pet> {
		const {signal} = options;
		const previous = this.petQueues.get(pet) ?? Promise.resolve();
		const run = (async (): Promise<void> => {
			await (signal ? raceAbort(previous, signal) : previous);
			await this.replaceVisits(pet, signal);
		})();
		// A run that gives up early still holds its place until the run before it settles.
		const queued: Promise<void> = Promise.allSettled([previous, run]).then(() => {
			if (this.petQueues.get(pet) === queued) {
				this.petQueues.delete(pet);
			}
		});
		this.petQueues.set(pet, queued);
		await run;
		return pet;
	}

	async populateVisitsForOwner(owner: Owner, options: PopulateOptions = {}): Promise<Owner> {
		const {signal} = options;
		signal?.throwIfAborted();

		const controller = new AbortController();
		const forwardAbort = (): void => controller.abort(signal?.reason);
		signal?.addEventListener('abort', forwardAbort, {once: true});

		const failures: Array<PetFailure> = [];
		try {
			await Promise.allSettled(
				owner.pets.map(async (pet) => {
					try {
						await this.populateVisitsForPet(pet, {signal: controller.signal});
					} catch (error) {
						if (failures.length === 0 && !controller.signal.aborted) {
							failures.push({pet, error});
							controller.abort(error);
						}
						throw error;
					}
				}),
			);
		} finally {
			signal?.removeEventListener('abort', forwardAbort);
		}

		if (signal?.aborted) {
			throw signal.reason;
		}

		const [failure] = failures;
		if (failure) {
			Logger.warn(
				{ownerId: owner.id, petId: failure.pet.id, error: failure.error},
				'Visit population failed for owner',
			);
			throw new OwnerVisitPopulationError(owner.id, failure.pet.id, failure.error);
		}

		return owner;
	}

	private async replaceVisits(pet: Pet, signal: AbortSignal | undefined): Promise<void> {
		signal?.throwIfAborted();
		const visits = new Map<VisitID, Visit>();
		for await (const visit of this.visitRepository.findAllForPet(pet.id, {signal})) {
			visits.set(visit.id, visit);
		}
		signal?.throwIfAborted();
		pet.setVisits(new Set(visits.values()));
	}
}
