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
import {IVisitRepository, type VisitReadOptions} from '@petclinic/visits/src/visit/IVisitRepository';
import {vi} from 'vitest';

export interface MockVisitRepositoryConfig {
	visitsByPet?: Map<PetID, Array<Visit>>;
	failingPets?: Map<PetID, Error>;
	gates?: Map<PetID, Promise<void>>;
}

function waitForGate(gate: Promise<void>, signal?: AbortSignal): Promise<void> {
	if (!signal) return gate;
	return new Promise<void>((resolve, reject) => {
		if (signal.aborted) {
			reject(signal.reason);
			return;
		}
		const onAbort = (): void => reject(signal.reason);
		signal.addEventListener('abort', onAbort, {once: true});
		gate.then(() => {
			signal.removeEventListener('abort', onAbort);
			resolve();
		}, reject);
	});
}

/**
 * Serves visits from memory. A pet listed in `failingPets` fails after yielding
 * its first visit; a pet with a gate takes its visits and failure, then waits for the gate (or an abort)
 * before its first row.
 */
export class MockVisitRepository extends IVisitRepository {
	readonly findAllForPetSpy = vi.fn();
	readonly upsertSpy = vi.fn();
	readonly deleteSpy = vi.fn();

	private readonly visitsByPet: Map<PetID, Array<Visit>>;
	private readonly failingPets: Map<PetID, Error>;
	private readonly gates: Map<PetID, Promise<void>>;

	constructor(config: MockVisitRepositoryConfig = {}) {
		super();
		this.visitsByPet = config.visitsByPet ?? new Map();
		this.failingPets = config.failingPets ?? new Map();
		this.gates = config.gates ?? new Map();
	}

	setVisits(petId: PetID, visits: Array<Visit>): void {
		this.visitsByPet.set(petId, visits);
	}

	async *findAll(options: VisitReadOptions = {}): AsyncGenerator<Visit, void, undefined> {
		for (const visits of this.visitsByPet.values()) {
			for (const visit of visits) {
				options.signal?.throwIfAborted();
				yield visit;
			}
		}
	}

	async *findAllForPet(petId: PetID, options: VisitReadOptions = {}): AsyncGenerator<Visit, void, undefined> {
		this.findAllForPetSpy(petId);
		const {signal} = options;
		const visits = [...(this.visitsByPet.get(petId) ?? [])];
		const failure = this.failingPets.get(petId);
		const gate = this.gates.get(petId);
		if (gate) {
			await waitForGate(gate, signal);
		}
		signal?.throwIfAborted();
		for (const visit of visits) {
			signal?.throwIfAborted();
			yield visit;
			if (failure) throw failure;
		}
		if (failure) throw failure;
	}

	async *findById(visitId: VisitID, options: VisitReadOptions = {}): AsyncGenerator<Visit, void, undefined> {
		for await (const visit of this.findAll(options)) {
			if (visit.id === visitId) yield visit;
		}
	}

	async upsert(visit: Visit): Promise<void> {
		this.upsertSpy(visit);
		const visits = (this.visitsByPet.get(visit.petId) ?? []).filter((existing) => existing.id !== visit.id);
		this.visitsByPet.set(visit.petId, [...visits, visit]);
	}

	async delete(visit: Visit): Promise<void> {
		this.deleteSpy(visit);
		const visits = this.visitsByPet.get(visit.petId) ?? [];
		this.visitsByPet.set(
			visit.petId,
			visits.filter((existing) => existing.id !== visit.id),
		);
	}

	async listForPetPage(petId: PetID, limit: number, afterVisitId?: VisitID): Promise<Array<Visit>> {
		const visits = [...(this.visitsByPet.get(petId) ?? [])].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
		const start = afterVisitId ? visits.filter((visit) => visit.id <= afterVisitId).length : 0;
		return visits.slice(start, start + limit);
	}
}
