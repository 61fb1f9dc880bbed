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

import type {OwnerID, PetID} from '@petclinic/visits/src/BrandedTypes';

export const VisitErrorCodes = {
	MALFORMED_VISIT_ROW: 'malformed_visit_row',
	OWNER_VISIT_POPULATION_FAILED: 'owner_visit_population_failed',
} as const;

export type VisitErrorCode = (typeof VisitErrorCodes)[keyof typeof VisitErrorCodes];

export class MalformedVisitRowError extends Error {
	readonly code: VisitErrorCode = VisitErrorCodes.MALFORMED_VISIT_ROW;
	readonly issues: ReadonlyArray<string>;

	constructor(issues: ReadonlyArray<string>) {
		super(`Malformed visit row: ${issues.join('; ')}`);
		this.name = 'MalformedVisitRowError';
		this.issues = issues;
	}
}

export class OwnerVisitPopulationError extends Error {
	readonly code: VisitErrorCode = VisitErrorCodes.OWNER_VISIT_POPULATION_FAILED;
	readonly ownerId: OwnerID;
	readonly petId: PetID;

	constructor(ownerId: OwnerID, petId: PetID, cause: unknown) {
		super(`Failed to populate visits for owner ${ownerId}: pet ${petId} failed`, {cause});
		this.name = 'OwnerVisitPopulationError';
		this.ownerId = ownerId;
		this.petId = petId;
	}
}
