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
import type {Visit} from '@petclinic/visits/src/models/Visit';

export class Pet {
	readonly id: PetID;
	readonly ownerId: OwnerID | null;
	readonly name: string;
	private visitSet: ReadonlySet<Visit> | null = null;

	constructor(params: {id: PetID; ownerId?: OwnerID | null; name: string}) {
		this.id = params.id;
		this.ownerId = params.ownerId ?? null;
		this.name = params.name;
	}

	/** `null` until the pet has been populated at least once. */
	get visits(): ReadonlySet<Visit> | null {
		return this.visitSet;
	}

	setVisits(visits: ReadonlySet<Visit>): void {
		this.visitSet = visits;
	}
}
