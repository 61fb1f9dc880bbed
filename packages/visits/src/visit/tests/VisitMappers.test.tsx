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

import {createCheckup, PET_1, VISIT_1} from '@petclinic/visits/src/test/VisitFixtures';
import {MalformedVisitRowError, VisitErrorCodes} from '@petclinic/visits/src/visit/VisitErrors';
import {mapVisitRowToVisit, mapVisitToResponse, mapVisitToRow} from '@petclinic/visits/src/visit/VisitMappers';
import {types} from 'cassandra-driver';
import {describe, expect, it} from 'vitest';

describe('mapVisitRowToVisit', () => {
	it('maps a stored row to a visit', () => {
		const visit = mapVisitRowToVisit({
			pet_id: types.Uuid.fromString(PET_1),
			visit_id: types.Uuid.fromString(VISIT_1),
			description: 'checkup',
			visit_date: types.LocalDate.fromString('2023-01-01'),
		});

		expect(visit.id).toBe(VISIT_1);
		expect(visit.petId).toBe(PET_1);
		expect(visit.date).toBe('2023-01-01');
		expect(visit.description).toBe('checkup');
	});

	it('keeps null columns as null', () => {
		const visit = mapVisitRowToVisit({
			pet_id: types.Uuid.fromString(PET_1),
			visit_id: types.Uuid.fromString(VISIT_1),
			description: null,
			visit_date: null,
		});

		expect(visit.date).toBeNull();
		expect(visit.description).toBeNull();
	});

	it('rejects a row with a malformed column', () => {
		const row = {
			pet_id: PET_1,
			visit_id: types.Uuid.fromString(VISIT_1),
			description: 'checkup',
			visit_date: null,
		};

		let caught: unknown;
		try {
			mapVisitRowToVisit(row);
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(MalformedVisitRowError);
		if (!(caught instanceof MalformedVisitRowError)) return;
		expect(caught.code).toBe(VisitErrorCodes.MALFORMED_VISIT_ROW);
		expect(caught.issues).toHaveLength(1);
		expect(caught.issues[0]).toMatch(/^pet_id: /);
	});
});

describe('mapVisitToRow', () => {
	it('converts identifiers and dates to driver values', () => {
		const row = mapVisitToRow(createCheckup());

		expect(row.pet_id.equals(types.Uuid.fromString(PET_1))).toBe(true);
		expect(row.visit_id.toString()).toBe(VISIT_1);
		expect(row.visit_date?.toString()).toBe('2023-01-01');
		expect(row.description).toBe('checkup');
	});

	it('is reversed by mapVisitRowToVisit', () => {
		const visit = createCheckup();
		expect(mapVisitRowToVisit({...mapVisitToRow(visit)}).equals(visit)).toBe(true);
	});
});

describe('mapVisitToResponse', () => {
	it('produces the serialized shape', () => {
		expect(mapVisitToResponse(createCheckup())).toEqual({
			id: VISIT_1,
			pet_id: PET_1,
			visit_date: '2023-01-01',
			description: 'checkup',
		});
	});
});
