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

import {z} from 'zod';

const UuidString = z
	.string()
	.uuid()
	.transform((value) => value.toLowerCase());

export const PetIdSchema = UuidString.brand<'PetID'>();
export const VisitIdSchema = UuidString.brand<'VisitID'>();
export const OwnerIdSchema = UuidString.brand<'OwnerID'>();

/** Calendar date as `YYYY-MM-DD`; days that do not exist in the month are rejected. */
export const VisitDateSchema = z.string().date().brand<'VisitDate'>();

export type PetID = z.infer<typeof PetIdSchema>;
export type VisitID = z.infer<typeof VisitIdSchema>;
export type OwnerID = z.infer<typeof OwnerIdSchema>;
export type VisitDate = z.infer<typeof VisitDateSchema>;

export function createPetID(value: string): PetID {
	return PetIdSchema.parse(value);
}

export function createVisitID(value: string): VisitID {
	return VisitIdSchema.parse(value);
}

export function createOwnerID(value: string): OwnerID {
	return OwnerIdSchema.parse(value);
}

export function createVisitDate(value: string): VisitDate {
	return VisitDateSchema.parse(value);
}
