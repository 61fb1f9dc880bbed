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

import type {VisitsConfig} from '@petclinic/visits/src/Config';
import {shutdownCassandra} from '@petclinic/visits/src/database/Cassandra';
import type {ILogger} from '@petclinic/visits/src/ILogger';
import {ensureSchema} from '@petclinic/visits/src/visit/VisitSchema';

export function createInitializer(config: VisitsConfig, logger: ILogger): () => Promise<void> {
	return async (): Promise<void> => {
		logger.info({backend: config.database.backend}, 'Initializing visits service...');

		try {
			await ensureSchema();
			logger.info({keyspace: config.cassandra.keyspace}, 'Visit schema ensured');
		} catch (error) {
			logger.error({error}, 'Failed to ensure visit schema');
			throw error;
		}

		logger.info('Visits service initialization complete');
	};
}

export function createShutdown(logger: ILogger): () => Promise<void> {
	return async (): Promise<void> => {
		logger.info('Shutting down visits service...');

		try {
			await shutdownCassandra();
			logger.info('Cassandra client shut down');
		} catch (error) {
			logger.error({error}, 'Error shutting down Cassandra client');
		}

		logger.info('Visits service shutdown complete');
	};
}
