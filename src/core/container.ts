/**
 * Dependency Injection Container
 * Layer: Core
 *
 * The one place where tokens are bound to implementations. `reflect-metadata`
 * has to load before anything decorated with @injectable.
 *
 * DatabasePools is registered through a caching factory so that importing
 * the container never opens a socket; integration tests replace it with a
 * registry built on fake clients before the app resolves it.
 */
import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';

import { TOKENS } from './types';
import { logger } from './logger';

import { getDatabasePools } from '@infrastructure/database/connection';
import { HealthService } from '@application/services/HealthService';
import { ResponseBuilder } from '@application/services/ResponseBuilder';
import { UserService } from '@application/services/UserService';

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.DatabasePools, {
  useFactory: instanceCachingFactory(() => getDatabasePools()),
});
container.register(TOKENS.ResponseBuilder, { useClass: ResponseBuilder });
container.register(TOKENS.UserService, { useClass: UserService });
container.register(TOKENS.HealthService, { useClass: HealthService });

export { container };
