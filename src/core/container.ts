/**
 * Dependency Injection Container
 * Layer: Core
 *
 * The single place where every dependency is wired. Each token from types.ts
 * maps to a concrete implementation, so when a class says "I need the
 * ResponseCache" the container hands back the right object.
 *
 * `reflect-metadata` must load first: tsyringe reads the constructor
 * parameter metadata that @injectable()/@inject() store through it.
 * `useValue` registers pre-built singletons (logger, options, transport);
 * the services are registered as singletons so the cache prefix set through
 * one of them is the one every other service sees.
 *
 * Tests override any token with `container.register(TOKENS.X, { useValue })`
 * before resolving (see the integration tests).
 */
import 'reflect-metadata';
import { Lifecycle, container } from 'tsyringe';

import { createClientOptions, settingsFromConfig } from './clientOptions';
import { logger } from './logger';
import { TOKENS } from './types';

import { ApiClient } from '@application/services/ApiClient';
import { FacetAttributeService } from '@application/services/FacetAttributeService';
import { PaginationWalker } from '@application/services/PaginationWalker';
import { TableService } from '@application/services/TableService';
import { FileResponseCache } from '@infrastructure/cache/FileResponseCache';
import { AxiosTransport } from '@infrastructure/http/AxiosTransport';

const singleton = { lifecycle: Lifecycle.Singleton } as const;

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.ClientOptions, { useValue: createClientOptions(settingsFromConfig()) });
container.register(TOKENS.HttpTransport, { useValue: new AxiosTransport() });
container.register(TOKENS.ResponseCache, { useClass: FileResponseCache }, singleton);
container.register(TOKENS.ApiClient, { useClass: ApiClient }, singleton);
container.register(TOKENS.PaginationWalker, { useClass: PaginationWalker }, singleton);
container.register(TOKENS.FacetAttributeService, { useClass: FacetAttributeService }, singleton);
container.register(TOKENS.TableService, { useClass: TableService }, singleton);

export { container };
