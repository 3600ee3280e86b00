// Errors
export * from './errors/ApplicationError';
export * from './errors/NotFoundError';
export * from './errors/DuplicateRecordError';
export * from './errors/ValidationError';

// Shared ports
export * from './shared/ports/Option';
export * from './shared/ports/CommandResult';
export * from './shared/ports/BaseCommand';
export * from './shared/ports/BaseCommandHandler';
export * from './shared/ports/IdempotencyStorePort';
export * from './shared/ports/mocks/InMemoryIdempotencyStore';

// Permission change requests
export * from './permissions/commands';
export * from './permissions/ports/PermissionChangeStorePort';
export * from './permissions/ports/mocks/InMemoryPermissionChangeStore';
export * from './permissions/ports/AuthorityTransportPort';
export * from './permissions/PermissionChangeCommandHandler';
export * from './permissions/services/StatusTracker';
export * from './permissions/services/waitForTerminalStatus';
