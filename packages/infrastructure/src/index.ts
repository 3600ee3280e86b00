export * from './errors';
export * from './config';
export * from './createPermitClient';

// Persistence
export * from './persistence/database.types';
export * from './persistence/database';
export * from './persistence/migrations';
export * from './permissions/SqlitePermissionChangeStore';
export * from './idempotency/SqliteIdempotencyStore';

// Authority
export * from './authority/PermissionChangeCodec';
export * from './authority/HttpAuthorityTransport';

// Sync
export * from './sync/types';
export * from './sync/PermissionChangeSync';
