// Shared
export * from './shared/Assert';
export * from './shared/Entity';
export * from './shared/FieldChangeNotifier';
export * from './shared/vos/ValueObject';
export * from './shared/vos/Timestamp';
export * from './utils/uuid';

// Permission change requests
export * from './permissions/errors';
export * from './permissions/vos/PermissionChangeId';
export * from './permissions/PermissionDirective';
export * from './permissions/PermissionTarget';
export * from './permissions/PermissionChange';

// Status decoding
export * from './status/errorTaxonomy';
export * from './status/decodeStatus';
export * from './status/RequestOutcome';
