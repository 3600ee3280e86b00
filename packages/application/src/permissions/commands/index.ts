export * from './RequestUserPermissionChange';
export * from './RequestMetadataPermissionChange';
