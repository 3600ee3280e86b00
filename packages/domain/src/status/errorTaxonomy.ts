/**
 * Error codes the authority may write into `statusCode`.
 *
 * The table is closed and versioned; the authority's code space can grow
 * independently of the client, so lookups of codes missing here must
 * resolve to an `unknown` kind instead of failing.
 */
export const ERROR_TAXONOMY_VERSION = 1;

export const PermissionErrorCategories = {
  permissionDenied: 'permission_denied',
  notFound: 'not_found',
  malformedRequest: 'malformed_request',
  authentication: 'authentication',
  server: 'server',
} as const;

export type PermissionErrorCategory =
  (typeof PermissionErrorCategories)[keyof typeof PermissionErrorCategories];

export const KnownErrorNames = {
  permissionDenied: 'permission_denied',
  invalidParameters: 'invalid_parameters',
  missingParameters: 'missing_parameters',
  invalidCredentials: 'invalid_credentials',
  unknownAccount: 'unknown_account',
  accessDenied: 'access_denied',
  expiredRefreshToken: 'expired_refresh_token',
  realmNotFound: 'realm_not_found',
  userNotFound: 'user_not_found',
  expiredPermissionOffer: 'expired_permission_offer',
  ambiguousPermissionOfferToken: 'ambiguous_permission_offer_token',
  fileMayNotBeShared: 'file_may_not_be_shared',
  serverMisconfiguration: 'server_misconfiguration',
} as const;

export type KnownErrorName =
  (typeof KnownErrorNames)[keyof typeof KnownErrorNames];

type TaxonomyEntry = Readonly<{
  name: KnownErrorName;
  category: PermissionErrorCategory;
}>;

const ERROR_TAXONOMY: ReadonlyMap<number, TaxonomyEntry> = new Map<number, TaxonomyEntry>([
  [206, { name: KnownErrorNames.permissionDenied, category: PermissionErrorCategories.permissionDenied }],
  [601, { name: KnownErrorNames.invalidParameters, category: PermissionErrorCategories.malformedRequest }],
  [602, { name: KnownErrorNames.missingParameters, category: PermissionErrorCategories.malformedRequest }],
  [611, { name: KnownErrorNames.invalidCredentials, category: PermissionErrorCategories.authentication }],
  [612, { name: KnownErrorNames.unknownAccount, category: PermissionErrorCategories.notFound }],
  [614, { name: KnownErrorNames.accessDenied, category: PermissionErrorCategories.permissionDenied }],
  [615, { name: KnownErrorNames.expiredRefreshToken, category: PermissionErrorCategories.authentication }],
  [617, { name: KnownErrorNames.realmNotFound, category: PermissionErrorCategories.notFound }],
  [618, { name: KnownErrorNames.userNotFound, category: PermissionErrorCategories.notFound }],
  [701, { name: KnownErrorNames.expiredPermissionOffer, category: PermissionErrorCategories.permissionDenied }],
  [702, { name: KnownErrorNames.ambiguousPermissionOfferToken, category: PermissionErrorCategories.malformedRequest }],
  [703, { name: KnownErrorNames.fileMayNotBeShared, category: PermissionErrorCategories.permissionDenied }],
  [801, { name: KnownErrorNames.serverMisconfiguration, category: PermissionErrorCategories.server }],
]);

export type PermissionErrorCode =
  | Readonly<{
      kind: 'known';
      code: number;
      name: KnownErrorName;
      category: PermissionErrorCategory;
    }>
  | Readonly<{ kind: 'unknown'; code: number }>;

export const lookupErrorCode = (code: number): PermissionErrorCode => {
  const entry = ERROR_TAXONOMY.get(code);
  if (!entry) {
    return { kind: 'unknown', code };
  }
  return { kind: 'known', code, name: entry.name, category: entry.category };
};

export const knownErrorCodes = (): number[] => [...ERROR_TAXONOMY.keys()];
