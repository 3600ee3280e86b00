import { MalformedRequestError } from './errors';

/**
 * What a request asks for one capability: grant it, revoke it, or leave
 * it to be merged with the existing (or default) permission.
 */
export const PermissionDirectives = {
  grant: 'grant',
  revoke: 'revoke',
  unspecified: 'unspecified',
} as const;

export type PermissionDirective =
  (typeof PermissionDirectives)[keyof typeof PermissionDirectives];

export const PERMISSION_DIRECTIVES: readonly PermissionDirective[] = Object.values(PermissionDirectives);

/** Accepted wherever a flag is passed in: a directive or a nullable boolean. */
export type PermissionFlagInput = PermissionDirective | boolean | null | undefined;

export type PermissionCapability = 'mayRead' | 'mayWrite' | 'mayManage';

export const PERMISSION_CAPABILITIES: readonly PermissionCapability[] = ['mayRead', 'mayWrite', 'mayManage'];

export type PermissionRequestFlags = Readonly<Record<PermissionCapability, PermissionDirective>>;

export type PermissionSet = Readonly<Record<PermissionCapability, boolean>>;

export const isPermissionDirective = (value: unknown): value is PermissionDirective =>
  typeof value === 'string' && (PERMISSION_DIRECTIVES as readonly string[]).includes(value);

export const directiveFromNullable = (value: boolean | null | undefined): PermissionDirective => {
  if (value === true) return PermissionDirectives.grant;
  if (value === false) return PermissionDirectives.revoke;
  return PermissionDirectives.unspecified;
};

export const directiveToNullable = (directive: PermissionDirective): boolean | null => {
  switch (directive) {
    case PermissionDirectives.grant:
      return true;
    case PermissionDirectives.revoke:
      return false;
    case PermissionDirectives.unspecified:
      return null;
  }
};

/**
 * Normalize a flag given as a directive or nullable boolean.
 *
 * @throws {MalformedRequestError} for any other value
 */
export const parsePermissionFlag = (input: PermissionFlagInput, name: string): PermissionDirective => {
  if (input === undefined || input === null || typeof input === 'boolean') {
    return directiveFromNullable(input);
  }
  if (!isPermissionDirective(input)) {
    throw new MalformedRequestError(`${name} must be a permission directive, got: ${JSON.stringify(input)}`);
  }
  return input;
};

export const applyDirective = (current: boolean, directive: PermissionDirective): boolean => {
  switch (directive) {
    case PermissionDirectives.grant:
      return true;
    case PermissionDirectives.revoke:
      return false;
    case PermissionDirectives.unspecified:
      return current;
  }
};

/**
 * Resolve the permissions a processed request leaves behind.
 *
 * Unspecified capabilities keep the existing value, or the default when
 * the user has no existing permission for the resource. The result is
 * always fully materialized.
 */
export const mergePermissions = (params: {
  existing: PermissionSet | null;
  defaults: PermissionSet;
  change: PermissionRequestFlags;
}): PermissionSet => {
  const base = params.existing ?? params.defaults;
  return {
    mayRead: applyDirective(base.mayRead, params.change.mayRead),
    mayWrite: applyDirective(base.mayWrite, params.change.mayWrite),
    mayManage: applyDirective(base.mayManage, params.change.mayManage),
  };
};

export const describeDirectives = (change: PermissionRequestFlags): string =>
  `read:${change.mayRead} write:${change.mayWrite} manage:${change.mayManage}`;
