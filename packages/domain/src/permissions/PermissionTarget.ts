/** `userId` value addressing every user. */
export const ALL_USERS = '*';

export const TargetKinds = {
  user: 'user',
  metadata: 'metadata',
} as const;

export type TargetKind = (typeof TargetKinds)[keyof typeof TargetKinds];

/**
 * Who a request applies to: one user (or `*` for all users), or every user
 * whose metadata carries `key` = `value`. A request uses exactly one mode.
 */
export type PermissionTarget =
  | Readonly<{ kind: typeof TargetKinds.user; userId: string }>
  | Readonly<{ kind: typeof TargetKinds.metadata; key: string; value: string }>;

export const describeTarget = (target: PermissionTarget): string => {
  switch (target.kind) {
    case TargetKinds.user:
      return target.userId === ALL_USERS ? 'all users' : `user ${target.userId}`;
    case TargetKinds.metadata:
      return `users with ${target.key}=${target.value}`;
  }
};
