import type { AuthorityOutcome } from '@permit/application';
import {
  PermissionChange,
  Timestamp,
  directiveFromNullable,
  directiveToNullable,
} from '@permit/domain';
import { z } from 'zod';
import { InfraError } from '../errors';

/**
 * JSON shape of a request on the wire: flags as nullable booleans
 * (`null` = merge with existing), timestamps as ISO strings.
 */
export const wirePermissionChangeSchema = z.object({
  id: z.string().uuid(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  statusCode: z.number().int().nullable(),
  statusMessage: z.string().nullable(),
  userId: z.string(),
  metadataKey: z.string().nullable(),
  metadataValue: z.string().nullable(),
  realmUrl: z.string().min(1),
  mayRead: z.boolean().nullable(),
  mayWrite: z.boolean().nullable(),
  mayManage: z.boolean().nullable(),
});

export type WirePermissionChange = z.infer<typeof wirePermissionChangeSchema>;

export const authorityOutcomeSchema = z.object({
  id: z.string(),
  statusCode: z.number().int().nullable(),
  statusMessage: z
    .string()
    .nullish()
    .transform((value) => value ?? null),
});

export const toWireRequest = (change: PermissionChange): WirePermissionChange => ({
  id: change.id.value,
  createdAt: change.createdAt.toISOString(),
  updatedAt: change.updatedAt.toISOString(),
  statusCode: change.statusCode,
  statusMessage: change.statusMessage,
  userId: change.userId,
  metadataKey: change.metadataKey,
  metadataValue: change.metadataValue,
  realmUrl: change.realmUrl,
  mayRead: directiveToNullable(change.mayRead),
  mayWrite: directiveToNullable(change.mayWrite),
  mayManage: directiveToNullable(change.mayManage),
});

export const parseWireRequest = (payload: unknown): PermissionChange => {
  const parsed = wirePermissionChangeSchema.safeParse(payload);
  if (!parsed.success) {
    throw new InfraError(
      `Invalid permission change payload: ${parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`,
      'invalid_payload'
    );
  }
  const wire = parsed.data;
  return PermissionChange.rehydrate({
    id: wire.id,
    createdAt: Timestamp.fromISOString(wire.createdAt).value,
    updatedAt: Timestamp.fromISOString(wire.updatedAt).value,
    statusCode: wire.statusCode,
    statusMessage: wire.statusMessage,
    userId: wire.userId,
    metadataKey: wire.metadataKey,
    metadataValue: wire.metadataValue,
    realmUrl: wire.realmUrl,
    mayRead: directiveFromNullable(wire.mayRead),
    mayWrite: directiveFromNullable(wire.mayWrite),
    mayManage: directiveFromNullable(wire.mayManage),
  });
};

export const parseAuthorityOutcome = (payload: unknown): AuthorityOutcome => {
  const parsed = authorityOutcomeSchema.safeParse(payload);
  if (!parsed.success) {
    throw new InfraError('Invalid authority outcome payload', 'invalid_payload');
  }
  return parsed.data;
};
