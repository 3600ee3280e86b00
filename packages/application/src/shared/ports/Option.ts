export type Option<T> = { kind: 'some'; value: T } | { kind: 'none' };

const NONE: Option<never> = { kind: 'none' };

export const some = <T>(value: T): Option<T> => ({ kind: 'some', value });

export const none = (): Option<never> => NONE;

export const fromNullable = <T>(value: T | null | undefined): Option<T> =>
  value === null || value === undefined ? NONE : some(value);

