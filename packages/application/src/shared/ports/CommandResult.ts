export type ValidationError = {
  readonly field: string;
  readonly message: string;
};
