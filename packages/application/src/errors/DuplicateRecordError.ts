import { ApplicationError } from './ApplicationError';

/** A record with the same id is already stored. */
export class DuplicateRecordError extends ApplicationError {
  constructor(readonly recordId: string) {
    super(`Permission change ${recordId} already exists`, 'duplicate_record');
    this.name = 'DuplicateRecordError';
  }
}
