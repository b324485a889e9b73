import type { NewErrorRecord } from '../ErrorRecord';

export interface ErrorWriter {
  /** One atomic insert; resolves with the assigned id. */
  insert(record: NewErrorRecord): Promise<number>;
}
