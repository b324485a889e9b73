import type { ErrorRecord } from '../ErrorRecord';

export interface ErrorReader {
  getLatest(): Promise<ErrorRecord | null>;
  /** Most recent first. */
  listAll(limit: number): Promise<ErrorRecord[]>;
}
