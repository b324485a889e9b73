import type { ErrorReader } from '../domain/ports/ErrorReader';
import type { ErrorRecord } from '../domain/ErrorRecord';

export function makeGetLatestError(reader: ErrorReader) {
  return async (): Promise<ErrorRecord | null> => reader.getLatest();
}

export function makeListErrors(reader: ErrorReader, bounds: { defaultLimit: number; maxLimit: number }) {
  return async (limit?: number): Promise<ErrorRecord[]> => {
    const size = Math.min(bounds.maxLimit, Math.max(1, limit ?? bounds.defaultLimit));
    return reader.listAll(size);
  };
}
