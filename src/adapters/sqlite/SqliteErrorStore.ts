import type Database from 'better-sqlite3';
import type { ErrorRecord, NewErrorRecord, PayloadShapeKind } from '../../domain/ErrorRecord';
import type { ErrorReader } from '../../domain/ports/ErrorReader';
import type { ErrorWriter } from '../../domain/ports/ErrorWriter';
import { StorageError } from '../../libs/errors';
import type { SqliteDatabase } from '../../services/database.service';

type ErrorRow = {
  id: number;
  event_id: string | null;
  project: string | null;
  message: string;
  exception_type: string | null;
  exception_value: string | null;
  stacktrace: string | null;
  level: string | null;
  occurred_at: string | null;
  shape: string;
  raw_payload: string;
  received_at: string;
};

type InsertParams = Omit<ErrorRow, 'id'>;

const COLUMNS =
  'id, event_id, project, message, exception_type, exception_value, stacktrace, level, occurred_at, shape, raw_payload, received_at';

const SHAPES: readonly PayloadShapeKind[] = ['legacy', 'nested', 'attachments'];

function toShape(value: string): PayloadShapeKind {
  return SHAPES.find(s => s === value) ?? 'legacy';
}

function toRecord(row: ErrorRow): ErrorRecord {
  return {
    id: row.id,
    eventId: row.event_id,
    project: row.project,
    message: row.message,
    exceptionType: row.exception_type,
    exceptionValue: row.exception_value,
    stacktrace: row.stacktrace,
    level: row.level,
    occurredAt: row.occurred_at,
    shape: toShape(row.shape),
    rawPayload: row.raw_payload,
    receivedAt: row.received_at,
  };
}

/**
 * Single-table store on one better-sqlite3 connection. Statements run
 * synchronously, so concurrent requests are serialized at the connection.
 */
export class SqliteErrorStore implements ErrorWriter, ErrorReader {
  private insertStmt: Database.Statement<InsertParams>;
  private latestStmt: Database.Statement<[], ErrorRow>;
  private listStmt: Database.Statement<[number], ErrorRow>;

  constructor(db: SqliteDatabase) {
    this.insertStmt = db.prepare<InsertParams>(`
      INSERT INTO errors (event_id, project, message, exception_type, exception_value, stacktrace, level, occurred_at, shape, raw_payload, received_at)
      VALUES (@event_id, @project, @message, @exception_type, @exception_value, @stacktrace, @level, @occurred_at, @shape, @raw_payload, @received_at)
    `);
    this.latestStmt = db.prepare<[], ErrorRow>(`SELECT ${COLUMNS} FROM errors ORDER BY id DESC LIMIT 1`);
    this.listStmt = db.prepare<[number], ErrorRow>(`SELECT ${COLUMNS} FROM errors ORDER BY id DESC LIMIT ?`);
  }

  async insert(record: NewErrorRecord): Promise<number> {
    try {
      const info = this.insertStmt.run({
        event_id: record.eventId,
        project: record.project,
        message: record.message,
        exception_type: record.exceptionType,
        exception_value: record.exceptionValue,
        stacktrace: record.stacktrace,
        level: record.level,
        occurred_at: record.occurredAt,
        shape: record.shape,
        raw_payload: record.rawPayload,
        received_at: record.receivedAt,
      });
      return Number(info.lastInsertRowid);
    } catch (err) {
      throw new StorageError('Failed to insert error record', { cause: err });
    }
  }

  async getLatest(): Promise<ErrorRecord | null> {
    try {
      const row = this.latestStmt.get();
      return row ? toRecord(row) : null;
    } catch (err) {
      throw new StorageError('Failed to read latest error record', { cause: err });
    }
  }

  async listAll(limit: number): Promise<ErrorRecord[]> {
    try {
      return this.listStmt.all(limit).map(toRecord);
    } catch (err) {
      throw new StorageError('Failed to list error records', { cause: err });
    }
  }
}
