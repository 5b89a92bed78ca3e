/**
 * Report Store
 * Persistence for fault reports and their archived flag
 *
 * Reports are immutable once written except for `archived`, which only
 * moves from false to true.
 */

import type { DatabaseManager } from './sqlite.js';
import type { Report, ReportFilter, ReportSubmission, ReportType } from '../types/index.js';

// ============================================
// Types
// ============================================

interface ReportRecord {
  report_id: number;
  room_id: number;
  machine_id: string;
  reporter_username: string;
  report_type: ReportType;
  time: string;
  description: string | null;
  archived: number;
}

export type Clock = () => Date;

const REPORT_COLUMNS = `
  id AS report_id,
  room_id,
  machine_id,
  reporter_username,
  type AS report_type,
  time,
  description,
  archived
`;

function toReport(row: ReportRecord): Report {
  return { ...row, archived: Boolean(row.archived) };
}

// ============================================
// Report Store
// ============================================

export class ReportStore {
  constructor(
    private readonly db: DatabaseManager,
    private readonly clock: Clock = () => new Date()
  ) {}

  exists(reportId: number): boolean {
    return this.db.get<{ id: number }>('SELECT id FROM report WHERE id = ?', reportId) !== undefined;
  }

  /**
   * List reports matching the archived state, optionally scoped to a
   * room, a machine within a room, or a reporter
   */
  list(filter: ReportFilter): Report[] {
    const conditions = ['archived = ?'];
    const params: unknown[] = [filter.archived ? 1 : 0];

    if (filter.room_id !== undefined) {
      conditions.push('room_id = ?');
      params.push(filter.room_id);
    }
    if (filter.machine_id !== undefined) {
      conditions.push('machine_id = ?');
      params.push(filter.machine_id);
    }
    if (filter.reporter_username !== undefined) {
      conditions.push('reporter_username = ?');
      params.push(filter.reporter_username);
    }

    const rows = this.db.all<ReportRecord>(
      `SELECT ${REPORT_COLUMNS} FROM report WHERE ${conditions.join(' AND ')} ORDER BY id`,
      ...params
    );
    return rows.map(toReport);
  }

  get(reportId: number): Report | null {
    const row = this.db.get<ReportRecord>(`SELECT ${REPORT_COLUMNS} FROM report WHERE id = ?`, reportId);
    return row ? toReport(row) : null;
  }

  /**
   * Insert a report stamped with the current UTC time and archived = false.
   * An unknown reporter fails the foreign key and surfaces as a constraint StorageError.
   */
  create(submission: ReportSubmission): Report {
    const row = this.db.get<ReportRecord>(
      `INSERT INTO report (room_id, machine_id, reporter_username, type, description, time, archived)
       VALUES (?, ?, ?, ?, ?, ?, 0)
       RETURNING ${REPORT_COLUMNS}`,
      submission.room_id,
      submission.machine_id,
      submission.reporter_username,
      submission.report_type,
      submission.description ?? null,
      this.clock().toISOString()
    );
    if (!row) {
      throw new Error('INSERT INTO report returned no row');
    }
    return toReport(row);
  }

  delete(reportId: number): Report | null {
    const row = this.db.get<ReportRecord>(`DELETE FROM report WHERE id = ? RETURNING ${REPORT_COLUMNS}`, reportId);
    return row ? toReport(row) : null;
  }

  /** Always writes archived = true, so archiving twice is harmless */
  archive(reportId: number): Report | null {
    const row = this.db.get<ReportRecord>(
      `UPDATE report SET archived = 1 WHERE id = ? RETURNING ${REPORT_COLUMNS}`,
      reportId
    );
    return row ? toReport(row) : null;
  }
}
