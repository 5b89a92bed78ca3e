/**
 * Machine Store
 * Machines are keyed by (room_id, machine_id)
 */

import type { DatabaseManager } from './sqlite.js';
import type { Machine, MachineSubmission } from '../types/index.js';

const MACHINE_COLUMNS = 'room_id, machine_id, type AS machine_type';

export class MachineStore {
  constructor(private readonly db: DatabaseManager) {}

  exists(roomId: number, machineId: string): boolean {
    const row = this.db.get<{ room_id: number; machine_id: string }>(
      'SELECT room_id, machine_id FROM machine WHERE room_id = ? AND machine_id = ?',
      roomId,
      machineId
    );
    return row !== undefined;
  }

  list(): Machine[] {
    return this.db.all<Machine>(`SELECT ${MACHINE_COLUMNS} FROM machine ORDER BY room_id, machine_id`);
  }

  listByRoom(roomId: number): Machine[] {
    return this.db.all<Machine>(
      `SELECT ${MACHINE_COLUMNS} FROM machine WHERE room_id = ? ORDER BY machine_id`,
      roomId
    );
  }

  get(roomId: number, machineId: string): Machine | null {
    const machine = this.db.get<Machine>(
      `SELECT ${MACHINE_COLUMNS} FROM machine WHERE room_id = ? AND machine_id = ?`,
      roomId,
      machineId
    );
    return machine ?? null;
  }

  create(submission: MachineSubmission): Machine {
    const machine = this.db.get<Machine>(
      `INSERT INTO machine (room_id, machine_id, type) VALUES (?, ?, ?) RETURNING ${MACHINE_COLUMNS}`,
      submission.room_id,
      submission.machine_id,
      submission.machine_type
    );
    if (!machine) {
      throw new Error('INSERT INTO machine returned no row');
    }
    return machine;
  }

  delete(roomId: number, machineId: string): Machine | null {
    const machine = this.db.get<Machine>(
      `DELETE FROM machine WHERE room_id = ? AND machine_id = ? RETURNING ${MACHINE_COLUMNS}`,
      roomId,
      machineId
    );
    return machine ?? null;
  }
}
