/**
 * Room Store
 * Persistence for laundry rooms, the parents of machines and reports
 */

import type { DatabaseManager } from './sqlite.js';
import type { Room, RoomSubmission } from '../types/index.js';

const ROOM_COLUMNS = 'id AS room_id, name, description';

export class RoomStore {
  constructor(private readonly db: DatabaseManager) {}

  /**
   * Existence probe used before deletes and room-scoped listings
   */
  exists(roomId: number): boolean {
    return this.db.get<{ id: number }>('SELECT id FROM room WHERE id = ?', roomId) !== undefined;
  }

  list(): Room[] {
    return this.db.all<Room>(`SELECT ${ROOM_COLUMNS} FROM room ORDER BY id`);
  }

  get(roomId: number): Room | null {
    return this.db.get<Room>(`SELECT ${ROOM_COLUMNS} FROM room WHERE id = ?`, roomId) ?? null;
  }

  create(submission: RoomSubmission): Room {
    const room = this.db.get<Room>(
      `INSERT INTO room (name, description) VALUES (?, ?) RETURNING ${ROOM_COLUMNS}`,
      submission.name,
      submission.description ?? null
    );
    if (!room) {
      throw new Error('INSERT INTO room returned no row');
    }
    return room;
  }

  /**
   * Delete a room and return it; its machines and reports go with it
   */
  delete(roomId: number): Room | null {
    return this.db.get<Room>(`DELETE FROM room WHERE id = ? RETURNING ${ROOM_COLUMNS}`, roomId) ?? null;
  }
}
