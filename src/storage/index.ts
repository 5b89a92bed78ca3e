/**
 * Storage Module Exports
 * Provides unified access to all storage components
 */

import type { DatabaseManager } from './sqlite.js';
import { RoomStore } from './room-store.js';
import { MachineStore } from './machine-store.js';
import { UserStore } from './user-store.js';
import { ReportStore, type Clock } from './report-store.js';

export { DatabaseManager } from './sqlite.js';
export type { Clock } from './report-store.js';

export interface Stores {
  db: DatabaseManager;
  rooms: RoomStore;
  machines: MachineStore;
  users: UserStore;
  reports: ReportStore;
}

/**
 * Build every entity store over one shared database handle
 */
export function createStores(db: DatabaseManager, clock?: Clock): Stores {
  return {
    db,
    rooms: new RoomStore(db),
    machines: new MachineStore(db),
    users: new UserStore(db),
    reports: new ReportStore(db, clock),
  };
}
