/**
 * Core types for the laundry API
 * Wire models are snake_case, matching the JSON the API sends and accepts
 */

// ============================================
// Enumerations
// ============================================

export const MACHINE_TYPES = ['washer', 'dryer'] as const;
export type MachineType = (typeof MACHINE_TYPES)[number];

export const REPORT_TYPES = ['operational', 'caution', 'broken'] as const;
export type ReportType = (typeof REPORT_TYPES)[number];

// ============================================
// Entities
// ============================================

export interface Room {
  room_id: number;
  name: string;
  description: string | null;
}

/** Identity is scoped to a room: `machine_id` alone is not unique */
export interface Machine {
  room_id: number;
  machine_id: string;
  machine_type: MachineType;
}

export interface User {
  username: string;
  admin: boolean;
}

export interface Report {
  report_id: number;
  room_id: number;
  machine_id: string;
  reporter_username: string;
  report_type: ReportType;
  /** ISO-8601 UTC timestamp assigned by the server at insert */
  time: string;
  description: string | null;
  archived: boolean;
}

// ============================================
// Submissions
// ============================================

export interface RoomSubmission {
  name: string;
  description?: string | null;
}

export interface MachineSubmission {
  room_id: number;
  machine_id: string;
  machine_type: MachineType;
}

export interface UserSubmission {
  username: string;
  admin: boolean;
}

export interface ReportSubmission {
  room_id: number;
  machine_id: string;
  reporter_username: string;
  report_type: ReportType;
  description?: string | null;
}

/** Filter applied to report listings */
export interface ReportFilter {
  archived: boolean;
  room_id?: number;
  machine_id?: string;
  reporter_username?: string;
}
