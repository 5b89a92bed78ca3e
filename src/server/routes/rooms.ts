/**
 * Room endpoints, mounted at /room
 */

import { Router } from 'express';
import type { Stores } from '../../storage/index.js';
import { created, notFound, ok, respond } from '../responses.js';
import { parseIdParam, roomSubmissionSchema } from '../schemas.js';

export function createRoomRouter({ db, rooms, machines, reports }: Stores): Router {
  const router = Router();

  const requireRoom = (roomId: number): void => {
    if (!rooms.exists(roomId)) {
      throw notFound(`Room id ${roomId} was not found.`);
    }
  };

  // List all rooms
  router.get('/', respond(() => ok(rooms.list())));

  // Get a room
  router.get('/:roomId', respond((req) => {
    const roomId = parseIdParam(req.params.roomId, 'room id');
    const room = rooms.get(roomId);
    if (!room) {
      throw notFound(`The room id ${roomId} was not found.`);
    }
    return ok(room);
  }));

  // Create a room (names are not unique)
  router.post('/', respond((req) => {
    const submission = roomSubmissionSchema.parse(req.body);
    return created(rooms.create(submission));
  }));

  // Delete a room along with its machines and reports
  router.delete('/:roomId', respond((req) => {
    const roomId = parseIdParam(req.params.roomId, 'room id');
    const room = db.transaction(() => {
      requireRoom(roomId);
      return rooms.delete(roomId);
    });
    if (!room) {
      throw notFound(`Room id ${roomId} was not found.`);
    }
    return ok(room);
  }));

  // Machines in a room
  router.get('/:roomId/machines', respond((req) => {
    const roomId = parseIdParam(req.params.roomId, 'room id');
    requireRoom(roomId);
    return ok(machines.listByRoom(roomId));
  }));

  // Unarchived reports for a room
  router.get('/:roomId/reports', respond((req) => {
    const roomId = parseIdParam(req.params.roomId, 'room id');
    requireRoom(roomId);
    return ok(reports.list({ archived: false, room_id: roomId }));
  }));

  // Archived reports for a room
  router.get('/:roomId/reports/archived', respond((req) => {
    const roomId = parseIdParam(req.params.roomId, 'room id');
    requireRoom(roomId);
    return ok(reports.list({ archived: true, room_id: roomId }));
  }));

  return router;
}
