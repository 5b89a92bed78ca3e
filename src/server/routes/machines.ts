/**
 * Machine endpoints, mounted at /machine
 *
 * A machine is addressed by its room and its id within that room:
 * /machine/{room_id}/{machine_id}
 */

import { Router, type Request } from 'express';
import type { Stores } from '../../storage/index.js';
import { badRequest, conflict, created, notFound, ok, respond } from '../responses.js';
import { machineSubmissionSchema, parseIdParam } from '../schemas.js';

interface MachineKey {
  roomId: number;
  machineId: string;
}

function parseMachineKey(req: Request): MachineKey {
  return {
    roomId: parseIdParam(req.params.roomId, 'room id'),
    machineId: req.params.machineId,
  };
}

const missingMachine = ({ roomId, machineId }: MachineKey): string =>
  `Machine id ${machineId} was not found in room id ${roomId}.`;

export function createMachineRouter({ db, rooms, machines, reports }: Stores): Router {
  const router = Router();

  const requireMachine = (key: MachineKey): void => {
    if (!machines.exists(key.roomId, key.machineId)) {
      throw notFound(missingMachine(key));
    }
  };

  // List all machines
  router.get('/', respond(() => ok(machines.list())));

  // Get a machine
  router.get('/:roomId/:machineId', respond((req) => {
    const key = parseMachineKey(req);
    const machine = machines.get(key.roomId, key.machineId);
    if (!machine) {
      throw notFound(missingMachine(key));
    }
    return ok(machine);
  }));

  // Create a machine in an existing room
  router.post('/', respond((req) => {
    const submission = machineSubmissionSchema.parse(req.body);

    const machine = db.transaction(() => {
      if (!rooms.exists(submission.room_id)) {
        throw badRequest(`The room id ${submission.room_id} was not found.`);
      }
      if (machines.exists(submission.room_id, submission.machine_id)) {
        throw conflict(
          `Machine id ${submission.machine_id} already exists in room id ${submission.room_id}.`
        );
      }
      return machines.create(submission);
    });

    return created(machine);
  }));

  // Delete a machine and its reports
  router.delete('/:roomId/:machineId', respond((req) => {
    const key = parseMachineKey(req);
    const machine = db.transaction(() => {
      requireMachine(key);
      return machines.delete(key.roomId, key.machineId);
    });
    if (!machine) {
      throw notFound(missingMachine(key));
    }
    return ok(machine);
  }));

  // Unarchived reports for a machine
  router.get('/:roomId/:machineId/reports', respond((req) => {
    const key = parseMachineKey(req);
    requireMachine(key);
    return ok(reports.list({ archived: false, room_id: key.roomId, machine_id: key.machineId }));
  }));

  // Archived reports for a machine
  router.get('/:roomId/:machineId/reports/archived', respond((req) => {
    const key = parseMachineKey(req);
    requireMachine(key);
    return ok(reports.list({ archived: true, room_id: key.roomId, machine_id: key.machineId }));
  }));

  return router;
}
