/**
 * User endpoints, mounted at /user
 */

import { Router } from 'express';
import type { Stores } from '../../storage/index.js';
import { conflict, created, notFound, ok, respond } from '../responses.js';
import { userSubmissionSchema } from '../schemas.js';

export function createUserRouter({ db, users, reports }: Stores): Router {
  const router = Router();

  const requireUser = (username: string): void => {
    if (!users.exists(username)) {
      throw notFound(`The user ${username} was not found.`);
    }
  };

  router.get('/', respond(() => ok(users.list())));

  router.get('/:username', respond((req) => {
    const { username } = req.params;
    const user = users.get(username);
    if (!user) {
      throw notFound(`The user ${username} was not found.`);
    }
    return ok(user);
  }));

  // Usernames are unique; a taken name is a conflict and leaves the existing user untouched
  router.post('/', respond((req) => {
    const submission = userSubmissionSchema.parse(req.body);
    const user = db.transaction(() => {
      if (users.exists(submission.username)) {
        throw conflict(`${submission.username} is already a user.`);
      }
      return users.create(submission);
    });
    return created(user);
  }));

  router.delete('/:username', respond((req) => {
    const { username } = req.params;
    const user = db.transaction(() => {
      requireUser(username);
      return users.delete(username);
    });
    if (!user) {
      throw notFound(`The user ${username} was not found.`);
    }
    return ok(user);
  }));

  router.get('/:username/reports', respond((req) => {
    const { username } = req.params;
    requireUser(username);
    return ok(reports.list({ archived: false, reporter_username: username }));
  }));

  router.get('/:username/reports/archived', respond((req) => {
    const { username } = req.params;
    requireUser(username);
    return ok(reports.list({ archived: true, reporter_username: username }));
  }));

  return router;
}
