/**
 * User Store
 */

import type { DatabaseManager } from './sqlite.js';
import type { User, UserSubmission } from '../types/index.js';

interface UserRecord {
  username: string;
  admin: number;
}

function toUser(row: UserRecord): User {
  return { username: row.username, admin: Boolean(row.admin) };
}

export class UserStore {
  constructor(private readonly db: DatabaseManager) {}

  exists(username: string): boolean {
    return this.db.get<{ username: string }>(
      'SELECT username FROM "user" WHERE username = ?',
      username
    ) !== undefined;
  }

  list(): User[] {
    return this.db.all<UserRecord>('SELECT username, admin FROM "user" ORDER BY username').map(toUser);
  }

  get(username: string): User | null {
    const row = this.db.get<UserRecord>('SELECT username, admin FROM "user" WHERE username = ?', username);
    return row ? toUser(row) : null;
  }

  create(submission: UserSubmission): User {
    const row = this.db.get<UserRecord>(
      'INSERT INTO "user" (username, admin) VALUES (?, ?) RETURNING username, admin',
      submission.username,
      submission.admin ? 1 : 0
    );
    if (!row) {
      throw new Error('INSERT INTO user returned no row');
    }
    return toUser(row);
  }

  /**
   * Delete a user and return it; reports they filed are removed with them
   */
  delete(username: string): User | null {
    const row = this.db.get<UserRecord>(
      'DELETE FROM "user" WHERE username = ? RETURNING username, admin',
      username
    );
    return row ? toUser(row) : null;
  }
}
