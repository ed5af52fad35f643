import { v4 as uuid } from 'uuid';
import type { User } from '@repo-sync/core';
import type { DatabaseType } from '../connection';

interface UserRow {
  id: string;
  username: string;
}

export class UserRepository {
  constructor(private readonly db: DatabaseType) {}

  create(username: string): User {
    const user: User = { id: uuid(), username };
    this.db
      .prepare<[string, string]>('INSERT INTO users (id, username) VALUES (?, ?)')
      .run(user.id, user.username);
    return user;
  }

  findById(id: string): User | undefined {
    return this.db
      .prepare<[string], UserRow>('SELECT id, username FROM users WHERE id = ?')
      .get(id);
  }

  findByUsername(username: string): User | undefined {
    return this.db
      .prepare<[string], UserRow>('SELECT id, username FROM users WHERE username = ?')
      .get(username);
  }
}
