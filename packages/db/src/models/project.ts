import { v4 as uuid } from 'uuid';
import type { Project, User } from '@repo-sync/core';
import type { DatabaseType } from '../connection';

interface ProjectRow {
  id: string;
  slug: string;
  repo: string;
}

export class ProjectRepository {
  constructor(private readonly db: DatabaseType) {}

  create(slug: string, repo: string): Project {
    const id = uuid();
    this.db
      .prepare<[string, string, string]>('INSERT INTO projects (id, slug, repo) VALUES (?, ?, ?)')
      .run(id, slug, repo);
    return { id, slug, repo, users: [] };
  }

  addUser(projectId: string, userId: string): void {
    this.db
      .prepare<[string, string]>('INSERT OR IGNORE INTO project_users (project_id, user_id) VALUES (?, ?)')
      .run(projectId, userId);
  }

  /**
   * Load a project with its users, in the order they were added.
   */
  findById(id: string): Project | undefined {
    const row = this.db
      .prepare<[string], ProjectRow>('SELECT id, slug, repo FROM projects WHERE id = ?')
      .get(id);
    if (!row) return undefined;

    const users = this.db
      .prepare<[string], User>(`
        SELECT u.id, u.username
        FROM project_users pu
        JOIN users u ON u.id = pu.user_id
        WHERE pu.project_id = ?
        ORDER BY pu.rowid
      `)
      .all(id);

    return { ...row, users };
  }
}
