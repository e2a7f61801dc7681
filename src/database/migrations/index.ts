import { database, Queryable } from '../connection';
import { logger } from '../../utils/logger';
import { createUsersTable } from './scripts/001_create_users_table';
import { createEmployeeProfilesTable } from './scripts/002_create_employee_profiles_table';
import { createLeaveRequestsTable } from './scripts/003_create_leave_requests_table';
import { createAttendanceTable } from './scripts/004_create_attendance_table';
import { createProjectsTables } from './scripts/005_create_projects_tables';

export interface Migration {
  id: string;
  name: string;
  up: (client: Queryable) => Promise<void>;
  down: (client: Queryable) => Promise<void>;
}

const MIGRATIONS: readonly Migration[] = [
  createUsersTable,
  createEmployeeProfilesTable,
  createLeaveRequestsTable,
  createAttendanceTable,
  createProjectsTables
];

export class MigrationRunner {
  constructor(private readonly migrations: readonly Migration[] = MIGRATIONS) {}

  private async initializeMigrationsTable(): Promise<void> {
    await database.query(`
      CREATE TABLE IF NOT EXISTS migrations (
        id VARCHAR(255) PRIMARY KEY,
        name VARCHAR(255) NOT NULL,
        executed_at TIMESTAMP WITH TIME ZONE DEFAULT CURRENT_TIMESTAMP
      );
    `);
  }

  private async getExecutedMigrations(): Promise<string[]> {
    const result = await database.query<{ id: string }>('SELECT id FROM migrations ORDER BY id');
    return result.rows.map(row => row.id);
  }

  private sorted(): Migration[] {
    return [...this.migrations].sort((a, b) => a.id.localeCompare(b.id));
  }

  /**
   * Run pending migrations, each in its own transaction
   */
  public async runMigrations(): Promise<void> {
    await this.initializeMigrationsTable();
    const executed = await this.getExecutedMigrations();
    const pending = this.sorted().filter(migration => !executed.includes(migration.id));

    if (pending.length === 0) {
      logger.info('No pending migrations');
      return;
    }

    logger.info(`Running ${pending.length} pending migrations`);

    for (const migration of pending) {
      logger.info(`Running migration: ${migration.id} - ${migration.name}`);
      await database.transaction(async (client) => {
        await migration.up(client);
        await client.query('INSERT INTO migrations (id, name) VALUES ($1, $2)', [migration.id, migration.name]);
      });
      logger.info(`Completed migration: ${migration.id}`);
    }

    logger.info('All migrations completed successfully');
  }

  /**
   * Roll back the most recently executed migration
   */
  public async rollbackLastMigration(): Promise<void> {
    await this.initializeMigrationsTable();
    const executed = await this.getExecutedMigrations();

    const lastId = executed[executed.length - 1];
    if (lastId === undefined) {
      logger.info('No migrations to rollback');
      return;
    }

    const migration = this.migrations.find(m => m.id === lastId);
    if (!migration) {
      throw new Error(`Migration ${lastId} not found`);
    }

    logger.info(`Rolling back migration: ${migration.id} - ${migration.name}`);
    await database.transaction(async (client) => {
      await migration.down(client);
      await client.query('DELETE FROM migrations WHERE id = $1', [migration.id]);
    });
    logger.info(`Rollback completed: ${migration.id}`);
  }

  public async getMigrationStatus(): Promise<{ executed: string[]; pending: string[] }> {
    await this.initializeMigrationsTable();
    const executed = await this.getExecutedMigrations();
    const pending = this.sorted()
      .map(migration => migration.id)
      .filter(id => !executed.includes(id));

    return { executed, pending };
  }
}

export const migrationRunner = new MigrationRunner();
