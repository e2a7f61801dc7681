import { database } from '../database/connection';
import { migrationRunner } from '../database/migrations';
import { logger } from '../utils/logger';

type Command = 'up' | 'down' | 'status';

const COMMANDS: Record<string, Command> = {
  up: 'up',
  migrate: 'up',
  down: 'down',
  rollback: 'down',
  status: 'status'
};

async function execute(command: Command): Promise<void> {
  switch (command) {
    case 'up':
      logger.info('Starting database migration...');
      await migrationRunner.runMigrations();
      return;

    case 'down':
      logger.info('Starting migration rollback...');
      await migrationRunner.rollbackLastMigration();
      return;

    case 'status': {
      const status = await migrationRunner.getMigrationStatus();
      logger.info('Migration status', {
        executed: status.executed,
        pending: status.pending
      });
      return;
    }
  }
}

async function main(): Promise<number> {
  const command = COMMANDS[process.argv[2] ?? ''];
  if (!command) {
    logger.error('Usage: migrate [up|down|status]');
    return 1;
  }

  try {
    await database.connect();
    await execute(command);
    return 0;
  } catch (error) {
    logger.error('Migration command failed', {
      command,
      error: error instanceof Error ? error.message : String(error)
    });
    return 1;
  } finally {
    await database.disconnect();
  }
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    logger.error('Unexpected migration failure', { error: String(error) });
    process.exit(1);
  }
);
