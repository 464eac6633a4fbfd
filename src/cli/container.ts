// Lazily built container for CLI commands
// Singleton so a command that touches several services opens the database once

import { env } from '../infra/env';
import { logger } from '../infra/logger';
import { buildContainer, type AppContainer } from '../infra/container';

export type CliContainer = AppContainer & { disconnect: () => Promise<void> };

// Operation logs stay quiet at the terminal unless LOG_LEVEL asks for them
export const cliLogger = logger.child({ surface: 'cli' }, { level: env.LOG_LEVEL ?? 'warn' });

let container: CliContainer | null = null;

export async function getCliContainer(): Promise<CliContainer> {
  if (container) {
    return container;
  }

  const app = buildContainer({
    databasePath: env.DATABASE_PATH,
    policyPath: env.POLICY_PATH,
    logger: cliLogger,
  });

  // disconnect closes the database and resets the singleton
  const disconnect = async (): Promise<void> => {
    app.close();
    container = null;
  };

  container = { ...app, disconnect };
  return container;
}
