import fs from 'fs';
import path from 'path';
import { LendingOrchestrator } from '../core/application/orchestrator/LendingOrchestrator';
import { AccountService } from '../core/application/accounts/AccountService';
import type { Logger } from '../core/ports';
import { logger as appLogger } from './logger';
import { PolicySchema, type PolicyConfig } from './config/policySchema';
import { openDatabase, type SqliteDatabase } from './db/sqlite';
import { ConfigImpl } from './services/Config';
import { CatalogSeeder } from './services/catalogSeeder';
import { SqliteCatalogRepository } from './services/sqliteCatalogRepository';
import { SqliteUserRepository } from './services/sqliteUserRepository';
import { SqliteWaitlistRepository } from './services/sqliteWaitlistRepository';
import { SqliteTransactionLog } from './services/sqliteTransactionLog';

export interface ContainerOptions {
  databasePath: string;
  policyPath: string;
  logger?: Logger;
}

export interface AppContainer {
  db: SqliteDatabase;
  config: ConfigImpl;
  orchestrator: LendingOrchestrator;
  accounts: AccountService;
  seeder: CatalogSeeder;
  catalog: SqliteCatalogRepository;
  users: SqliteUserRepository;
  waitlist: SqliteWaitlistRepository;
  transactions: SqliteTransactionLog;
  close: () => void;
}

// Wire stores, config and services together
// The orchestrator only ever sees the port interfaces
export function buildContainer(options: ContainerOptions): AppContainer {
  const log = options.logger ?? appLogger;
  const config = new ConfigImpl(loadPolicyConfig(options.policyPath));
  const db = openDatabase(options.databasePath);

  const catalog = new SqliteCatalogRepository(db);
  const users = new SqliteUserRepository(db);
  const waitlist = new SqliteWaitlistRepository(db);
  const transactions = new SqliteTransactionLog(db);

  const orchestrator = new LendingOrchestrator(users, catalog, waitlist, transactions, config, log);
  const accounts = new AccountService(users, log);
  const seeder = new CatalogSeeder(catalog, log);

  const close = (): void => {
    db.close();
  };

  return { db, config, orchestrator, accounts, seeder, catalog, users, waitlist, transactions, close };
}

export function loadPolicyConfig(policyPath: string): PolicyConfig {
  const resolved = path.resolve(process.cwd(), policyPath);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (error) {
    throw new Error(`Failed to read configuration file at ${resolved}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return PolicySchema.parse(raw);
}
