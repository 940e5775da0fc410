/**
 * tapdeck — Application context
 *
 * 一つの Database ハンドルから各コンポーネントを組み立てる。
 * CLI と MCP サーバーが共有する。
 */

import type Database from 'better-sqlite3';
import { defaultConfig, type AppConfig } from './config/index.js';
import { TransactionRepository } from './db/repository/transaction-repository.js';
import { FindingRepository } from './db/repository/finding-repository.js';
import { QueryEngine } from './engine/query.js';
import { Analyzer } from './engine/analyzer.js';
import { getLogger, type Logger } from './utils/logger.js';

export interface AppContext {
  db: Database.Database;
  config: AppConfig;
  logger: Logger;
  transactions: TransactionRepository;
  findings: FindingRepository;
  query: QueryEngine;
  analyzer: Analyzer;
}

export function createContext(
  db: Database.Database,
  config: AppConfig = defaultConfig(),
  logger: Logger = getLogger(),
): AppContext {
  const transactions = new TransactionRepository(db, {
    maxBodyBytes: config.capture.maxBodyBytes,
  });
  const findings = new FindingRepository(db);
  const query = new QueryEngine(db, { scope: { suffixes: config.scope.hosts } });
  const analyzer = new Analyzer({
    query,
    transactions,
    findings,
    options: config.analyzer,
    logger,
  });
  return { db, config, logger, transactions, findings, query, analyzer };
}
