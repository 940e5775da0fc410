import Database from 'better-sqlite3';
import pino from 'pino';
import { migrateDatabase } from '../src/db/migrate.js';
import type { CreateTransactionInput } from '../src/types/repository.js';
import type { Transaction } from '../src/types/entities.js';

// ---------------------------------------------------------------------------
// テスト共通フィクスチャ
// ---------------------------------------------------------------------------

export const silentLogger = pino({ level: 'silent' });

/** In-memory store with the latest schema. */
export function memoryDb(): InstanceType<typeof Database> {
  const db = new Database(':memory:');
  migrateDatabase(db);
  return db;
}

/**
 * A transaction that trips no analyzer rule: https, versioned API path,
 * security/caching/compression headers present, fast, JSON response.
 */
export function cleanInput(overrides: Partial<CreateTransactionInput> = {}): CreateTransactionInput {
  return {
    timestamp: 1_700_000_000,
    method: 'GET',
    url: 'https://api.example.com/api/v1/items',
    host: 'api.example.com',
    path: '/api/v1/items',
    protocol: 'https',
    requestHeaders: { Accept: 'application/json' },
    requestBody: '',
    responseStatus: 200,
    responseHeaders: {
      'Content-Type': 'application/json',
      'Strict-Transport-Security': 'max-age=31536000',
      'X-Content-Type-Options': 'nosniff',
      'X-Frame-Options': 'DENY',
      'Cache-Control': 'max-age=60',
      'Content-Encoding': 'gzip',
    },
    responseBody: '{"items":[]}',
    duration: 0.05,
    ...overrides,
  };
}

/** `cleanInput` as a stored entity, for rule tests that need no database. */
export function cleanTransaction(overrides: Partial<Transaction> = {}): Transaction {
  return {
    id: 1,
    timestamp: 1_700_000_000,
    method: 'GET',
    url: 'https://api.example.com/api/v1/items',
    host: 'api.example.com',
    path: '/api/v1/items',
    protocol: 'https',
    requestHeaders: { Accept: 'application/json' },
    requestBody: '',
    responseStatus: 200,
    responseHeaders: {
      'Content-Type': 'application/json',
      'Strict-Transport-Security': 'max-age=31536000',
      'X-Content-Type-Options': 'nosniff',
      'X-Frame-Options': 'DENY',
      'Cache-Control': 'max-age=60',
      'Content-Encoding': 'gzip',
    },
    responseBody: '{"items":[]}',
    duration: 0.05,
    analyzed: false,
    notes: null,
    ...overrides,
  };
}
