/**
 * tapdeck — Traffic intelligence and replay engine
 *
 * MCP Server エントリポイント。
 * stdio トランスポートで LLM Agent と接続する。stdout はトランスポート専用、
 * ログは stderr に出力する。
 */

import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config/index.js';
import { openDatabase } from './db/connection.js';
import { createContext } from './context.js';
import { createMcpServer } from './mcp/server.js';
import { createLogger, setLogger } from './utils/logger.js';

const config = loadConfig(process.env['TAPDECK_CONFIG'] ?? 'tapdeck.config.json');
const logger = createLogger(config.logging);
setLogger(logger);

const db = openDatabase(config.database.path);
const server = createMcpServer(createContext(db, config, logger));
const transport = new StdioServerTransport();
await server.connect(transport);
logger.info({ db: config.database.path }, 'MCP server listening on stdio');
