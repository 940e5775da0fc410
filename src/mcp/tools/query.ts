/**
 * tapdeck — MCP Query Tool
 *
 * 読み取り専用の 'query' ツール。action パラメータで動作を切り替える。
 * 全ての読み取りは QueryEngine を経由し、スコープ制限が適用される。
 *
 * Actions: list, get, search, stats
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { AppContext } from '../../context.js';
import { errorResult, jsonResult, summarizeTransaction } from '../format.js';

export function registerQueryTool(server: McpServer, ctx: AppContext): void {
  server.tool(
    'query',
    'Query captured HTTP traffic. Actions: list, get, search, stats',
    {
      action: z.enum(['list', 'get', 'search', 'stats']),
      // get
      id: z.number().int().optional().describe('Transaction id'),
      // list / stats filters
      method: z.string().optional().describe('HTTP method filter'),
      host: z.string().optional().describe('Host filter (matches the host and its subdomains)'),
      status: z.number().int().optional().describe('Response status filter'),
      // search
      text: z.string().optional().describe('Substring searched in URLs, headers and bodies'),
      limit: z.number().int().positive().optional().describe('Maximum rows (default 50)'),
    },
    async ({ action, id, method, host, status, text, limit }) => {
      try {
        switch (action) {
          case 'list': {
            const rows = ctx.query.all({ method, hostSuffix: host, status, limit: limit ?? 50 });
            return jsonResult(rows.map(summarizeTransaction));
          }
          case 'get': {
            if (id === undefined) {
              return errorResult('id parameter required for get');
            }
            const tx = ctx.query.get(id);
            return jsonResult({ ...tx, findings: ctx.findings.findByTransactionId(id) });
          }
          case 'search': {
            if (!text) {
              return errorResult('text parameter required for search');
            }
            const rows = ctx.query.all({ text, method, hostSuffix: host, limit: limit ?? 50 });
            return jsonResult(rows.map(summarizeTransaction));
          }
          case 'stats':
            return jsonResult(ctx.query.aggregate({ method, hostSuffix: host, status }));
        }
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
