/**
 * tapdeck — MCP Analyze Tool
 *
 * Actions: transaction (analyze one, persist findings), session (recent traffic overview)
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { AppContext } from '../../context.js';
import { errorResult, jsonResult } from '../format.js';

export function registerAnalyzeTool(server: McpServer, ctx: AppContext): void {
  server.tool(
    'analyze',
    'Run heuristic security/performance analysis. Actions: transaction, session',
    {
      action: z.enum(['transaction', 'session']),
      id: z.number().int().optional().describe('Transaction id (transaction)'),
      limit: z
        .number()
        .int()
        .positive()
        .optional()
        .describe('Most recent transactions to analyze (session, default 100)'),
    },
    async ({ action, id, limit }) => {
      try {
        if (action === 'transaction') {
          if (id === undefined) {
            return errorResult('id parameter required for transaction');
          }
          return jsonResult({ transactionId: id, ...ctx.analyzer.analyzeAndRecord(id) });
        }
        return jsonResult(ctx.analyzer.analyzeSession(limit ?? 100));
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
