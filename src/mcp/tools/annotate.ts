/**
 * tapdeck — MCP Annotate Tool
 *
 * トランザクションの可変フィールド（notes, analyzed）のみを更新する。
 *
 * Actions: set_notes, mark_analyzed
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { AppContext } from '../../context.js';
import { errorResult, jsonResult } from '../format.js';

export function registerAnnotateTool(server: McpServer, ctx: AppContext): void {
  server.tool(
    'annotate',
    'Annotate a captured transaction. Actions: set_notes, mark_analyzed',
    {
      action: z.enum(['set_notes', 'mark_analyzed']),
      id: z.number().int().describe('Transaction id'),
      notes: z.string().nullable().optional().describe('Note text; null clears (set_notes)'),
    },
    async ({ action, id, notes }) => {
      try {
        // スコープ外の id は NotFoundError
        ctx.query.get(id);
        if (action === 'set_notes') {
          ctx.transactions.updateNotes(id, notes ?? null);
        } else {
          ctx.transactions.markAnalyzed(id);
        }
        const tx = ctx.transactions.get(id);
        return jsonResult({ id, analyzed: tx.analyzed, notes: tx.notes });
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
