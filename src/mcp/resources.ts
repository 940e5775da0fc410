/**
 * tapdeck — MCP Resources
 *
 * Read-only resources for browsing captured traffic.
 */

import { ResourceTemplate, type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../context.js';
import { summarizeTransaction } from './format.js';

const RECENT_LIMIT = 50;

function jsonContents(uri: string, value: unknown) {
  return {
    contents: [{ uri, mimeType: 'application/json', text: JSON.stringify(value, null, 2) }],
  };
}

export function registerResources(server: McpServer, ctx: AppContext): void {
  // 1. tapdeck://transactions — 直近のトランザクション一覧
  server.resource(
    'transactions',
    'tapdeck://transactions',
    { description: `The ${RECENT_LIMIT} most recent captured transactions (no bodies)` },
    async (uri) =>
      jsonContents(uri.href, ctx.query.all({ limit: RECENT_LIMIT }).map(summarizeTransaction)),
  );

  // 2. tapdeck://transactions/{id} — 詳細と保存済み Finding
  server.resource(
    'transaction-detail',
    new ResourceTemplate('tapdeck://transactions/{id}', { list: undefined }),
    { description: 'One captured transaction with its stored findings' },
    async (uri, variables) => {
      const raw = variables['id'];
      const id = Number(Array.isArray(raw) ? raw[0] : raw);
      try {
        const tx = ctx.query.get(id);
        return jsonContents(uri.href, { ...tx, findings: ctx.findings.findByTransactionId(id) });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return jsonContents(uri.href, { error: message });
      }
    },
  );

  // 3. tapdeck://summary — 統計サマリ
  server.resource(
    'summary',
    'tapdeck://summary',
    { description: 'Traffic statistics and stored finding counts' },
    async () =>
      jsonContents('tapdeck://summary', {
        stats: ctx.query.aggregate(),
        findings: ctx.findings.countBySeverity(),
      }),
  );
}
