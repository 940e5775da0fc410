/**
 * tapdeck - Repository input type definitions
 *
 * Create types strip auto-generated columns (id) and make defaulted
 * columns optional. The Zod schema is the single validator for appends.
 */

import { z } from 'zod';
import { PROTOCOLS } from './entities.js';
import type { Transaction } from './entities.js';

// ============================================================
// Create input types
// ============================================================

const HeaderMapSchema = z.record(z.string(), z.string());

export const CreateTransactionInputSchema = z
  .object({
    timestamp: z.number().finite().nonnegative(),
    method: z.string().trim().min(1, 'method is required'),
    url: z.string().trim().min(1, 'url is required'),
    host: z.string().trim().min(1, 'host is required'),
    path: z.string(),
    protocol: z.enum(PROTOCOLS),
    requestHeaders: HeaderMapSchema.default({}),
    requestBody: z.string().default(''),
    responseStatus: z.number().int().min(0).max(999).nullable().default(null),
    responseHeaders: HeaderMapSchema.nullable().default(null),
    responseBody: z.string().nullable().default(null),
    duration: z.number().finite().nonnegative().default(0),
    analyzed: z.boolean().default(false),
    notes: z.string().nullable().default(null),
  })
  .strict()
  .superRefine((input, ctx) => {
    if (input.responseStatus !== null) {
      return;
    }
    if (input.responseHeaders !== null && Object.keys(input.responseHeaders).length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['responseHeaders'],
        message: 'response headers present without a response status',
      });
    }
    if (input.responseBody !== null && input.responseBody.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['responseBody'],
        message: 'response body present without a response status',
      });
    }
  });

/** Input for appending a new Transaction. Defaulted fields may be omitted. */
export type CreateTransactionInput = z.input<typeof CreateTransactionInputSchema>;

/** A validated input with every default applied. */
export type ValidTransactionInput = Omit<Transaction, 'id'>;
