/**
 * Shared helpers for route and middleware tests
 */

import { vi } from 'vitest';
import { z } from 'zod';
import type { QueryExecutor } from './db/adapters/types.js';

const envelopeSchema = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
  error: z
    .object({
      code: z.string(),
      message: z.string(),
      details: z.record(z.string(), z.unknown()).optional(),
    })
    .optional(),
  meta: z.object({ requestId: z.string(), timestamp: z.string() }).optional(),
});

export type TestEnvelope = z.infer<typeof envelopeSchema>;

/**
 * Parse a response body as the standard API envelope.
 */
export async function readEnvelope(res: Response): Promise<TestEnvelope> {
  return envelopeSchema.parse(await res.json());
}

export const ADMIN_KEY = 'test-admin-key';

export function adminHeaders(extra: Record<string, string> = {}): Record<string, string> {
  return { 'X-Admin-Key': ADMIN_KEY, ...extra };
}

export function jsonRequest(method: string, body: unknown): RequestInit {
  return {
    method,
    headers: adminHeaders({ 'Content-Type': 'application/json' }),
    body: JSON.stringify(body),
  };
}

/**
 * Adapter stand-in whose methods are plain mocks. `transaction` runs the
 * callback against the same mocks.
 */
export function createMockAdapter() {
  const adapter = {
    type: 'postgres' as const,
    isConnected: vi.fn(() => true),
    query: vi.fn().mockResolvedValue([]),
    queryOne: vi.fn().mockResolvedValue(null),
    execute: vi.fn().mockResolvedValue({ changes: 0 }),
    run: vi.fn(),
    transaction: vi.fn(),
    close: vi.fn().mockResolvedValue(undefined),
  };
  adapter.transaction.mockImplementation((fn: (tx: QueryExecutor) => Promise<unknown>) => fn(adapter));
  return adapter;
}

export type MockAdapter = ReturnType<typeof createMockAdapter>;
