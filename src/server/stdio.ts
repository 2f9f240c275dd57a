import stringify from 'fast-json-stable-stringify';
import { z } from 'zod';
import { err, type RpcHandler, type RpcId } from './rpc-handler.js';

const RpcIdSchema = z.union([z.string(), z.number(), z.null()]);

const RequestSchema = z.object({
  jsonrpc: z.literal('2.0').optional(),
  id: RpcIdSchema.optional(),
  method: z.string().min(1),
  params: z.unknown().optional(),
});

function recoverId(msg: unknown): RpcId {
  const result = z.object({ id: RpcIdSchema }).safeParse(msg);
  return result.success ? result.data.id : null;
}

/**
 * Turns one line of input into at most one line of output.
 * Requests without an `id` are notifications: they run but produce no output.
 */
export function createLineProcessor(handleRPC: RpcHandler): (line: string) => string | null {
  return (line) => {
    if (line.trim().length === 0) {
      return null;
    }

    let msg: unknown;
    try {
      msg = JSON.parse(line);
    } catch {
      return stringify(err(-32700, 'parse_error', null));
    }

    const request = RequestSchema.safeParse(msg);
    if (!request.success) {
      return stringify(err(-32600, 'invalid_request', recoverId(msg)));
    }

    const { id, method, params } = request.data;
    const response = handleRPC(method, params, id ?? null);
    return id === undefined ? null : stringify(response);
  };
}
