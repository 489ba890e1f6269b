import { z } from 'zod';
import { JSONRPCError, ProtocolError } from './errors.js';
import type { JSONRPCParams, JSONRPCRequest, JSONRPCResponse, ResponseDecoder } from './types.js';

const envelopeSchema = z
  .object({
    jsonrpc: z.literal('2.0').optional(),
    id: z.union([z.string(), z.number(), z.null()]),
  })
  .passthrough();

const errorSchema = z
  .object({
    code: z.number().optional(),
    message: z.string(),
    data: z
      .object({
        name: z.string().optional(),
        message: z.string().optional(),
        debug: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

/**
 * Random request identifier, only meant to correlate requests and responses in logs
 */
export function createRequestId(): number {
  return Math.floor(Math.random() * 1_000_000_000);
}

/**
 * Build the envelope of a call with keyword arguments
 */
export function encodeRequest(params: JSONRPCParams = {}): JSONRPCRequest {
  return {
    jsonrpc: '2.0',
    method: 'call',
    params,
    id: createRequestId(),
  };
}

/**
 * Parse a JSON-RPC response body
 *
 * Returns the success envelope as sent by the server, `id` and `jsonrpc` included.
 *
 * @throws {JSONRPCError} when the envelope carries an `error`
 * @throws {ProtocolError} when the body is not a JSON-RPC response
 */
export function decodeResponse(body: string, status = 200): JSONRPCResponse {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (error) {
    throw new ProtocolError(`Response is not valid JSON (HTTP ${status})`, status, body, {
      cause: error,
    });
  }

  const envelope = envelopeSchema.safeParse(payload);
  if (!envelope.success) {
    const issue = envelope.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at '${issue.path.join('.')}'` : '';
    throw new ProtocolError(
      `Malformed JSON-RPC response${where}: ${issue?.message ?? 'invalid envelope'}`,
      status,
      body
    );
  }

  const data = envelope.data;
  const hasResult = 'result' in data;
  const hasError = 'error' in data;
  if (hasResult && hasError) {
    throw new ProtocolError('JSON-RPC response has both a result and an error', status, body);
  }
  if (!hasResult && !hasError) {
    throw new ProtocolError('JSON-RPC response has neither a result nor an error', status, body);
  }

  if (hasError) {
    const fault = errorSchema.safeParse(data.error);
    if (!fault.success) {
      throw new ProtocolError('Malformed JSON-RPC error object', status, body);
    }
    throw new JSONRPCError(fault.data);
  }

  return { ...data, result: data.result };
}

/**
 * Leaves the body as raw encoded text, to be decoded later with {@link decodeResponse}
 */
export const rawResponse: ResponseDecoder<string> = (body) => body;
