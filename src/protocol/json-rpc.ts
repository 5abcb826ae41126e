/**
 * JSON-RPC 2.0 payload shapes carried inside envelope payloads.
 */

import { z } from 'zod';

const idSchema = z.union([z.number(), z.string()]);

export const jsonRpcErrorSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const jsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: idSchema,
  method: z.string().min(1),
  params: z.unknown().optional(),
});

export const jsonRpcResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: idSchema,
  result: z.unknown().optional(),
  error: jsonRpcErrorSchema.optional(),
});

export type JsonRpcError = z.infer<typeof jsonRpcErrorSchema>;
export type JsonRpcRequest = z.infer<typeof jsonRpcRequestSchema>;
export type JsonRpcResponse = z.infer<typeof jsonRpcResponseSchema>;

export interface JsonRpcRequestEvent<T extends JsonRpcRequest = JsonRpcRequest> {
  topic: string;
  request: T;
}

export interface JsonRpcResponseEvent<T extends JsonRpcResponse = JsonRpcResponse> {
  topic: string;
  response: T;
}
