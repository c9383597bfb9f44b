/**
 * JSON-RPC wire types for the control plane
 */

export const PARSE_ERROR = -32700;
export const INVALID_REQUEST = -32600;
export const METHOD_NOT_FOUND = -32601;
export const INVALID_PARAMS = -32602;
export const INTERNAL_ERROR = -32603;

export type RpcId = string | number | null;

export interface RpcRequest {
  jsonrpc: "2.0";
  id: RpcId;
  method: string;
  params: Record<string, unknown>;
}

export type RpcResponse =
  | { jsonrpc: "2.0"; id: RpcId; result: unknown }
  | { jsonrpc: "2.0"; id: RpcId; error: { code: number; message: string } };

/** process_query result as the host reads it */
export interface QueryResultWire {
  content: string;
  error?: true;
  created_files?: string[];
  usage: {
    iterations: number;
    tool_calls: number;
    input_tokens: number;
    output_tokens: number;
  };
}
