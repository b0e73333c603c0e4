/**
 * Type definitions for the SQL gatekeeper MCP server
 * Connection policies, query classification and result shapes
 */

// ============================================================================
// Connection Configuration Types
// ============================================================================

export interface ConnectionPolicy {
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly password: string;
  readonly database: string;
  readonly readOnly: boolean;
  readonly maxRows: number;
}

export type ConnectionRegistry = ReadonlyMap<string, ConnectionPolicy>;

export interface ConnectionSummary {
  name: string;
  read_only: boolean;
}

// ============================================================================
// Query Classification Types
// ============================================================================

export const QUERY_TYPES = [
  'SELECT',
  'INSERT',
  'UPDATE',
  'DELETE',
  'ALTER',
  'SHOW',
  'DESCRIBE',
  'EXPLAIN',
  'DROP',
  'TRUNCATE',
  'CREATE',
  'GRANT',
  'REVOKE',
  'SET',
  'USE',
  'UNKNOWN',
] as const;

export type QueryType = (typeof QUERY_TYPES)[number];

// ============================================================================
// Query Execution Types
// ============================================================================

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * A single column value after normalization. Raw bytes never survive
 * decoding: they are turned into UTF-8 text.
 */
export type ColumnValue = string | number | bigint | boolean | Date | null | JsonValue;

export type ResultRow = Record<string, ColumnValue>;

export interface QueryResult {
  columns: string[];
  rows: ResultRow[];
  count: number;
}

export interface WriteResult {
  rowsAffected: number;
  lastInsertId?: number;
}

interface UnsafeResultBase {
  warning: string;
  skippedCheck: string;
}

export type UnsafeResult = UnsafeResultBase &
  (
    | { queryResult: QueryResult; writeResult?: undefined }
    | { writeResult: WriteResult; queryResult?: undefined }
  );

export interface ExecuteOptions {
  signal?: AbortSignal;
}

export interface QueryOptions extends ExecuteOptions {
  maxRows?: number;
}

/** Outcome of a statement run through the driver's exec path */
export interface ExecResult {
  affectedRows: number;
  insertId?: number;
}

/** Callbacks a client drives while a result set streams in */
export interface RowHandlers {
  onFields(columns: string[]): void;
  /** Returns false once no further rows are wanted */
  onRow(values: readonly unknown[]): boolean;
}

// ============================================================================
// Connection and Client Types
// ============================================================================

export interface DatabaseClient {
  /** Opens the pool and probes it once */
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  /** Lightweight liveness probe; rejects when the handle is dead */
  ping(): Promise<void>;
  query(sql: string, options?: QueryOptions): Promise<QueryResult>;
  execute(sql: string, options?: ExecuteOptions): Promise<ExecResult>;
  isConnected(): boolean;
}

export type DatabaseClientFactory = (name: string, policy: ConnectionPolicy) => DatabaseClient;

// ============================================================================
// MCP Protocol Types
// ============================================================================

export interface MCPRequest {
  jsonrpc: '2.0';
  id?: string | number;
  method: string;
  params?: Record<string, unknown>;
}

export interface MCPResponse {
  jsonrpc: '2.0';
  id: string | number | null;
  result?: unknown;
  error?: MCPError;
}

export interface MCPError {
  code: number;
  message: string;
  data?: unknown;
}

export interface MCPTool {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export interface MCPToolResult {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}
