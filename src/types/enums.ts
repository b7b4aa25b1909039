/**
 * Constants and types for consistent type safety across the application
 * Using const assertions instead of enums for better tree-shaking and type safety
 */

/* eslint-disable no-redeclare */

export const JsonRpcErrorCode = {
  // Standard JSON-RPC 2.0 codes
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,

  // Application range
  Canceled: -32800,
  Timeout: -32801,
  PermissionDenied: -32803,
  NotFound: -32804,
} as const;

export type JsonRpcErrorCode =
  (typeof JsonRpcErrorCode)[keyof typeof JsonRpcErrorCode];

/**
 * Request methods answered by the dispatcher
 */
export const McpMethod = {
  Initialize: 'initialize',
  Ping: 'ping',
  ToolsList: 'tools/list',
  ToolsCall: 'tools/call',
  ResourcesList: 'resources/list',
  ResourcesRead: 'resources/read',
  PromptsList: 'prompts/list',
  PromptsGet: 'prompts/get',
} as const;

export type McpMethod = (typeof McpMethod)[keyof typeof McpMethod];

/**
 * Notification methods, inbound and outbound
 */
export const McpNotification = {
  CancelRequest: '$/cancelRequest',
  Cancelled: 'notifications/cancelled',
  Initialized: 'notifications/initialized',
  Progress: 'notifications/progress',
} as const;

export type McpNotification =
  (typeof McpNotification)[keyof typeof McpNotification];

/**
 * The three kinds of callable definitions a peer can reach
 */
export const DefinitionKind = {
  Tool: 'tool',
  Resource: 'resource',
  Prompt: 'prompt',
} as const;

export type DefinitionKind =
  (typeof DefinitionKind)[keyof typeof DefinitionKind];

export const MCP_PROTOCOL_VERSION = '2024-11-05';
