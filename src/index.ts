/**
 * Programmatic API for the MCP switchboard.
 */

export {
  type ConnectSummary,
  type ToolCallOutcome,
  ToolRegistry,
  type ToolRegistryOptions,
} from "./multiplexer/tool-registry";
export {
  CLIENT_INFO,
  PROTOCOL_VERSION,
  ServerSession,
  type TransportFactory,
} from "./multiplexer/server-session";
export { GatewayServer } from "./multiplexer/gateway-server";
export { installShutdownHandlers, withRegistry } from "./multiplexer/lifecycle";
export {
  isQualifiedName,
  parseQualifiedName,
  qualifyToolName,
  SEPARATOR,
} from "./multiplexer/namespace";
export { normalizeToolResult, resultText } from "./multiplexer/result";
export {
  ConfigurationError,
  type ErrorKind,
  ProtocolError,
  ResolutionError,
  SwitchboardError,
  TransportError,
  UsageError,
} from "./multiplexer/errors";
export {
  createIdSequence,
  createTransport,
  HttpTransport,
  type IdSequence,
  RequestCorrelator,
  StdioTransport,
  type Transport,
} from "./transport";
export { discoverConfig, type DiscoveryOptions } from "./config/discovery";
export { validateConfig, validateServerConfig } from "./config/schema";
export type {
  ConfigFile,
  HttpServerConfig,
  ResolvedConfig,
  ServerConfig,
  ServerConfigInput,
  StdioServerConfig,
  TransportKind,
} from "./config/types";
export type {
  ContentItem,
  QualifiedToolName,
  RegisteredTool,
  ServerStatus,
  SessionState,
  ToolDescriptor,
  ToolInputSchema,
  ToolResult,
} from "./multiplexer/types";
export type { Result } from "./util/result";
export { setVerbose } from "./util/logger";
