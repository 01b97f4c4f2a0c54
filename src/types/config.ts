/**
 * Configuration types for the studio knowledge server
 */

export interface HttpServerConfig {
  host: string;
  port: number;
}

export interface AuthConfig {
  /** Header carrying the shared secret */
  header: string;
  apiKeys: string[];
}

export interface DataConfig {
  /** Directory holding the five collection files; null means the bundled dataset */
  dir: string | null;
}

export interface McpConfig {
  path: string;
  serverName: string;
  serverVersion: string;
  /** Reported by the GET probe on the MCP path */
  protocolLabel: string;
}

export interface LoggingConfig {
  level: string;
  file?: string | undefined;
}

export interface ServerConfig {
  server: HttpServerConfig;
  auth: AuthConfig;
  data: DataConfig;
  mcp: McpConfig;
  logging: LoggingConfig;
}

export const DEFAULT_CONFIG: ServerConfig = {
  server: {
    host: '0.0.0.0',
    port: 2011,
  },
  auth: {
    header: 'X-API-Key',
    apiKeys: [],
  },
  data: {
    dir: null,
  },
  mcp: {
    path: '/mcp',
    serverName: 'Studio Knowledge MCP',
    serverVersion: '0.1.0',
    protocolLabel: 'mcp-streamable-1.0',
  },
  logging: {
    level: 'info',
  },
};
