import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

export type LogLevel =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'critical';

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  notice: 2,
  warning: 3,
  error: 4,
  critical: 5,
};

// Store the low-level server instance for logging
let mcpServerInstance: McpServer | null = null;
let loggingFailureCount = 0;
const MAX_FAILURE_WARNINGS = 10;

export function setMcpServerInstance(server: McpServer | null): void {
  mcpServerInstance = server;
  loggingFailureCount = 0; // Reset counter on new server
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

export function resolveMinLogLevel(): LogLevel {
  const raw = process.env.DIR_WALKER_LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) return raw;
  return 'info';
}

function writeStderr(level: LogLevel, data: string, loggerName?: string): void {
  console.error(`[${level}] ${loggerName ? `${loggerName}: ` : ''}${data}`);
}

function mcpLog(level: LogLevel, data: string, loggerName?: string): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[resolveMinLogLevel()]) return;

  if (!mcpServerInstance) {
    writeStderr(level, data, loggerName);
    return;
  }

  void mcpServerInstance.server
    .sendLoggingMessage({
      level,
      data,
      logger: loggerName,
    })
    .catch(() => {
      loggingFailureCount++;
      writeStderr(level, data, loggerName);

      if (loggingFailureCount === MAX_FAILURE_WARNINGS) {
        console.error(
          '[CRITICAL] MCP logging failed 10 times. Further failures will not be reported.'
        );
      }
    });
}

export const logger = {
  debug: (msg: string, loggerName?: string): void => {
    mcpLog('debug', msg, loggerName);
  },
  info: (msg: string, loggerName?: string): void => {
    mcpLog('info', msg, loggerName);
  },
  notice: (msg: string, loggerName?: string): void => {
    mcpLog('notice', msg, loggerName);
  },
  warning: (msg: string, loggerName?: string): void => {
    mcpLog('warning', msg, loggerName);
  },
  error: (msg: string, loggerName?: string): void => {
    mcpLog('error', msg, loggerName);
  },
  critical: (msg: string, loggerName?: string): void => {
    mcpLog('critical', msg, loggerName);
  },
};
