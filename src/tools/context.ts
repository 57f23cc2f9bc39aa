/**
 * Minimal view of the FastMCP tool context used by our tools
 * Structural, so the real Context and test stubs both fit.
 */

type LogData = Record<string, string | number | boolean | null>;

export interface ToolLogger {
  debug: (message: string, data?: LogData) => void;
  info: (message: string, data?: LogData) => void;
  warn: (message: string, data?: LogData) => void;
  error: (message: string, data?: LogData) => void;
}

export interface ToolContext {
  log: ToolLogger;
}
