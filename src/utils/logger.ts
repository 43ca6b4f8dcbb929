/**
 * Logger utility that only logs when not in MCP mode
 * MCP servers use stdio for JSON-RPC communication, so we can't pollute stdout
 */

export function log(...args: unknown[]): void {
  // Check MCP_MODE dynamically each time, not just at import time
  if (process.env.MCP_MODE !== 'true') {
    console.log(...args);
  }
}

export function error(...args: unknown[]): void {
  // Errors always go to stderr, which is safe in MCP mode
  console.error(...args);
}

export interface StageLogger {
  log(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Logger for one pipeline stage (extract, retrieve, generate, ask); every
 * line is tagged with the stage name
 */
export function createLogger(stage: string): StageLogger {
  const tag = `[${stage}]`;
  return {
    log: (...args) => log(tag, ...args),
    error: (...args) => error(tag, ...args),
  };
}
