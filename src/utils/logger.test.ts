import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger } from './logger';

describe('createLogger', () => {
  const mcpMode = process.env.MCP_MODE;

  afterEach(() => {
    vi.restoreAllMocks();
    if (mcpMode === undefined) delete process.env.MCP_MODE;
    else process.env.MCP_MODE = mcpMode;
  });

  it('tags each line with the stage', () => {
    delete process.env.MCP_MODE;
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger('retrieve');

    logger.log('No indexed terms', 3);
    logger.error('failed');

    expect(out).toHaveBeenCalledWith('[retrieve]', 'No indexed terms', 3);
    expect(err).toHaveBeenCalledWith('[retrieve]', 'failed');
  });

  it('keeps stdout clear in MCP mode but still reports errors', () => {
    process.env.MCP_MODE = 'true';
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger('ask');

    logger.log('Question received');
    logger.error('model unavailable');

    expect(out).not.toHaveBeenCalled();
    expect(err).toHaveBeenCalledWith('[ask]', 'model unavailable');
  });
});
