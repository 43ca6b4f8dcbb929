import { execFile } from 'node:child_process';
import type { ExecFileException } from 'node:child_process';
import { OLLAMA_BIN } from '../../constants/providers';
import { GenerationUnavailable } from '../../utils/errors';
import { renderPrompt } from './types';
import type { ModelBackend, ModelRequest } from './types';

export const MAX_OUTPUT_BYTES = 10 * 1024 * 1024;

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  signal: AbortSignal
) => Promise<CommandResult>;

export function classifyProcessError(
  command: string,
  err: ExecFileException,
  stderr: string
): GenerationUnavailable {
  if (err.code === 'ENOENT') {
    return new GenerationUnavailable(
      `${command} not found. Install Ollama (https://ollama.com) and pull a model.`,
      'not_found',
      err
    );
  }

  // Node also sets killed when it stops a child for overflowing maxBuffer
  if (err.code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
    return new GenerationUnavailable(
      `${command} wrote more than ${MAX_OUTPUT_BYTES} bytes of output`,
      'request_failed',
      err
    );
  }

  if (err.name === 'AbortError' || err.code === 'ABORT_ERR' || err.killed) {
    return new GenerationUnavailable(`${command} was stopped before answering`, 'timeout', err);
  }

  const detail = stderr.trim() || err.message;
  return new GenerationUnavailable(
    `${command} exited with ${err.code ?? err.signal ?? 'an error'}: ${detail}`,
    'exit_code',
    err
  );
}

export const runCommand: CommandRunner = (command, args, signal) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      { signal, encoding: 'utf8', maxBuffer: MAX_OUTPUT_BYTES },
      (err, stdout, stderr) => {
        if (err) {
          reject(classifyProcessError(command, err, stderr));
          return;
        }
        resolve({ stdout, stderr });
      }
    );
  });

export interface ProcessBackendOptions {
  command?: string;
  run?: CommandRunner;
}

/**
 * Runs `ollama run <model> <prompt>` and returns its stdout
 */
export class ProcessModelBackend implements ModelBackend {
  readonly name = 'process';
  private readonly command: string;
  private readonly run: CommandRunner;

  constructor(options: ProcessBackendOptions = {}) {
    this.command = options.command ?? OLLAMA_BIN;
    this.run = options.run ?? runCommand;
  }

  async generate(request: ModelRequest, signal: AbortSignal): Promise<string> {
    const { stdout } = await this.run(
      this.command,
      ['run', request.model, renderPrompt(request)],
      signal
    );
    return stdout;
  }
}
