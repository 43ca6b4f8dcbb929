export interface ModelRequest {
  model: string;
  system: string;
  prompt: string;
}

/**
 * Anything that can turn a prompt into text: a local process or a local
 * HTTP endpoint. Implementations must stop work when the signal aborts.
 */
export interface ModelBackend {
  readonly name: string;
  generate(request: ModelRequest, signal: AbortSignal): Promise<string>;
}

/**
 * Single-string form of a request, for backends without a system role
 */
export function renderPrompt(request: ModelRequest): string {
  return `${request.system}\n\n${request.prompt}`;
}
