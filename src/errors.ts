/** Empty message or session id. Surfaced to callers as a 400. */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export type UpstreamService = 'sports' | 'llm';

/**
 * A remote dependency failed. Carried inside client results and absorbed by
 * the orchestrator; never shown to the end user.
 */
export class UpstreamUnavailableError extends Error {
  constructor(
    readonly service: UpstreamService,
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'UpstreamUnavailableError';
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}
