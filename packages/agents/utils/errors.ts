// Error types — only configuration problems are ever thrown out of a run

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
  }
}

export class DecisionTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`decision function timed out after ${timeoutMs}ms`);
    this.name = 'DecisionTimeoutError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
