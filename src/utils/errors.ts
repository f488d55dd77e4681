// ═══════════════════════════════════════════════════════════════
//                    FEHLERKLASSEN
// ═══════════════════════════════════════════════════════════════

export class JobSchemaError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'JobSchemaError';
  }
}

/**
 * Kein Executor für einen Task registriert.
 * Ersetzt das frühere "no run_roi_scan/main/run found" im Log.
 */
export class ExecutorNotFoundError extends Error {
  constructor(readonly task: string, readonly supported: string[]) {
    super(`No executor registered for task=${task || '(empty)'}. Supported: [${supported.join(', ')}]`);
    this.name = 'ExecutorNotFoundError';
  }
}

export class GitHubApiError extends Error {
  constructor(
    readonly operation: string,
    readonly status: number,
    readonly body: string
  ) {
    super(`GitHub ${operation} failed: ${status} ${body.substring(0, 500)}`);
    this.name = 'GitHubApiError';
  }
}

export class LLMProviderError extends Error {
  constructor(readonly provider: string, message: string, readonly raw?: string) {
    super(`${provider}: ${message}`);
    this.name = 'LLMProviderError';
  }
}

export class InvalidParamsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidParamsError';
  }
}

export class MissingCredentialError extends Error {
  constructor(readonly variable: string, message?: string) {
    super(message ?? `Missing ${variable}`);
    this.name = 'MissingCredentialError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}
