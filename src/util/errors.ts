/**
 * Fatal, user-facing conversion problem (bad input, unsupported content).
 * Anything else that escapes a conversion is an unexpected failure.
 */
export class ConversionError extends Error {
  constructor(message: string, readonly details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'ConversionError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
