export class MalformedModelError extends Error {
  constructor(message: string, public readonly source: string = 'model') {
    super(message);
    this.name = 'MalformedModelError';
  }
}

export class DanglingReferenceError extends Error {
  constructor(message: string, public readonly reference: string) {
    super(message);
    this.name = 'DanglingReferenceError';
  }
}

export class CycleDetectedError extends Error {
  constructor(message: string, public readonly chain: readonly string[]) {
    super(message);
    this.name = 'CycleDetectedError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly path: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Render any thrown value as a one-line message.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`;
  }
  return String(err);
}
