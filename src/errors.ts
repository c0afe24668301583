/**
 * Invalid or missing configuration, raised at startup
 */
export class ConfigError extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(message);
    this.name = 'ConfigError';
    this.key = key;
  }
}

/**
 * The inference endpoint failed or returned nothing usable
 */
export class InferenceError extends Error {
  readonly model: string;

  constructor(model: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InferenceError';
    this.model = model;
  }
}

export const describeError = (error: unknown): { type: string; message: string; stack?: string } => ({
  type: error instanceof Error ? error.name : 'Unknown',
  message: error instanceof Error ? error.message : String(error),
  stack: error instanceof Error ? error.stack?.split('\n').slice(0, 5).join('\n') : undefined,
});
