export interface SerializedError {
  message: string;
  stack?: string;
  name?: string;
  cause?: SerializedError;
  code?: string;
  details?: Record<string, unknown>;
}

function readStringField(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}

function readRecordField(source: object, key: string): Record<string, unknown> | undefined {
  const value: unknown = Reflect.get(source, key);
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return undefined;
  return Object.fromEntries(Object.entries(value));
}

/**
 * Flatten an error (and its cause chain) into plain log metadata
 */
export function serializeError(error: unknown, depth = 3): SerializedError {
  if (error instanceof Error) {
    const serialized: SerializedError = {
      message: error.message,
      name: error.name,
      stack: error.stack,
    };

    const code = readStringField(error, 'code');
    if (code) serialized.code = code;

    const details = readRecordField(error, 'details');
    if (details) serialized.details = details;

    if (error.cause !== undefined && depth > 1) {
      serialized.cause = serializeError(error.cause, depth - 1);
    }

    return serialized;
  }

  if (typeof error === 'string') {
    return { message: error };
  }

  if (error && typeof error === 'object') {
    return {
      message: readStringField(error, 'message') ?? JSON.stringify(error),
      name: readStringField(error, 'name'),
      code: readStringField(error, 'code'),
    };
  }

  return { message: String(error) };
}
