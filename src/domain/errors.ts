/**
 * A third-party service (NewsAPI, Pinecone, Gemini) failed or answered
 * with an error payload.
 */
export class UpstreamServiceError extends Error {
  constructor(
    public readonly service: string,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'UpstreamServiceError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export interface ErrorInfo {
  message: string;
  name: string;
  stack?: string;
}

export function getErrorInfo(error: unknown): ErrorInfo {
  if (error instanceof Error) {
    return { message: error.message, name: error.name, stack: error.stack };
  }
  if (typeof error === 'string') return { message: error, name: 'Error' };
  try {
    return { message: JSON.stringify(error), name: 'Error' };
  } catch {
    return { message: String(error), name: 'Error' };
  }
}
