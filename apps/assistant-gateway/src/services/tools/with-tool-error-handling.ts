import type { LoggerLike } from '@session-governor/core';

export interface ToolErrorHandlingOptions<TResult> {
  logger: LoggerLike;
  /** Value returned in place of a thrown error. */
  fallback: (error: unknown) => TResult;
  /** Log at `warn` instead of `error`, for non-critical operations. */
  silent?: boolean;
  onError?: (error: unknown) => void;
}

/**
 * Wrap a fallible tool operation so that it never rejects: failures are
 * logged and replaced with the fallback value.
 */
export function withToolErrorHandling<TArgs extends unknown[], TResult>(
  name: string,
  operation: (...args: TArgs) => Promise<TResult>,
  options: ToolErrorHandlingOptions<TResult>,
): (...args: TArgs) => Promise<TResult> {
  return async (...args: TArgs): Promise<TResult> => {
    try {
      return await operation(...args);
    } catch (error) {
      if (options.silent) {
        options.logger.warn?.({ tool: name, error }, 'Tool failed, returning fallback');
      } else {
        options.logger.error?.({ tool: name, error }, 'Tool execution failed');
      }
      options.onError?.(error);
      return options.fallback(error);
    }
  };
}

/** Fallback that tells the model what failed and why. */
export function describeToolFailure(defaultResponse: string): (error: unknown) => string {
  return (error) => {
    const detail = error instanceof Error ? error.message : String(error);
    return `${defaultResponse} Details: ${detail}`;
  };
}
