import type { FileTransport } from './file-transport';

/**
 * Performance entry written to .perf.log
 */
export interface PerfEntry {
  timestamp: string;
  operation: string;
  duration: number;
  success: boolean;
  context?: Record<string, unknown>;
  error?: string;
}

/**
 * Times async operations and appends one entry per run to the perf log.
 *
 * ```typescript
 * const window = await logger.perf.track('indicators:compute', () => compute(series), {
 *   symbol,
 *   timeframe,
 * });
 * ```
 */
export class PerformanceTracker {
  constructor(private readonly fileTransport: FileTransport | null) {}

  get enabled(): boolean {
    return this.fileTransport !== null;
  }

  async track<T>(
    operation: string,
    fn: () => T | Promise<T>,
    context?: Record<string, unknown>
  ): Promise<T> {
    const startedAt = performance.now();
    try {
      const result = await fn();
      this.record(operation, startedAt, context);
      return result;
    } catch (error) {
      this.record(operation, startedAt, context, error);
      throw error;
    }
  }

  private record(
    operation: string,
    startedAt: number,
    context: Record<string, unknown> | undefined,
    error?: unknown
  ): void {
    if (!this.fileTransport) return;

    const entry: PerfEntry = {
      timestamp: new Date().toISOString(),
      operation,
      duration: Math.round(performance.now() - startedAt),
      success: error === undefined,
      ...(context && { context }),
      ...(error !== undefined && { error: error instanceof Error ? error.message : String(error) }),
    };
    this.fileTransport.writePerf({ ...entry });
  }
}

/**
 * Create a no-op performance tracker for when perf logging is disabled
 */
export function createNoOpPerformanceTracker(): PerformanceTracker {
  return new PerformanceTracker(null);
}
