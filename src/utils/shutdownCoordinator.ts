import type { Logger } from 'pino';
import { logger as rootLogger } from './logger.js';

type ShutdownHandler = () => Promise<void> | void;
type CleanupOperation = {
  name: string;
  handler: ShutdownHandler;
  timeout?: number;
};

/**
 * Shutdown coordinator for a pipeline run
 *
 * The first SIGINT/SIGTERM aborts the run's AbortController so workers stop
 * pulling new documents; cleanup operations (checkpoint flush, pool close) run
 * once the orchestrator has drained. A second signal exits immediately.
 */
export class ShutdownCoordinator {
  private cleanupOperations: CleanupOperation[] = [];
  private isShuttingDown = false;
  private signalCount = 0;
  private readonly listeners = new Map<NodeJS.Signals, () => void>();

  constructor(
    private readonly controller: AbortController = new AbortController(),
    private readonly log: Logger = rootLogger
  ) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Register a cleanup operation, executed in registration order
   */
  register(name: string, handler: ShutdownHandler, timeout?: number): void {
    this.cleanupOperations.push({ name, handler, timeout });
  }

  /**
   * Abort the run and let in-flight documents finish their current stage
   */
  requestCancel(reason: string): void {
    if (this.controller.signal.aborted) {
      return;
    }
    this.log.warn({ reason }, 'Cancellation requested, finishing in-flight stages');
    this.controller.abort(reason);
  }

  installSignalHandlers(signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']): void {
    for (const name of signals) {
      const listener = () => {
        this.signalCount++;
        if (this.signalCount > 1) {
          this.log.error({ signal: name }, 'Second signal received, exiting without flushing');
          process.exit(130);
        }
        this.requestCancel(name);
      };
      this.listeners.set(name, listener);
      process.on(name, listener);
    }
  }

  removeSignalHandlers(): void {
    for (const [name, listener] of this.listeners) {
      process.off(name, listener);
    }
    this.listeners.clear();
  }

  /**
   * Execute all registered cleanup operations in order.
   * A failing operation is logged and the rest still run.
   */
  async shutdown(reason?: string): Promise<void> {
    if (this.isShuttingDown) {
      this.log.warn('Shutdown already in progress');
      return;
    }

    this.isShuttingDown = true;
    this.log.info({ reason, operationsCount: this.cleanupOperations.length }, 'Running shutdown operations');

    for (const operation of this.cleanupOperations) {
      await this.executeOperation(operation);
    }
    this.removeSignalHandlers();
  }

  private async executeOperation(operation: CleanupOperation): Promise<void> {
    const { name, handler, timeout } = operation;
    let timer: NodeJS.Timeout | undefined;

    try {
      if (timeout) {
        await Promise.race([
          Promise.resolve(handler()),
          new Promise<void>((_, reject) => {
            timer = setTimeout(() => reject(new Error(`Operation ${name} timed out after ${timeout}ms`)), timeout);
          }),
        ]);
      } else {
        await Promise.resolve(handler());
      }
      this.log.debug({ operation: name }, 'Cleanup operation completed');
    } catch (error) {
      this.log.error({ error, operation: name }, 'Error during cleanup operation (continuing with shutdown)');
    } finally {
      clearTimeout(timer);
    }
  }

  isShuttingDownStatus(): boolean {
    return this.isShuttingDown;
  }
}
