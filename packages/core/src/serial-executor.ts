import { telemetry as globalTelemetry, type TelemetryFacade } from './telemetry.js';

const TELEMETRY_TASK_FAILED = 'SerialTaskFailed';

const noop = (): void => {};

/**
 * Single logical worker. Tasks run one at a time in submission order, so a
 * task never observes another task's mutations half-applied. Tasks are
 * synchronous units of work; a task that throws rejects its own promise and
 * leaves the queue running.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private pendingTasks = 0;
  private readonly telemetry: TelemetryFacade;

  constructor(
    readonly label = 'simulation',
    telemetry: TelemetryFacade = globalTelemetry,
  ) {
    this.telemetry = telemetry;
  }

  /**
   * Queues a task and resolves with its result once every task submitted
   * before it has finished.
   */
  run<TResult>(task: () => TResult): Promise<TResult> {
    this.pendingTasks += 1;
    const result = this.tail.then(() => {
      try {
        return task();
      } finally {
        this.pendingTasks -= 1;
      }
    });
    this.tail = result.then(noop, noop);
    return result;
  }

  /**
   * Fire-and-forget variant of {@link run}. Failures are reported through
   * telemetry since no caller is awaiting them.
   */
  post(task: () => void, name = 'task'): void {
    void this.run(task).catch((error: unknown) => {
      this.telemetry.recordError(TELEMETRY_TASK_FAILED, {
        executor: this.label,
        task: name,
        message: error instanceof Error ? error.message : String(error),
      });
    });
  }

  /** Resolves once every task queued before the call has run. */
  idle(): Promise<void> {
    return this.tail;
  }

  get size(): number {
    return this.pendingTasks;
  }
}
