// src/polling-manager.ts
import { Mutex } from 'async-mutex';
import Logger, { getSharedLogger } from './logger.js';
import {
  LoggerInstance,
  PollingManagerConfig,
  PollingTaskOptions,
  PollingTaskState,
  PollingTaskStats,
} from './types/telemetry-types.js';
import {
  describeError,
  PollingTaskAlreadyExistsError,
  PollingTaskNotFoundError,
  PollingTaskValidationError,
  TimeoutError,
  toError,
} from './errors.js';

/**
 * TaskController owns the schedule and retry loop of one task.
 */
class TaskController {
  public readonly id: string;
  public readonly name: string | null;
  public interval: number;
  public readonly maxRetries: number;
  public readonly backoffDelay: number;
  public readonly taskTimeout: number;

  public stopped: boolean = true;
  public paused: boolean = false;
  public executionInProgress: boolean = false;

  public readonly logger: LoggerInstance;

  private stats: PollingTaskStats = {
    totalRuns: 0,
    totalErrors: 0,
    lastError: null,
    lastResult: null,
    lastRunTime: null,
    retries: 0,
    successes: 0,
    failures: 0,
  };
  private timerId: NodeJS.Timeout | null = null;

  constructor(
    private readonly options: PollingTaskOptions &
      Required<Pick<PollingTaskOptions, 'maxRetries' | 'backoffDelay' | 'taskTimeout'>>,
    private readonly manager: PollingManager
  ) {
    this.id = options.id;
    this.name = options.name ?? null;
    this.interval = options.interval;
    this.maxRetries = options.maxRetries;
    this.backoffDelay = options.backoffDelay;
    this.taskTimeout = options.taskTimeout;

    this.logger = manager.loggerInstance.createLogger(`Task:${this.id}`);
    this.logger.debug('TaskController created', {
      id: this.id,
      interval: this.interval,
      maxRetries: this.maxRetries,
      taskTimeout: this.taskTimeout,
    });
  }

  start(): void {
    if (!this.stopped) {
      this.logger.debug('Task already running');
      return;
    }
    this.stopped = false;
    this.logger.info('Task started', { id: this.id, name: this.name ?? undefined });
    this._scheduleNextRun(true);
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;

    if (this.timerId) {
      clearTimeout(this.timerId);
      this.timerId = null;
    }

    this.manager.removeFromQueue(this.id);
    this.logger.info('Task stopped', { id: this.id });
  }

  pause(): void {
    if (this.paused) return;
    this.paused = true;
    this.logger.info('Task paused', { id: this.id });
  }

  resume(): void {
    if (this.stopped || !this.paused) return;
    this.paused = false;
    this.logger.info('Task resumed', { id: this.id });
    if (!this.timerId && !this.executionInProgress) {
      this._scheduleNextRun(true);
    }
  }

  private _scheduleNextRun(immediate: boolean = false): void {
    if (this.stopped) return;

    if (this.timerId) {
      clearTimeout(this.timerId);
      this.timerId = null;
    }

    this.timerId = setTimeout(
      () => {
        this.timerId = null;
        if (this.stopped) return;
        this.manager.enqueueTask(this);
      },
      immediate ? 0 : this.interval
    );
  }

  async execute(): Promise<void> {
    if (this.stopped) return;
    if (this.paused) {
      this._scheduleNextRun();
      return;
    }

    this.executionInProgress = true;
    this.stats.totalRuns++;

    try {
      let retryCount = 0;
      while (!this.stopped && !this.paused) {
        try {
          const result = await this._withTimeout(this.options.fn(), this.taskTimeout);
          this.stats.successes++;
          this.stats.lastError = null;
          this.stats.lastResult = result;
          this.options.onData?.(result);
          break;
        } catch (err: unknown) {
          const error = toError(err);
          retryCount++;
          this.stats.totalErrors++;
          this.stats.lastError = error;
          this.logger.error(`${describeError(error)}: ${error.message}`, {
            id: this.id,
            retryCount,
          });

          if (retryCount > this.maxRetries) {
            this.stats.failures++;
            this.options.onError?.(error, retryCount);
            break;
          }

          this.stats.retries++;
          const delay = this.backoffDelay * Math.pow(2, retryCount - 1);
          this.logger.debug('Retrying with delay', { id: this.id, delay, retryCount });
          await this._sleep(delay);
        }
      }
      this.stats.lastRunTime = Date.now();
    } finally {
      this.executionInProgress = false;
      this._scheduleNextRun();
    }
  }

  public isRunning(): boolean {
    return !this.stopped;
  }

  public isPaused(): boolean {
    return this.paused;
  }

  public setInterval(ms: number): void {
    this.interval = ms;
    this.logger.info('Interval updated', { id: this.id, interval: ms });
  }

  public getState(): PollingTaskState {
    return {
      stopped: this.stopped,
      paused: this.paused,
      running: !this.stopped,
      inProgress: this.executionInProgress,
    };
  }

  public getStats(): PollingTaskStats {
    return { ...this.stats };
  }

  private _sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  private _withTimeout<T>(promise: Promise<T>, timeout: number): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => reject(new TimeoutError('Task timed out')), timeout);
      promise
        .then(result => {
          clearTimeout(timer);
          resolve(result);
        })
        .catch((err: unknown) => {
          clearTimeout(timer);
          reject(err);
        });
    });
  }
}

/**
 * Runs interval tasks one at a time, in the order they fall due.
 */
class PollingManager {
  private config: Required<PollingManagerConfig>;
  private tasks: Map<string, TaskController> = new Map();
  private executionQueue: TaskController[] = [];
  private mutex: Mutex = new Mutex();

  public readonly loggerInstance: Logger;
  public readonly logger: LoggerInstance;

  constructor(config: PollingManagerConfig = {}, loggerInstance: Logger = getSharedLogger()) {
    this.config = {
      defaultMaxRetries: 3,
      defaultBackoffDelay: 1000,
      defaultTaskTimeout: 5000,
      logLevel: 'info',
      ...config,
    };

    this.loggerInstance = loggerInstance;
    this.logger = this.loggerInstance.createLogger('PollingManager');
    this.logger.setLevel(this.config.logLevel);
  }

  private _validateTaskOptions(options: PollingTaskOptions): void {
    if (!options.id) throw new PollingTaskValidationError('Task must have an "id"');
    if (!Number.isFinite(options.interval) || options.interval <= 0)
      throw new PollingTaskValidationError('Interval must be a positive number');
    if (typeof options.fn !== 'function')
      throw new PollingTaskValidationError('fn must be a function');
  }

  public addTask(options: PollingTaskOptions): void {
    this._validateTaskOptions(options);
    if (this.tasks.has(options.id)) throw new PollingTaskAlreadyExistsError(options.id);

    const task = new TaskController(
      {
        ...options,
        maxRetries: options.maxRetries ?? this.config.defaultMaxRetries,
        backoffDelay: options.backoffDelay ?? this.config.defaultBackoffDelay,
        taskTimeout: options.taskTimeout ?? this.config.defaultTaskTimeout,
      },
      this
    );

    this.tasks.set(options.id, task);
    if (options.immediate !== false) {
      task.start();
    }
    this.logger.info('Task added', { id: options.id });
  }

  public removeTask(id: string): void {
    const task = this.tasks.get(id);
    if (!task) {
      this.logger.warn('Attempt to remove non-existent task', { id });
      return;
    }
    task.stop();
    this.tasks.delete(id);
    this.removeFromQueue(id);
    this.logger.info('Task removed', { id });
  }

  public startTask(id: string): void {
    this._getTask(id).start();
  }

  public stopTask(id: string): void {
    this.tasks.get(id)?.stop();
  }

  public pauseTask(id: string): void {
    this.tasks.get(id)?.pause();
  }

  public resumeTask(id: string): void {
    this.tasks.get(id)?.resume();
  }

  public setTaskInterval(id: string, interval: number): void {
    this._getTask(id).setInterval(interval);
  }

  public isTaskRunning(id: string): boolean {
    return this.tasks.get(id)?.isRunning() ?? false;
  }

  public isTaskPaused(id: string): boolean {
    return this.tasks.get(id)?.isPaused() ?? false;
  }

  public getTaskState(id: string): PollingTaskState | null {
    return this.tasks.get(id)?.getState() ?? null;
  }

  public getTaskStats(id: string): PollingTaskStats | null {
    return this.tasks.get(id)?.getStats() ?? null;
  }

  public hasTask(id: string): boolean {
    return this.tasks.has(id);
  }

  public clearAll(): void {
    for (const task of this.tasks.values()) task.stop();
    this.tasks.clear();
    this.executionQueue = [];
    this.logger.info('All tasks cleared');
  }

  public enqueueTask(task: TaskController): void {
    if (this.executionQueue.includes(task)) return;
    this.executionQueue.push(task);
    this.logger.trace('Task enqueued', { id: task.id, queueLen: this.executionQueue.length });
    this._kick();
  }

  public removeFromQueue(taskId: string): void {
    this.executionQueue = this.executionQueue.filter(t => t.id !== taskId);
  }

  /**
   * Runs `fn` while no queued task is executing.
   */
  public async executeImmediate<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await this.mutex.runExclusive(fn);
    } finally {
      if (this.executionQueue.length > 0) this._kick();
    }
  }

  private _getTask(id: string): TaskController {
    const task = this.tasks.get(id);
    if (!task) throw new PollingTaskNotFoundError(id);
    return task;
  }

  private _kick(): void {
    if (this.mutex.isLocked()) return;
    this._processQueue().catch((err: unknown) => {
      this.logger.error('Critical error in processQueue loop', { error: toError(err).message });
    });
  }

  /**
   * Main queue loop; a single pass drains the queue under the mutex.
   */
  private async _processQueue(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      let task = this.executionQueue.shift();
      while (task) {
        await task.execute();
        task = this.executionQueue.shift();
      }
    });
    if (this.executionQueue.length > 0) this._kick();
  }
}

export { TaskController };
export default PollingManager;
