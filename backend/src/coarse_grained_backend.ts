// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import type { TypedEventEmitter as TypedEmitter } from '@livekit/typed-emitter';
import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import { BackendError } from './errors.js';
import { log } from './log.js';
import type { ExecutorLossReason } from './loss_reason.js';
import type { ResolvedBackendOptions } from './options.js';
import type { TaskScheduler } from './types.js';
import { delay } from './utils.js';
import { version } from './version.js';

const DEFAULT_READY_POLL_INTERVAL = 100;
const MIN_DEFAULT_PARALLELISM = 2;

/** An executor process that has checked in with the driver. */
export interface ExecutorData {
  executorId: string;
  hostPort: string;
  cores: number;
  registeredAt: number;
}

/** An executor the master granted to the application; it has not necessarily checked in yet. */
export interface GrantedExecutor {
  fullId: string;
  workerId: string;
  hostPort: string;
  cores: number;
  memoryMb: number;
}

export type SchedulerBackendCallbacks = {
  executor_registered: (executor: ExecutorData) => void;
  executor_lost: (executorId: string, reason: string) => void;
  connected: (appId: string) => void;
  disconnected: () => void;
  dead: (reason: string) => void;
  executor_added: (executor: GrantedExecutor) => void;
  executor_removed: (executorId: string, reason: ExecutorLossReason) => void;
};

export type WaitUntilReadyOptions = {
  pollInterval?: number;
  signal?: AbortSignal;
};

/**
 * Keeps track of the executors that registered with the driver and of the cores they
 * provide, and decides when the scheduler may start handing out work.
 *
 * @remarks
 * Cluster-specific backends extend this class, connect to their cluster in
 * {@link CoarseGrainedSchedulerBackend.start} and override
 * {@link CoarseGrainedSchedulerBackend.sufficientResourcesRegistered}.
 */
export abstract class CoarseGrainedSchedulerBackend extends (EventEmitter as new () => TypedEmitter<SchedulerBackendCallbacks>) {
  readonly createTime = Date.now();

  protected readonly scheduler: TaskScheduler;
  protected readonly opts: ResolvedBackendOptions;
  protected logger: Logger;

  #executors = new Map<string, ExecutorData>();
  #totalCoreCount = 0;
  #started = false;
  #stopped = false;

  constructor(scheduler: TaskScheduler, opts: ResolvedBackendOptions) {
    super();
    this.scheduler = scheduler;
    this.opts = opts;
    this.logger = log().child({ version, app: opts.appName }, { level: opts.logLevel });
  }

  /** Cores provided by all registered executors. */
  get totalCoreCount(): number {
    return this.#totalCoreCount;
  }

  get totalRegisteredExecutors(): number {
    return this.#executors.size;
  }

  get executors(): ExecutorData[] {
    return [...this.#executors.values()];
  }

  get minRegisteredRatio(): number {
    return this.opts.minRegisteredRatio;
  }

  get started(): boolean {
    return this.#started;
  }

  /* @throws {@link BackendError} if the backend was already started */
  start(): void {
    if (this.#started) {
      throw new BackendError('scheduler backend is already running');
    }
    this.#started = true;
    this.logger.debug('starting scheduler backend');
  }

  stop(): void {
    if (this.#stopped) return;
    this.#stopped = true;

    this.logger.debug(
      { executors: this.#executors.size, cores: this.#totalCoreCount },
      'stopping scheduler backend',
    );
    this.#executors.clear();
    this.#totalCoreCount = 0;
  }

  /**
   * Records an executor process that checked in with the driver.
   *
   * @throws {@link BackendError} if an executor with the same ID is already registered
   */
  registerExecutor(executorId: string, hostPort: string, cores: number): void {
    if (this.#executors.has(executorId)) {
      throw new BackendError(`duplicate executor ID: ${executorId}`);
    }

    const executor: ExecutorData = { executorId, hostPort, cores, registeredAt: Date.now() };
    this.#executors.set(executorId, executor);
    this.#totalCoreCount += cores;
    this.logger.child({ executorId, hostPort, cores }).info('registered executor');
    this.emit('executor_registered', executor);
  }

  removeExecutor(executorId: string, reason: string): void {
    const executor = this.#executors.get(executorId);
    if (!executor) {
      this.logger.child({ executorId }).info('asked to remove non-existent executor');
      return;
    }

    this.#executors.delete(executorId);
    this.#totalCoreCount -= executor.cores;
    this.logger.child({ executorId, reason }).info('removed executor');
    this.scheduler.executorLost(executorId, reason);
    this.emit('executor_lost', executorId, reason);
  }

  sufficientResourcesRegistered(): boolean {
    return true;
  }

  /**
   * Whether the scheduler may start submitting work: either enough resources registered,
   * or `maxRegisteredWaitingTime` elapsed since the backend was created.
   */
  isReady(): boolean {
    if (this.sufficientResourcesRegistered()) {
      this.logger.debug(
        { minRegisteredRatio: this.minRegisteredRatio },
        'backend ready, reached minimum registered resources ratio',
      );
      return true;
    }
    if (Date.now() - this.createTime >= this.opts.maxRegisteredWaitingTime) {
      this.logger.debug(
        { maxRegisteredWaitingTime: this.opts.maxRegisteredWaitingTime },
        'backend ready, waited for maximum registration time',
      );
      return true;
    }
    return false;
  }

  async waitUntilReady({
    pollInterval = DEFAULT_READY_POLL_INTERVAL,
    signal,
  }: WaitUntilReadyOptions = {}): Promise<void> {
    while (!this.isReady()) {
      await delay(pollInterval, { signal });
    }
  }

  /** Fallback ID for backends whose cluster does not assign one. */
  applicationId(): string {
    return `app-${this.createTime}`;
  }

  defaultParallelism(): number {
    return (
      this.opts.defaultParallelism ?? Math.max(this.#totalCoreCount, MIN_DEFAULT_PARALLELISM)
    );
  }
}
