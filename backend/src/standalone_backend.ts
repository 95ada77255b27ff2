// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { Mutex } from '@livekit/mutex';
import { buildApplicationDescription } from './app_description.js';
import { CoarseGrainedSchedulerBackend } from './coarse_grained_backend.js';
import { BackendError, MalformedExecutorIdError } from './errors.js';
import { classifyExecutorLoss, describeLossReason } from './loss_reason.js';
import type { BackendOptions } from './options.js';
import { resolveBackendOptions } from './options.js';
import { RegistrationGate } from './registration_gate.js';
import { sufficientResourcesRegistered } from './sufficiency.js';
import type {
  AppClient,
  AppClientFactory,
  AppClientListener,
  ApplicationContext,
  TaskScheduler,
} from './types.js';
import { megabytesToString } from './utils.js';

export type BackendState = 'initializing' | 'connected' | 'disconnected' | 'terminated';

export type ShutdownCallback = (backend: StandaloneSchedulerBackend) => void | Promise<void>;

/**
 * Extracts the executor ID from the `<workerId>/<executorId>` form the master uses.
 *
 * @throws {@link MalformedExecutorIdError} if `fullId` has no `/` or nothing after it
 */
export function executorIdFromFullId(fullId: string): string {
  const sep = fullId.indexOf('/');
  if (sep === -1) {
    throw new MalformedExecutorIdError(fullId);
  }
  const rest = fullId.slice(sep + 1);
  const next = rest.indexOf('/');
  const executorId = next === -1 ? rest : rest.slice(0, next);
  if (executorId === '') {
    throw new MalformedExecutorIdError(fullId);
  }
  return executorId;
}

/**
 * Scheduler backend for a standalone cluster.
 *
 * @remarks
 * {@link StandaloneSchedulerBackend.start} registers the application with the cluster
 * master and resolves once the master accepted it (or gave up). From then on the master
 * client reports executors joining and leaving through the {@link AppClientListener}
 * callbacks, which may arrive at any time and in any order.
 *
 * @example
 * ```
 * const backend = new StandaloneSchedulerBackend({
 *   scheduler,
 *   appContext,
 *   clientFactory: (masters, description, listener) => new MasterClient(masters, description, listener),
 *   options: new BackendOptions({ appName: 'wordcount', masters: ['standalone://master:7077'] }),
 * });
 * await backend.start();
 * await backend.waitUntilReady();
 * ```
 */
export class StandaloneSchedulerBackend
  extends CoarseGrainedSchedulerBackend
  implements AppClientListener
{
  /** Invoked at the end of {@link StandaloneSchedulerBackend.stop}. */
  shutdownCallback?: ShutdownCallback;

  /** Cores requested from the master, 0 when uncapped. */
  readonly totalExpectedCores: number;

  #appContext: ApplicationContext;
  #clientFactory: AppClientFactory;
  #client?: AppClient;
  #appId?: string;
  #state: BackendState = 'initializing';
  #stopping = false;
  #registration = new RegistrationGate();
  #stopLock = new Mutex();

  /* @throws {@link InvalidOptionsError} if the options are invalid */
  constructor({
    scheduler,
    appContext,
    clientFactory,
    options,
  }: {
    scheduler: TaskScheduler;
    appContext: ApplicationContext;
    clientFactory: AppClientFactory;
    options: BackendOptions;
  }) {
    super(scheduler, resolveBackendOptions(options));
    this.#appContext = appContext;
    this.#clientFactory = clientFactory;
    this.totalExpectedCores = this.opts.maxCores ?? 0;
  }

  /** ID assigned by the master, `undefined` until the application was accepted. */
  get appId(): string | undefined {
    return this.#appId;
  }

  get state(): BackendState {
    return this.#state;
  }

  get stopping(): boolean {
    return this.#stopping;
  }

  /** Whether the master has answered the registration, successfully or not. */
  get registered(): boolean {
    return this.#registration.done;
  }

  /**
   * Registers the application with the master and waits for its answer.
   *
   * There is no timeout here; the master client reports `dead` once it gives up on
   * reaching a master.
   *
   * @throws {@link BackendError} if the backend was already started or stopped
   */
  async start(): Promise<void> {
    if (this.#stopping) {
      throw new BackendError('scheduler backend was stopped and cannot be restarted');
    }
    super.start();

    const description = buildApplicationDescription(this.opts);
    this.logger
      .child({ masters: this.opts.masters, maxCores: description.maxCores })
      .info('registering application with cluster master');

    this.#client = this.#clientFactory(this.opts.masters, description, this);
    this.#client.start();

    await this.#registration.wait();
  }

  async stop(): Promise<void> {
    const unlock = await this.#stopLock.lock();
    try {
      if (this.#stopping) return;

      // must be set before the client goes down so its disconnect callbacks are ignored
      this.#stopping = true;
      this.#state = 'terminated';
      super.stop();
      this.#client?.stop();

      if (this.shutdownCallback) {
        await this.shutdownCallback(this);
      }
      this.logger.info('scheduler backend stopped');
    } finally {
      unlock();
    }
  }

  connected(appId: string): void {
    this.logger.child({ appId }).info('connected to cluster');
    if (this.#appId === undefined) {
      this.#appId = appId;
    } else if (this.#appId !== appId) {
      this.logger
        .child({ appId: this.#appId, reported: appId })
        .warn('master reported a different application ID on reconnect, keeping the first one');
    }
    this.#registration.signal();
    if (this.#state === 'terminated') return;

    this.#state = 'connected';
    this.emit('connected', appId);
  }

  disconnected(): void {
    this.#registration.signal();
    if (this.#state === 'terminated') return;

    this.#state = 'disconnected';
    this.logger.warn('disconnected from cluster, waiting for reconnection');
    this.emit('disconnected');
  }

  dead(reason: string): void {
    this.#registration.signal();
    if (this.#stopping) return;

    this.#state = 'terminated';
    this.logger.child({ reason }).error('application has been killed');
    this.scheduler.error(reason);
    this.emit('dead', reason);

    // no more work can run, so take the whole application down
    (async () => {
      await this.#appContext.stop();
    })().catch((error: unknown) => {
      this.logger.child({ error }).error('failed to stop application after cluster loss');
    });
  }

  executorAdded(
    fullId: string,
    workerId: string,
    hostPort: string,
    cores: number,
    memoryMb: number,
  ): void {
    this.logger
      .child({ fullId, workerId, hostPort, cores, memory: megabytesToString(memoryMb) })
      .info('granted executor');
    this.emit('executor_added', { fullId, workerId, hostPort, cores, memoryMb });
  }

  /* @throws {@link MalformedExecutorIdError} if `fullId` is not `<workerId>/<executorId>` */
  executorRemoved(fullId: string, message: string, exitCode?: number): void {
    const reason = classifyExecutorLoss(exitCode, message);
    const executorId = executorIdFromFullId(fullId);

    this.logger.child({ fullId, message, exitCode }).info('executor removed');
    this.emit('executor_removed', executorId, reason);
    this.removeExecutor(executorId, describeLossReason(reason));
  }

  sufficientResourcesRegistered(): boolean {
    return sufficientResourcesRegistered({
      registeredCores: this.totalCoreCount,
      expectedCores: this.totalExpectedCores,
      minRatio: this.minRegisteredRatio,
    });
  }

  /** The master-assigned ID, or the generated fallback if the master has not answered yet. */
  applicationId(): string {
    if (this.#appId === undefined) {
      this.logger.warn('application ID is not initialized yet');
      return super.applicationId();
    }
    return this.#appId;
  }
}
