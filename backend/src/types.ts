// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import type { ApplicationDescription } from './app_description.js';

/** Connection from the driver to the standalone cluster master. */
export interface AppClient {
  /** Begins registering the application. Must not block until registration completes. */
  start(): void;
  /**
   * Unregisters the application and closes the connection. Implementations must report
   * `dead` (or `disconnected`) to their listener once the connection is gone.
   */
  stop(): void;
}

/**
 * Callbacks an {@link AppClient} delivers. They may arrive in any order and more than once.
 */
export interface AppClientListener {
  connected(appId: string): void;

  /** Connection lost; the client may still reconnect. */
  disconnected(): void;

  /** The application was killed or no master could be reached. */
  dead(reason: string): void;

  executorAdded(
    fullId: string,
    workerId: string,
    hostPort: string,
    cores: number,
    memoryMb: number,
  ): void;

  executorRemoved(fullId: string, message: string, exitCode?: number): void;
}

export type AppClientFactory = (
  masters: readonly string[],
  description: ApplicationDescription,
  listener: AppClientListener,
) => AppClient;

/** The scheduler that owns the backend. */
export interface TaskScheduler {
  /** Reports an error that aborts all running and pending work. */
  error(message: string): void;
  executorLost(executorId: string, reason: string): void;
}

/** The application hosting the scheduler, stopped when the cluster gives up on it. */
export interface ApplicationContext {
  stop(): void | Promise<void>;
}
