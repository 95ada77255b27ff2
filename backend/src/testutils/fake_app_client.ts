// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import type { ApplicationDescription } from '../app_description.js';
import type { AppClient, AppClientFactory, AppClientListener } from '../types.js';

export type FakeAppClientOptions = {
  /** Reported as `connected` right after `start()`; the master stays silent when unset. */
  appIdOnStart?: string;
};

/**
 * In-process stand-in for a master client. Tests drive the callbacks through
 * {@link FakeAppClient.listener}.
 */
export class FakeAppClient implements AppClient {
  readonly masters: readonly string[];
  readonly description: ApplicationDescription;
  readonly listener: AppClientListener;
  startCalls = 0;
  stopCalls = 0;
  #appIdOnStart?: string;

  constructor(
    masters: readonly string[],
    description: ApplicationDescription,
    listener: AppClientListener,
    { appIdOnStart }: FakeAppClientOptions = {},
  ) {
    this.masters = masters;
    this.description = description;
    this.listener = listener;
    this.#appIdOnStart = appIdOnStart;
  }

  start(): void {
    this.startCalls++;
    if (this.#appIdOnStart !== undefined) {
      this.listener.connected(this.#appIdOnStart);
    }
  }

  stop(): void {
    this.stopCalls++;
    this.listener.dead('application stopped');
  }
}

/** Factory that keeps every client it creates, most recent last. */
export const fakeAppClientFactory = (opts: FakeAppClientOptions = {}) => {
  const clients: FakeAppClient[] = [];
  const factory: AppClientFactory = (masters, description, listener) => {
    const client = new FakeAppClient(masters, description, listener, opts);
    clients.push(client);
    return client;
  };
  return { factory, clients };
};
