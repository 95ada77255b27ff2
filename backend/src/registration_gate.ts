// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { Event } from './utils.js';

/**
 * Single-fire gate that holds back start-up until the master has either accepted
 * the application or given up on it.
 *
 * @remarks
 * {@link RegistrationGate.signal} may be called any number of times from any
 * callback; only the first one has an effect. {@link RegistrationGate.wait} resolves
 * immediately once the gate is open. There is no timeout: the master client is
 * expected to report `dead` when it cannot reach any master.
 */
export class RegistrationGate {
  #event = new Event();

  get done(): boolean {
    return this.#event.isSet;
  }

  async wait(): Promise<void> {
    await this.#event.wait();
  }

  signal(): void {
    this.#event.set();
  }
}
