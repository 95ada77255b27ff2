// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0

/**
 * Driver-side scheduler backend that registers an application with a standalone cluster
 * master and tracks the executors granted to it.
 *
 * @packageDocumentation
 */
import * as testutils from './testutils/index.js';

export * from './app_description.js';
export * from './coarse_grained_backend.js';
export * from './errors.js';
export * from './log.js';
export * from './loss_reason.js';
export * from './options.js';
export * from './registration_gate.js';
export * from './standalone_backend.js';
export * from './sufficiency.js';
export * from './types.js';
export * from './utils.js';
export * from './version.js';

export { testutils };
