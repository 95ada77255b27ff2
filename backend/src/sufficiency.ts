// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0

export interface ResourceCounters {
  /** Cores currently registered by executors. */
  registeredCores: number;
  /** Cores requested from the cluster, 0 when there is no cap. */
  expectedCores: number;
  /** Fraction of {@link ResourceCounters.expectedCores} required, in [0, 1]. */
  minRatio: number;
}

/**
 * Whether enough cores have registered to start handing out work.
 * Always true when no core cap was requested.
 */
export function sufficientResourcesRegistered({
  registeredCores,
  expectedCores,
  minRatio,
}: ResourceCounters): boolean {
  return registeredCores >= expectedCores * minRatio;
}
