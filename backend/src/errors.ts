// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0

/** Scheduler backend was used out of order, e.g. started twice. */
export class BackendError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BackendError';
    Error.captureStackTrace(this, BackendError);
  }
}

/** Backend options failed validation. */
export class InvalidOptionsError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid backend options: ${issues.join('; ')}`);
    this.name = 'InvalidOptionsError';
    this.issues = issues;
    Error.captureStackTrace(this, InvalidOptionsError);
  }
}

/**
 * Raised when the master reports an executor whose full ID is not of the form
 * `<workerId>/<executorId>`.
 */
export class MalformedExecutorIdError extends Error {
  readonly fullId: string;

  constructor(fullId: string) {
    super(`malformed executor ID "${fullId}", expected <workerId>/<executorId>`);
    this.name = 'MalformedExecutorIdError';
    this.fullId = fullId;
    Error.captureStackTrace(this, MalformedExecutorIdError);
  }
}
