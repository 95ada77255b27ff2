// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0

/** Exit codes an executor process uses to report why it gave up. */
export enum ExecutorExitCode {
  UNCAUGHT_EXCEPTION = 50,
  UNCAUGHT_EXCEPTION_TWICE = 51,
  OOM = 52,
  DISK_STORE_FAILED_TO_CREATE_DIR = 53,
}

/** The executor process exited and the worker reported its exit code. */
export interface ExecutorExited {
  type: 'exited';
  exitCode: number;
}

/** The executor went away without an exit code, e.g. its worker was lost. */
export interface ExecutorLost {
  type: 'lost';
  message: string;
}

export type ExecutorLossReason = ExecutorExited | ExecutorLost;

export function explainExitCode(exitCode: number): string {
  switch (exitCode) {
    case ExecutorExitCode.UNCAUGHT_EXCEPTION:
      return 'Uncaught exception';
    case ExecutorExitCode.UNCAUGHT_EXCEPTION_TWICE:
      return 'Uncaught exception, and logging the exception failed';
    case ExecutorExitCode.OOM:
      return 'OutOfMemoryError';
    case ExecutorExitCode.DISK_STORE_FAILED_TO_CREATE_DIR:
      return 'Failed to create local directory (bad local dir setting?)';
    default: {
      // exit codes above 128 mean the process was killed by signal (code - 128)
      const signal = exitCode > 128 ? ` (died from signal ${exitCode - 128}?)` : '';
      return `Unknown executor exit code (${exitCode})${signal}`;
    }
  }
}

/**
 * Maps an executor removal reported by the master to a loss reason.
 *
 * A known exit code always means the process exited; without one the executor is
 * considered lost, carrying the master's message.
 */
export function classifyExecutorLoss(
  exitCode: number | undefined,
  message: string,
): ExecutorLossReason {
  if (exitCode !== undefined) {
    return { type: 'exited', exitCode };
  }
  return { type: 'lost', message };
}

export function describeLossReason(reason: ExecutorLossReason): string {
  switch (reason.type) {
    case 'exited':
      return explainExitCode(reason.exitCode);
    case 'lost':
      return reason.message || 'Worker lost';
  }
}
