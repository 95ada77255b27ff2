// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { describe, expect, it } from 'vitest';
import {
  ExecutorExitCode,
  classifyExecutorLoss,
  describeLossReason,
  explainExitCode,
} from './loss_reason.js';

describe('classifyExecutorLoss', () => {
  it('classifies a removal with an exit code as exited, keeping the code', () => {
    for (const code of [0, 1, 52, 137, -1]) {
      expect(classifyExecutorLoss(code, 'exited')).toEqual({ type: 'exited', exitCode: code });
    }
  });

  it('classifies a removal without an exit code as lost, keeping the message', () => {
    for (const message of ['oom', 'worker lost', '']) {
      expect(classifyExecutorLoss(undefined, message)).toEqual({ type: 'lost', message });
    }
  });
});

describe('explainExitCode', () => {
  it('explains known exit codes', () => {
    expect(explainExitCode(ExecutorExitCode.UNCAUGHT_EXCEPTION)).toBe('Uncaught exception');
    expect(explainExitCode(ExecutorExitCode.UNCAUGHT_EXCEPTION_TWICE)).toBe(
      'Uncaught exception, and logging the exception failed',
    );
    expect(explainExitCode(ExecutorExitCode.OOM)).toBe('OutOfMemoryError');
    expect(explainExitCode(ExecutorExitCode.DISK_STORE_FAILED_TO_CREATE_DIR)).toBe(
      'Failed to create local directory (bad local dir setting?)',
    );
  });

  it('mentions the signal for exit codes above 128', () => {
    expect(explainExitCode(137)).toBe('Unknown executor exit code (137) (died from signal 9?)');
    expect(explainExitCode(128)).toBe('Unknown executor exit code (128)');
    expect(explainExitCode(1)).toBe('Unknown executor exit code (1)');
  });
});

describe('describeLossReason', () => {
  it('uses the exit code explanation for exited executors', () => {
    expect(describeLossReason({ type: 'exited', exitCode: 52 })).toBe('OutOfMemoryError');
  });

  it('uses the message for lost executors', () => {
    expect(describeLossReason({ type: 'lost', message: 'oom' })).toBe('oom');
    expect(describeLossReason({ type: 'lost', message: '' })).toBe('Worker lost');
  });
});
