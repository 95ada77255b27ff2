// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { describe, expect, it } from 'vitest';
import { InvalidOptionsError } from './errors.js';
import { BackendOptions, resolveBackendOptions } from './options.js';

const resolveError = (fn: () => unknown): InvalidOptionsError => {
  try {
    fn();
  } catch (e) {
    if (e instanceof InvalidOptionsError) return e;
    throw e;
  }
  throw new Error('expected InvalidOptionsError');
};

describe('resolveBackendOptions', () => {
  it('applies defaults', () => {
    const opts = resolveBackendOptions(
      new BackendOptions({ appName: 'wordcount', masters: ['standalone://master:7077'] }),
      {},
    );

    expect(opts.masters).toEqual(['standalone://master:7077']);
    expect(opts.maxCores).toBeUndefined();
    expect(opts.minRegisteredRatio).toBe(0);
    expect(opts.maxRegisteredWaitingTime).toBe(30_000);
    expect(opts.executorMemory).toBe(1024);
    expect(opts.driverHost).toBe('localhost');
    expect(opts.driverPort).toBe(0);
    expect(opts.executorEnv).toEqual({});
    expect(opts.executorStartupConf).toEqual({});
    expect(opts.eventLogCodec).toBeUndefined();
    expect(opts.logLevel).toBe('info');
  });

  it('falls back to the environment', () => {
    const opts = resolveBackendOptions(new BackendOptions({ appName: 'wordcount' }), {
      CLUSTER_MASTERS: 'standalone://a:7077, standalone://b:7077,',
      CLUSTER_MAX_CORES: '16',
      DRIVER_HOST: 'driver-1',
      DRIVER_PORT: '4040',
      LOG_LEVEL: 'debug',
    });

    expect(opts.masters).toEqual(['standalone://a:7077', 'standalone://b:7077']);
    expect(opts.maxCores).toBe(16);
    expect(opts.driverHost).toBe('driver-1');
    expect(opts.driverPort).toBe(4040);
    expect(opts.logLevel).toBe('debug');
  });

  it('prefers explicit options over the environment', () => {
    const opts = resolveBackendOptions(
      new BackendOptions({
        appName: 'wordcount',
        masters: ['standalone://explicit:7077'],
        maxCores: 4,
        driverHost: 'driver-2',
      }),
      { CLUSTER_MASTERS: 'standalone://env:7077', CLUSTER_MAX_CORES: '16', DRIVER_HOST: 'env' },
    );

    expect(opts.masters).toEqual(['standalone://explicit:7077']);
    expect(opts.maxCores).toBe(4);
    expect(opts.driverHost).toBe('driver-2');
  });

  it('keeps an explicit ephemeral driver port over the environment', () => {
    const opts = resolveBackendOptions(
      new BackendOptions({
        appName: 'wordcount',
        masters: ['standalone://master:7077'],
        driverPort: 0,
      }),
      { DRIVER_PORT: '4040' },
    );

    expect(opts.driverPort).toBe(0);
  });

  it('rejects an empty startup setting name', () => {
    const error = resolveError(() =>
      resolveBackendOptions(
        new BackendOptions({
          appName: 'wordcount',
          masters: ['standalone://master:7077'],
          executorStartupConf: { '': 'x' },
        }),
        {},
      ),
    );
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^executorStartupConf/);
  });

  it('rejects a minimum ratio outside [0, 1]', () => {
    for (const minRegisteredRatio of [-0.1, 1.5]) {
      const error = resolveError(() =>
        resolveBackendOptions(
          new BackendOptions({
            appName: 'wordcount',
            masters: ['standalone://master:7077'],
            minRegisteredRatio,
          }),
          {},
        ),
      );
      expect(error.issues).toHaveLength(1);
      expect(error.issues[0]).toMatch(/^minRegisteredRatio: /);
    }
  });

  it('requires at least one well-formed master', () => {
    const missing = resolveError(() =>
      resolveBackendOptions(new BackendOptions({ appName: 'wordcount' }), {}),
    );
    expect(missing.issues).toEqual(['masters: at least one master URL is required']);

    const malformed = resolveError(() =>
      resolveBackendOptions(
        new BackendOptions({ appName: 'wordcount', masters: ['http://master:7077'] }),
        {},
      ),
    );
    expect(malformed.issues).toEqual(['masters.0: expected standalone://host:port']);
  });

  it('rejects a non-numeric core cap from the environment', () => {
    const error = resolveError(() =>
      resolveBackendOptions(new BackendOptions({ appName: 'wordcount' }), {
        CLUSTER_MASTERS: 'standalone://master:7077',
        CLUSTER_MAX_CORES: 'lots',
      }),
    );
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^maxCores: /);
  });
});
