// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { z } from 'zod';
import { InvalidOptionsError } from './errors.js';

const MASTER_URL_PATTERN = /^standalone:\/\/[^/:\s]+:\d+$/;

const DEFAULT_MAX_REGISTERED_WAITING_TIME = 30 * 1000;
const DEFAULT_EXECUTOR_MEMORY_MB = 1024;

export const backendOptionsSchema = z.object({
  masters: z
    .array(z.string().regex(MASTER_URL_PATTERN, 'expected standalone://host:port'))
    .nonempty('at least one master URL is required'),
  appName: z.string().min(1, 'appName is required'),
  maxCores: z.number().int().min(1).optional(),
  minRegisteredRatio: z.number().min(0).max(1),
  maxRegisteredWaitingTime: z.number().int().nonnegative(),
  executorMemory: z.number().int().min(1),
  driverHost: z.string().min(1),
  driverPort: z.number().int().min(0).max(65535),
  executorExtraOptions: z.string().optional(),
  executorExtraClassPath: z.string().optional(),
  executorExtraLibraryPath: z.string().optional(),
  executorEnv: z.record(z.string(), z.string()),
  appUIAddress: z.string(),
  eventLogDir: z.string().optional(),
  eventLogCodec: z.string().min(1).optional(),
  executorStartupConf: z.record(z.string().min(1), z.string()),
  defaultParallelism: z.number().int().min(1).optional(),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']),
});

export type ResolvedBackendOptions = z.infer<typeof backendOptionsSchema>;

/**
 * Data class describing how the backend attaches to a standalone cluster.
 *
 * @remarks
 * Only `appName` and the master URLs are mandatory; the masters may instead come
 * from `CLUSTER_MASTERS`. Values are checked by {@link resolveBackendOptions} when the
 * backend is constructed, not here.
 */
export class BackendOptions {
  masters: string[];
  appName: string;
  maxCores?: number;
  minRegisteredRatio: number;
  maxRegisteredWaitingTime: number;
  executorMemory: number;
  driverHost: string;
  driverPort?: number;
  executorExtraOptions?: string;
  executorExtraClassPath?: string;
  executorExtraLibraryPath?: string;
  executorEnv: Record<string, string>;
  appUIAddress: string;
  eventLogDir?: string;
  eventLogCodec?: string;
  executorStartupConf: Record<string, string>;
  defaultParallelism?: number;
  logLevel: string;

  constructor({
    masters = [],
    appName,
    maxCores = undefined,
    minRegisteredRatio = 0,
    maxRegisteredWaitingTime = DEFAULT_MAX_REGISTERED_WAITING_TIME,
    executorMemory = DEFAULT_EXECUTOR_MEMORY_MB,
    driverHost = '',
    driverPort = undefined,
    executorExtraOptions = undefined,
    executorExtraClassPath = undefined,
    executorExtraLibraryPath = undefined,
    executorEnv = {},
    appUIAddress = '',
    eventLogDir = undefined,
    eventLogCodec = undefined,
    executorStartupConf = {},
    defaultParallelism = undefined,
    logLevel = '',
  }: {
    /** Master URLs, `standalone://host:port`. Several masters mean a standby setup. */
    masters?: string[];
    appName: string;
    /** Upper bound on cores requested across all executors. Unset requests as many as possible. */
    maxCores?: number;
    /** Fraction of `maxCores` that must register before work is released, in [0, 1]. */
    minRegisteredRatio?: number;
    /** Milliseconds after which work is released even if `minRegisteredRatio` was not reached. */
    maxRegisteredWaitingTime?: number;
    /** Memory per executor in megabytes. */
    executorMemory?: number;
    driverHost?: string;
    driverPort?: number;
    /** Extra runtime options for executor processes, shell-quoted. */
    executorExtraOptions?: string;
    executorExtraClassPath?: string;
    executorExtraLibraryPath?: string;
    executorEnv?: Record<string, string>;
    appUIAddress?: string;
    eventLogDir?: string;
    /** Compression codec of the event log, passed on to the master with `eventLogDir`. */
    eventLogCodec?: string;
    /** Settings executors need before they can reach the driver, passed as `--conf key=value`. */
    executorStartupConf?: Record<string, string>;
    defaultParallelism?: number;
    logLevel?: string;
  }) {
    this.masters = masters;
    this.appName = appName;
    this.maxCores = maxCores;
    this.minRegisteredRatio = minRegisteredRatio;
    this.maxRegisteredWaitingTime = maxRegisteredWaitingTime;
    this.executorMemory = executorMemory;
    this.driverHost = driverHost;
    this.driverPort = driverPort;
    this.executorExtraOptions = executorExtraOptions;
    this.executorExtraClassPath = executorExtraClassPath;
    this.executorExtraLibraryPath = executorExtraLibraryPath;
    this.executorEnv = executorEnv;
    this.appUIAddress = appUIAddress;
    this.eventLogDir = eventLogDir;
    this.eventLogCodec = eventLogCodec;
    this.executorStartupConf = executorStartupConf;
    this.defaultParallelism = defaultParallelism;
    this.logLevel = logLevel;
  }
}

const envNumber = (value: string | undefined): number | undefined =>
  value === undefined || value === '' ? undefined : Number(value);

/**
 * Fills unset options from the environment and validates the result.
 *
 * @throws {@link InvalidOptionsError} if any option is out of range
 */
export function resolveBackendOptions(
  opts: BackendOptions,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedBackendOptions {
  const masters =
    opts.masters.length > 0
      ? opts.masters
      : (env.CLUSTER_MASTERS ?? '')
          .split(',')
          .map((m) => m.trim())
          .filter((m) => m !== '');

  const result = backendOptionsSchema.safeParse({
    ...opts,
    masters,
    maxCores: opts.maxCores ?? envNumber(env.CLUSTER_MAX_CORES),
    driverHost: opts.driverHost || env.DRIVER_HOST || 'localhost',
    driverPort: opts.driverPort ?? envNumber(env.DRIVER_PORT) ?? 0,
    logLevel: opts.logLevel || env.LOG_LEVEL || 'info',
  });

  if (!result.success) {
    throw new InvalidOptionsError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}
