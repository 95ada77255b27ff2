// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { delimiter } from 'node:path';
import type { ResolvedBackendOptions } from './options.js';
import { splitCommandString } from './utils.js';

export const EXECUTOR_ENTRYPOINT = 'executor-backend';
export const DRIVER_ENDPOINT_NAME = 'scheduler';

/** Command a worker runs to launch an executor. `{{...}}` placeholders are filled in by the worker. */
export interface ExecutorCommand {
  entrypoint: string;
  args: string[];
  environment: Record<string, string>;
  classPathEntries: string[];
  libraryPathEntries: string[];
  runtimeOptions: string[];
}

/** What the driver sends to the master when registering the application. */
export interface ApplicationDescription {
  name: string;
  maxCores?: number;
  memoryPerExecutorMb: number;
  command: ExecutorCommand;
  appUIAddress: string;
  eventLogDir?: string;
  eventLogCodec?: string;
}

/** URL executors use to reach the driver's scheduler endpoint. */
export function driverUrl(host: string, port: number): string {
  return `tcp://driver@${host}:${port}/${DRIVER_ENDPOINT_NAME}`;
}

/** `executorStartupConf` as `--conf key=value` pairs, ordered by key. */
export function startupConfOptions(conf: Record<string, string>): string[] {
  return Object.keys(conf)
    .sort()
    .flatMap((key) => ['--conf', `${key}=${conf[key]}`]);
}

const splitPaths = (paths: string | undefined): string[] =>
  paths ? paths.split(delimiter).filter((p) => p !== '') : [];

export function buildExecutorCommand(opts: ResolvedBackendOptions): ExecutorCommand {
  const args = [
    '--driver-url',
    driverUrl(opts.driverHost, opts.driverPort),
    '--executor-id',
    '{{EXECUTOR_ID}}',
    '--hostname',
    '{{HOSTNAME}}',
    '--cores',
    '{{CORES}}',
    '--app-id',
    '{{APP_ID}}',
    '--worker-url',
    '{{WORKER_URL}}',
  ];

  return {
    entrypoint: EXECUTOR_ENTRYPOINT,
    args,
    environment: { ...opts.executorEnv },
    classPathEntries: splitPaths(opts.executorExtraClassPath),
    libraryPathEntries: splitPaths(opts.executorExtraLibraryPath),
    runtimeOptions: [
      ...startupConfOptions(opts.executorStartupConf),
      ...(opts.executorExtraOptions ? splitCommandString(opts.executorExtraOptions) : []),
    ],
  };
}

export function buildApplicationDescription(opts: ResolvedBackendOptions): ApplicationDescription {
  return {
    name: opts.appName,
    maxCores: opts.maxCores,
    memoryPerExecutorMb: opts.executorMemory,
    command: buildExecutorCommand(opts),
    appUIAddress: opts.appUIAddress,
    eventLogDir: opts.eventLogDir,
    eventLogCodec: opts.eventLogDir ? opts.eventLogCodec : undefined,
  };
}
