// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { describe, expect, it } from 'vitest';
import * as logModule from './log.js';

describe('log', () => {
  it('throws before the logger is initialized', () => {
    expect(() => logModule.log()).toThrow(TypeError);
  });

  it('uses the configured level', () => {
    logModule.initializeLogger({ pretty: false, level: 'warn' });
    expect(logModule.log().level).toBe('warn');

    logModule.initializeLogger({ pretty: false });
    expect(logModule.log().level).toBe('info');
  });

  it('exposes only the accessor and its initializer', () => {
    expect(Object.keys(logModule).sort()).toEqual(['initializeLogger', 'log']);
  });
});
