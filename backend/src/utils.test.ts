// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { describe, expect, it } from 'vitest';
import { Event, bytesToString, delay, megabytesToString, splitCommandString } from './utils.js';

describe('utils', () => {
  describe('Event', () => {
    it('resolves waiters when set and stays set', async () => {
      const event = new Event();
      const waiter = event.wait();
      expect(event.isSet).toBe(false);

      event.set();
      await expect(waiter).resolves.toBe(true);
      expect(event.isSet).toBe(true);
      await expect(event.wait()).resolves.toBe(true);
    });
  });

  describe('delay', () => {
    it('rejects with the abort reason', async () => {
      const controller = new AbortController();
      const pending = delay(1000, { signal: controller.signal });
      controller.abort(new Error('aborted'));
      await expect(pending).rejects.toThrow('aborted');
    });

    it('rejects immediately when already aborted', async () => {
      const controller = new AbortController();
      controller.abort(new Error('already aborted'));
      await expect(delay(1000, { signal: controller.signal })).rejects.toThrow('already aborted');
    });
  });

  describe('bytesToString', () => {
    it('switches unit at twice the unit size', () => {
      expect(bytesToString(2047)).toBe('2047.0 B');
      expect(bytesToString(2048)).toBe('2.0 KB');
      expect(bytesToString(3 * 1024 * 1024 * 1024)).toBe('3.0 GB');
    });
  });

  describe('megabytesToString', () => {
    it('formats executor memory', () => {
      expect(megabytesToString(1)).toBe('1024.0 KB');
      expect(megabytesToString(1024)).toBe('1024.0 MB');
      expect(megabytesToString(4096)).toBe('4.0 GB');
      expect(megabytesToString(2 * 1024 * 1024)).toBe('2.0 TB');
    });
  });

  describe('splitCommandString', () => {
    it('splits on runs of whitespace', () => {
      expect(splitCommandString('  -Xmx1g   -verbose ')).toEqual(['-Xmx1g', '-verbose']);
      expect(splitCommandString('')).toEqual([]);
    });

    it('keeps quoted whitespace inside a word', () => {
      expect(splitCommandString(`-Dname="a b" 'c d'`)).toEqual(['-Dname=a b', 'c d']);
    });

    it('honours backslash escapes only inside double quotes', () => {
      expect(splitCommandString(`"a\\"b"`)).toEqual(['a"b']);
      expect(splitCommandString(`'a\\b'`)).toEqual(['a\\b']);
    });

    it('yields empty words for empty quotes', () => {
      expect(splitCommandString(`'' x`)).toEqual(['', 'x']);
      expect(splitCommandString(`"`)).toEqual(['']);
    });
  });
});
