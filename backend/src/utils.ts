// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0

export const noop = () => {};

/** @internal */
export class Event {
  #isSet = false;
  #waiters: Array<() => void> = [];

  async wait() {
    if (this.#isSet) return true;

    let resolve: () => void = noop;
    const waiter = new Promise<void>((r) => {
      resolve = r;
      this.#waiters.push(resolve);
    });

    try {
      await waiter;
      return true;
    } finally {
      const index = this.#waiters.indexOf(resolve);
      if (index !== -1) {
        this.#waiters.splice(index, 1);
      }
    }
  }

  get isSet(): boolean {
    return this.#isSet;
  }

  set(): void {
    if (this.#isSet) return;

    this.#isSet = true;
    this.#waiters.forEach((resolve) => resolve());
    this.#waiters = [];
  }
}

export type DelayOptions = {
  signal?: AbortSignal;
};

/**
 * Delay for a given number of milliseconds.
 *
 * @param ms - The number of milliseconds to delay.
 * @param options - The options for the delay.
 * @returns A promise that resolves after the delay.
 */
export function delay(ms: number, options: DelayOptions = {}): Promise<void> {
  const { signal } = options;
  if (signal?.aborted) return Promise.reject(signal.reason);
  return new Promise((resolve, reject) => {
    const abort = () => {
      clearTimeout(i);
      reject(signal?.reason);
    };
    const done = () => {
      signal?.removeEventListener('abort', abort);
      resolve();
    };
    const i = setTimeout(done, ms);
    signal?.addEventListener('abort', abort, { once: true });
  });
}

const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;
const TB = GB * 1024;

/**
 * Formats a byte count with the largest unit that still leaves at least 2 of it,
 * e.g. `2048` is `2.0 KB` but `2047` is `2047.0 B`.
 */
export function bytesToString(size: number): string {
  let value: number;
  let unit: string;
  if (size >= 2 * TB) {
    [value, unit] = [size / TB, 'TB'];
  } else if (size >= 2 * GB) {
    [value, unit] = [size / GB, 'GB'];
  } else if (size >= 2 * MB) {
    [value, unit] = [size / MB, 'MB'];
  } else if (size >= 2 * KB) {
    [value, unit] = [size / KB, 'KB'];
  } else {
    [value, unit] = [size, 'B'];
  }
  return `${value.toFixed(1)} ${unit}`;
}

export function megabytesToString(megabytes: number): string {
  return bytesToString(megabytes * MB);
}

/**
 * Splits a command line into words the way a POSIX shell would after its own expansion.
 *
 * Single quotes are literal, a backslash inside double quotes escapes the next character,
 * and a quoted empty string (`''` or `""`) yields an empty word.
 */
export function splitCommandString(s: string): string[] {
  const words: string[] = [];
  let inWord = false;
  let inSingleQuote = false;
  let inDoubleQuote = false;
  let current = '';

  const endWord = () => {
    words.push(current);
    current = '';
  };

  for (let i = 0; i < s.length; i++) {
    const char = s.charAt(i);
    if (inDoubleQuote) {
      if (char === '"') {
        inDoubleQuote = false;
      } else if (char === '\\') {
        if (i < s.length - 1) {
          current += s.charAt(i + 1);
          i++;
        }
      } else {
        current += char;
      }
    } else if (inSingleQuote) {
      if (char === "'") {
        inSingleQuote = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      inWord = true;
      inDoubleQuote = true;
    } else if (char === "'") {
      inWord = true;
      inSingleQuote = true;
    } else if (!/\s/.test(char)) {
      current += char;
      inWord = true;
    } else if (inWord) {
      endWord();
      inWord = false;
    }
  }

  if (inWord || inDoubleQuote || inSingleQuote) {
    endWord();
  }
  return words;
}
