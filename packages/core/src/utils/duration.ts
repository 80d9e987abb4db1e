/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  µs: 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const SEGMENT = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|ms|s|m|h)/y;
const BARE_NUMBER = /^(\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Parses a duration such as `300ms`, `1.5s` or `1h30m` into milliseconds.
 * A bare number is read as seconds. Returns `undefined` when the input is
 * not a valid duration.
 */
export function parseDuration(input: string): number | undefined {
  const text = input.trim();
  if (text === '') {
    return undefined;
  }

  if (BARE_NUMBER.test(text)) {
    return Number(text) * 1000;
  }

  let total = 0;
  let position = 0;
  SEGMENT.lastIndex = 0;
  while (position < text.length) {
    SEGMENT.lastIndex = position;
    const match = SEGMENT.exec(text);
    if (!match) {
      return undefined;
    }
    const [segment, amount, unit] = match;
    const factor = UNIT_MS[unit];
    if (factor === undefined) {
      return undefined;
    }
    total += Number(amount) * factor;
    position += segment.length;
  }
  return total;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}
