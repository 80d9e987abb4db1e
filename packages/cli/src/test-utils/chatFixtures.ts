/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Writable } from 'node:stream';
import type { FakeTurn } from '@steadychat/core';
import type { ChatIO } from '../nonInteractiveChat.js';

export interface CapturedIO extends ChatIO {
  stdoutText(): string;
  stderrText(): string;
}

function capture(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

/**
 * In-memory stdout/stderr with the given environment.
 */
export function createCapturedIO(env: NodeJS.ProcessEnv = {}): CapturedIO {
  const stdout = capture();
  const stderr = capture();
  return {
    stdout: stdout.stream,
    stderr: stderr.stream,
    env,
    stdoutText: stdout.text,
    stderrText: stderr.text,
  };
}

/**
 * Scratch directory for env and fake-response files.
 */
export class ScratchDir {
  readonly path = mkdtempSync(join(tmpdir(), 'steadychat-cli-'));

  file(name: string, content: string): string {
    const filePath = join(this.path, name);
    writeFileSync(filePath, content);
    return filePath;
  }

  turns(name: string, turns: FakeTurn[]): string {
    return this.file(
      name,
      turns.map((turn) => JSON.stringify(turn)).join('\n') + '\n',
    );
  }

  /** Path inside the directory that does not exist. */
  missing(name: string): string {
    return join(this.path, name);
  }

  remove(): void {
    rmSync(this.path, { recursive: true, force: true });
  }
}
