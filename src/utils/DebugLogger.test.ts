import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import DebugLogger from './DebugLogger';

describe('DebugLogger', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'debug-log-'));
  });

  afterEach(async () => {
    DebugLogger.configure(undefined);
    await fs.promises.rm(directory, { recursive: true, force: true });
  });

  it('does nothing until a file is configured', () => {
    DebugLogger.configure(undefined);
    DebugLogger.log('ignored');

    expect(fs.readdirSync(directory)).toEqual([]);
  });

  it('appends messages with their data, creating the directory', () => {
    const file = path.join(directory, 'logs', 'debug.log');
    DebugLogger.configure(file);

    DebugLogger.log('Retrieved emails', { k: 2 });

    const contents = fs.readFileSync(file, 'utf8');
    expect(contents).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] Retrieved emails\n/);
    expect(contents).toContain('"k": 2');
  });
});
