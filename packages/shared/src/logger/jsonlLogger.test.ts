import { describe, it, expect, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { JsonlLogger } from './jsonlLogger';
import { ConsoleLogger } from './consoleLogger';
import type { FileProcessed, RunStarted } from '../types/events';

describe('JsonlLogger', () => {
  let tmpDir: string | undefined;

  afterEach(async () => {
    vi.restoreAllMocks();
    if (tmpDir) {
      await fs.rm(tmpDir, { recursive: true, force: true });
      tmpDir = undefined;
    }
  });

  const started: RunStarted = {
    schemaVersion: 1,
    timestamp: '2026-01-01T00:00:00Z',
    runId: 'run-1',
    type: 'RunStarted',
    payload: { mode: 'rewrite', configPath: 'config.json', targets: ['.'], protocol: 'https' },
  };

  it('appends events to the file in JSONL format', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'gitremap-logger-test-'));
    const logPath = path.join(tmpDir, 'run.jsonl');
    const logger = new JsonlLogger(logPath, new ConsoleLogger());

    const processed: FileProcessed = {
      schemaVersion: 1,
      timestamp: '2026-01-01T00:00:01Z',
      runId: 'run-1',
      type: 'FileProcessed',
      payload: { file: 'a/.git/config', matches: 2, replaced: 1, written: true },
    };

    await logger.log(started);
    await logger.log(processed);

    const lines = (await fs.readFile(logPath, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual(started);
    expect(JSON.parse(lines[1])).toEqual(processed);
  });

  it('reports write failures through the wrapped logger instead of throwing', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new JsonlLogger(
      path.join(os.tmpdir(), 'gitremap-missing-dir', 'nested', 'run.jsonl'),
      new ConsoleLogger(),
    );

    await expect(logger.log(started)).resolves.toBeUndefined();
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0][0])).toContain('Failed to write to log file at');
  });

  it('forwards messages and child bindings to the wrapped logger', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = new JsonlLogger('unused.jsonl', new ConsoleLogger());

    logger.child({ file: 'x' }).warn('w');

    expect(warnSpy).toHaveBeenCalledWith('WARNING: [file=x] w');
  });
});
