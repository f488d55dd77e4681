import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { WriteResultExecutor, applyWriteResult, resolveOutPath } from '../executors/writeResult.js';
import { InvalidParamsError } from '../utils/errors.js';
import { runExecutor, makeWorkspace, removeDir, type TestWorkspace } from './fixtures.js';

describe('write_result', () => {
  let ws: TestWorkspace;

  beforeEach(() => {
    ws = makeWorkspace();
  });

  afterEach(() => {
    removeDir(ws.root);
  });

  it('should keep every target inside the results directory', () => {
    expect(resolveOutPath(ws.resultsDir, 'agent_results/a.md')).toBe(path.join(ws.resultsDir, 'a.md'));
    expect(resolveOutPath(ws.resultsDir, '/sub/b.md')).toBe(path.join(ws.resultsDir, 'sub', 'b.md'));
    expect(resolveOutPath(ws.resultsDir, '')).toBe(path.join(ws.resultsDir, 'hello.txt'));
    expect(() => resolveOutPath(ws.resultsDir, '../etc/passwd')).toThrow(InvalidParamsError);
  });

  it('should ignore other actions', () => {
    expect(applyWriteResult({ action: 'noop' }, ws.resultsDir)).toEqual({ action: 'noop', written: null });
    expect(applyWriteResult({}, ws.resultsDir)).toEqual({ action: '', written: null });
  });

  it('should write the content', () => {
    const outcome = applyWriteResult(
      { action: 'write_result', out_path: 'agent_results/x.txt', out_content: 42 },
      ws.resultsDir
    );

    expect(outcome.written).toBe(path.join(ws.resultsDir, 'x.txt'));
    expect(fs.readFileSync(path.join(ws.resultsDir, 'x.txt'), 'utf-8')).toBe('42');
  });

  it('should run as an executor and log to the daily ops log', async () => {
    const result = await runExecutor(
      new WriteResultExecutor(),
      { task: 'WRITE_RESULT', job_id: 'w1', out_path: 'note.md', out_content: 'Hallo' },
      ws
    );
    const target = path.join(ws.resultsDir, 'note.md');

    expect(result.ok).toBe(true);
    expect(result.message).toBe(`Wrote: ${target}`);
    expect(fs.readFileSync(target, 'utf-8')).toBe('Hallo');
    expect(fs.readFileSync(path.join(ws.opsLogDir, '2026-10-19.md'), 'utf-8')).toBe(
      `- [08:05:03Z] WRITE_RESULT w1 -> ${target}\n`
    );
  });

  it('should reject an explicit foreign action', async () => {
    const result = await runExecutor(new WriteResultExecutor(), { task: 'WRITE_RESULT', action: 'delete' }, ws);

    expect(result.ok).toBe(false);
    expect(result.message).toBe('Unsupported action: delete');
  });
});
