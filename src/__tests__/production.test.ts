import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ProductionExecutor, buildProductionPrompt } from '../executors/production.js';
import { FakeLLM, runExecutor, makeWorkspace, removeDir, type TestWorkspace } from './fixtures.js';

describe('ProductionExecutor', () => {
  let ws: TestWorkspace;

  beforeEach(() => {
    ws = makeWorkspace();
  });

  afterEach(() => {
    removeDir(ws.root);
  });

  it('should build the prompt around the description', () => {
    expect(buildProductionPrompt('Landingpage').split('\n')[0]).toBe('Aufgabe: Landingpage');
  });

  it('should write <job_id>_output.md and log completion', async () => {
    const llm = new FakeLLM(['- P0: Angebot schreiben']);
    const result = await runExecutor(
      new ProductionExecutor(),
      { job_type: 'production', job_id: 'job_20261019_080503', description: 'Angebot' },
      ws,
      { llm }
    );
    const outPath = path.join(ws.resultsDir, 'job_20261019_080503_output.md');

    expect(result.ok).toBe(true);
    expect(Object.values(result.deliverables)).toEqual([outPath]);
    expect(fs.readFileSync(outPath, 'utf-8')).toBe('- P0: Angebot schreiben');
    expect(fs.readFileSync(path.join(ws.opsLogDir, '2026-10-19.md'), 'utf-8')).toBe(
      `- [08:05:03Z] JOB completed: job_20261019_080503 -> ${outPath}\n`
    );
    expect(llm.calls[0].prompt.startsWith('Aufgabe: Angebot\n')).toBe(true);
  });

  it('should ask for a description', async () => {
    const result = await runExecutor(new ProductionExecutor(), { job_type: 'production', job_id: 'j' }, ws);

    expect(result.ok).toBe(false);
    expect(result.needs).toEqual({ missing: ['description'], hint: 'description im Job setzen.' });
  });

  it('should fail without provider and on provider errors', async () => {
    const noProvider = await runExecutor(new ProductionExecutor(), { description: 'x', job_id: 'j' }, ws);
    expect(noProvider.ok).toBe(false);
    expect(noProvider.message).toBe('Kein LLM-Provider konfiguriert (OPENAI_API_KEY / ANTHROPIC_API_KEY)');

    const failing = await runExecutor(
      new ProductionExecutor(),
      { description: 'x', job_id: 'j' },
      ws,
      { llm: new FakeLLM([new Error('timeout')]) }
    );
    expect(failing.message).toBe('PRODUCTION failed: Error: timeout');
    expect(fs.existsSync(path.join(ws.resultsDir, 'j_output.md'))).toBe(false);
  });

  it('should keep the output file inside the results directory', async () => {
    const result = await runExecutor(
      new ProductionExecutor(),
      { description: 'x', job_id: '../out' },
      ws,
      { llm: new FakeLLM(['Plan']) }
    );
    const outPath = path.join(ws.resultsDir, '__out_output.md');

    expect(result).toMatchObject({ ok: true, jobId: '../out' });
    expect(Object.values(result.deliverables)).toEqual([outPath]);
    expect(fs.readFileSync(outPath, 'utf-8')).toBe('Plan');
    expect(fs.existsSync(path.join(ws.root, 'out_output.md'))).toBe(false);
  });
});
