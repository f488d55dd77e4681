/**
 * Tests fuer den ROI_SCAN Executor
 */

import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  RoiScanExecutor,
  buildLlmPrompt,
  buildRoiPlanMarkdown,
  detectMode,
  pickGoal,
} from '../executors/roiScan.js';
import { FakeLLM, FIXED_NOW, runExecutor, makeWorkspace, removeDir, type TestWorkspace } from './fixtures.js';

describe('ROI_SCAN helpers', () => {
  it('should default to template mode', () => {
    expect(detectMode({ task: 'ROI_SCAN' })).toBe('template');
    expect(detectMode({ mode: 'LLM' })).toBe('llm');
    expect(detectMode({ input: { mode: 'llm' } })).toBe('llm');
  });

  it('should pick the goal from goal, objective or input.goal', () => {
    expect(pickGoal({ goal: ' A ' })).toBe('A');
    expect(pickGoal({ objective: 'B' })).toBe('B');
    expect(pickGoal({ input: { goal: 'C' } })).toBe('C');
    expect(pickGoal({})).toBe('');
  });

  it('should render the template with input fields and defaults', () => {
    const md = buildRoiPlanMarkdown(
      { created_at: '2026-01-01T00:00:00Z', input: { goal: 'G', budget: 100 }, rules: ['r1'], focus: [] },
      'job-1',
      'ID={{job_id}} C={{created}} G={{goal}} B={{budget}} M={{market}}\n\n',
      FIXED_NOW
    );

    expect(md).toBe('ID=job-1 C=2026-01-01T00:00:00Z G=G B=100 M=Global\n\n---\n\n## Regeln\n\n- r1\n');
  });

  it('should fall back to now for the created date', () => {
    const md = buildRoiPlanMarkdown({}, 'j', '{{created}}', FIXED_NOW);
    expect(md).toBe('2026-10-19T08:05:03Z\n');
  });

  it('should include goal, rules and focus in the prompt', () => {
    const prompt = buildLlmPrompt({ timeframe: '48h', rules: ['legal'], focus: ['API'] }, 'Umsatz');

    expect(prompt.startsWith('Erstelle einen ROI-Plan, HANDLUNGSORIENTIERT und kurz.\nZiel: Umsatz\nZeitrahmen: 48h')).toBe(true);
    expect(prompt).toContain('Regeln:\n- legal');
    expect(prompt).toContain('Fokus:\n- API');
    expect(prompt.endsWith('- Keine Theorie, keine langen Erklärungen.')).toBe(true);
  });
});

describe('RoiScanExecutor', () => {
  let ws: TestWorkspace;

  beforeEach(() => {
    ws = makeWorkspace();
  });

  afterEach(() => {
    removeDir(ws.root);
  });

  it('should write the plan from the bundled template', async () => {
    const result = await runExecutor(new RoiScanExecutor(), { task: 'ROI_SCAN', job_id: 'job-7' }, ws);
    const planPath = path.join(ws.resultsDir, 'ROI_PLAN.md');

    expect(result.ok).toBe(true);
    expect(result.jobId).toBe('job-7');
    expect(result.message).toBe('ROI_SCAN executed (template).');
    expect(result.deliverables).toEqual({
      'agent_results/ROI_PLAN.md': planPath,
      'ops/logs/AUTORUN_LOG.md': path.join(ws.opsLogDir, 'AUTORUN_LOG.md'),
    });
    expect(fs.readFileSync(planPath, 'utf-8')).toContain('Job ID: job-7\n');
    expect(fs.readFileSync(path.join(ws.opsLogDir, 'AUTORUN_LOG.md'), 'utf-8')).toBe(
      '2026-10-19T08:05:03Z [INFO] ROI_SCAN job_id=job-7 start mode=template\n' +
        `2026-10-19T08:05:03Z [INFO] ROI_SCAN job_id=job-7 wrote ${planPath}\n`
    );
  });

  it('should write ROI_FAILED.md when the template is missing', async () => {
    const executor = new RoiScanExecutor({ templatePath: path.join(ws.root, 'missing.md') });
    const result = await runExecutor(executor, { task: 'ROI_SCAN', job_id: 'job-8' }, ws);

    expect(result.ok).toBe(false);
    expect(result.message).toContain('ENOENT');
    const failedPath = path.join(ws.resultsDir, 'ROI_FAILED.md');
    expect(result.deliverables).toEqual({ 'agent_results/ROI_FAILED.md': failedPath });
    expect(fs.readFileSync(failedPath, 'utf-8').startsWith('# TASK FAILED\n\n- time: 2026-10-19T08:05:03Z\n')).toBe(true);
  });

  it('should ask for a goal in llm mode', async () => {
    const result = await runExecutor(new RoiScanExecutor(), { task: 'ROI_SCAN', mode: 'llm' }, ws);

    expect(result.ok).toBe(false);
    expect(result.message).toBe('Missing required field: goal');
    expect(result.needs).toMatchObject({ missing: ['goal'] });
  });

  it('should report a missing provider in llm mode', async () => {
    const result = await runExecutor(new RoiScanExecutor(), { task: 'ROI_SCAN', mode: 'llm', goal: 'X' }, ws);

    expect(result.ok).toBe(false);
    expect(result.needs).toMatchObject({ missing: ['llm_provider_working'] });
  });

  it('should write the LLM plan with a heading and footer', async () => {
    const llm = new FakeLLM(['Plan text']);
    const result = await runExecutor(
      new RoiScanExecutor(),
      { task: 'ROI_SCAN', mode: 'llm', goal: 'Umsatz', job_id: 'job-9' },
      ws,
      { llm }
    );

    expect(result.ok).toBe(true);
    expect(result.message).toBe('ROI_SCAN executed (llm).');
    expect(result.usage).toEqual({ promptTokens: 10, completionTokens: 5, totalTokens: 15 });
    expect(llm.calls[0].prompt).toContain('Ziel: Umsatz');
    expect(llm.calls[0].options).toEqual({ maxTokens: 1200 });
    expect(fs.readFileSync(path.join(ws.resultsDir, 'ROI_PLAN.md'), 'utf-8')).toBe(
      '## ROI PLAN\n\nPlan text\n\n---\nGenerated: 20261019T080503Z (UTC)\nJob: ROI_SCAN\n'
    );
  });

  it('should keep an existing ROI PLAN heading', async () => {
    const llm = new FakeLLM(['## ROI PLAN\n\n- a']);
    await runExecutor(new RoiScanExecutor(), { task: 'ROI_SCAN', mode: 'llm', goal: 'Umsatz' }, ws, { llm });

    expect(fs.readFileSync(path.join(ws.resultsDir, 'ROI_PLAN.md'), 'utf-8').startsWith('## ROI PLAN\n\n- a\n\n---')).toBe(true);
  });

  it('should fail on provider errors and empty answers', async () => {
    const failing = await runExecutor(
      new RoiScanExecutor(),
      { task: 'ROI_SCAN', mode: 'llm', goal: 'X' },
      ws,
      { llm: new FakeLLM([new Error('boom')]) }
    );
    expect(failing.ok).toBe(false);
    expect(failing.message).toBe('LLM-Aufruf fehlgeschlagen: Error: boom');

    const empty = await runExecutor(
      new RoiScanExecutor(),
      { task: 'ROI_SCAN', mode: 'llm', goal: 'X' },
      ws,
      { llm: new FakeLLM(['   ']) }
    );
    expect(empty.ok).toBe(false);
    expect(empty.message).toBe('LLM returned empty text');
  });
});
