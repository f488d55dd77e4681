import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { JobGenerator, newJobId } from '../jobs/generator.js';
import { FIXED_NOW, makeWorkspace, readJson, removeDir, type TestWorkspace } from './fixtures.js';

describe('JobGenerator', () => {
  let ws: TestWorkspace;

  beforeEach(() => {
    ws = makeWorkspace();
  });

  afterEach(() => {
    removeDir(ws.root);
  });

  it('should build sortable job ids', () => {
    expect(newJobId(FIXED_NOW)).toBe('job_20261019_080503');
  });

  it('should enqueue one job from the bundled template', () => {
    const written = new JobGenerator({ outbox: ws.outbox }).generate(FIXED_NOW);

    expect(written).toBe(path.join(ws.outboxDir, 'job_20261019_080503.json'));
    expect(readJson(path.join(ws.outboxDir, 'job_20261019_080503.json'))).toMatchObject({
      job_type: 'production',
      input_files: [],
      owner: 'taskrelay',
      job_id: 'job_20261019_080503',
      status: 'created',
      created_at: '2026-10-19T08:05:03Z',
      updated_at: '2026-10-19T08:05:03Z',
    });
  });

  it('should not overwrite a job from the same second', () => {
    const generator = new JobGenerator({ outbox: ws.outbox });
    generator.generate(FIXED_NOW);

    expect(generator.generate(FIXED_NOW)).toBeNull();
    expect(ws.outbox.countPending()).toBe(1);
  });

  it('should use a custom template and reject non-objects', () => {
    const templatePath = path.join(ws.root, 'tpl.json');
    fs.writeFileSync(templatePath, JSON.stringify({ task: 'ROI_SCAN', rules: ['a'] }));
    const generator = new JobGenerator({ outbox: ws.outbox, templatePath });
    expect(generator.loadTemplate()).toEqual({ task: 'ROI_SCAN', rules: ['a'] });

    fs.writeFileSync(templatePath, '[1]');
    expect(() => generator.generate(FIXED_NOW)).toThrow('Job-Template muss ein JSON-Objekt sein');
  });
});
