// ═══════════════════════════════════════════════════════════════
//                    MCP TOOLS
//   Jedes Tool: JSON-Schema für tools/list + zod-Validierung der Argumente
// ═══════════════════════════════════════════════════════════════

import path from 'path';
import { z } from 'zod';
import type { GitHubClient } from '../api/github.js';
import type { OutboxStore } from '../jobs/outbox.js';
import type { TaskRouter } from '../jobs/router.js';
import { detectTaskType, envelopeToDescriptor, parseJobDescriptor, parseJobEnvelope } from '../jobs/schema.js';
import { InvalidParamsError } from '../utils/errors.js';
import { isoSeconds } from '../utils/time.js';

export const SERVICE_NAME = 'taskrelay-gateway';

export interface ToolSpec {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface ToolDeps {
  appVersion: string;
  // wirft MissingCredentialError ohne Token
  github: () => GitHubClient;
  outbox: OutboxStore;
  router: TaskRouter;
  now?: () => Date;
}

export interface McpTool {
  spec: ToolSpec;
  call(rawArgs: unknown, deps: ToolDeps): Promise<string>;
}

function defineTool<S extends z.ZodTypeAny>(
  spec: ToolSpec,
  args: S,
  run: (args: z.infer<S>, deps: ToolDeps) => Promise<string> | string
): McpTool {
  return {
    spec,
    async call(rawArgs, deps) {
      return run(args.parse(rawArgs ?? {}), deps);
    },
  };
}

function ts(deps: ToolDeps): string {
  return isoSeconds(deps.now ? deps.now() : new Date());
}

function objectSchema(properties: Record<string, unknown>, required: string[] = []): Record<string, unknown> {
  return { type: 'object', additionalProperties: false, properties, required };
}

const jobObject = z.record(z.unknown());

// ═══════════════════════════════════════════════════════════════
// GITHUB
// ═══════════════════════════════════════════════════════════════

const githubReadFile = defineTool(
  {
    name: 'github_read_file',
    description: 'Read a file from a GitHub repo (returns raw text).',
    inputSchema: objectSchema(
      {
        repo: { type: 'string', description: 'owner/repo (optional if DEFAULT_REPO is set)' },
        path: { type: 'string', description: 'Path in repo, e.g. README.md' },
        ref: { type: 'string', description: 'Branch/tag/sha (optional)' },
      },
      ['path']
    ),
  },
  z
    .object({
      repo: z.string().optional(),
      path: z.string().trim().min(1, 'path is required'),
      ref: z.string().optional(),
    })
    .strict(),
  (args, deps) => deps.github().readFile(args)
);

const githubWriteFile = defineTool(
  {
    name: 'github_write_file',
    description: 'Create or update a file in a GitHub repo and commit it.',
    inputSchema: objectSchema(
      {
        repo: { type: 'string', description: 'owner/repo (optional if DEFAULT_REPO is set)' },
        path: { type: 'string', description: 'Path in repo, e.g. agent_outbox/bridge_test.txt' },
        content: { type: 'string', description: 'File content (utf-8)' },
        message: { type: 'string', description: 'Commit message' },
        branch: { type: 'string', description: 'Branch (optional, default DEFAULT_BRANCH)' },
      },
      ['path', 'content', 'message']
    ),
  },
  z
    .object({
      repo: z.string().optional(),
      path: z.string().trim().min(1, 'path is required'),
      content: z.string(),
      message: z.string().trim().min(1, 'message is required'),
      branch: z.string().optional(),
    })
    .strict(),
  async (args, deps) => {
    const result = await deps.github().writeFile(args);
    return JSON.stringify({
      ok: true,
      repo: result.repo,
      path: result.path,
      branch: result.branch,
      commit: result.commit,
      content_sha: result.contentSha,
      ts: ts(deps),
    });
  }
);

const githubWhoami = defineTool(
  {
    name: 'github_whoami',
    description: 'Verify the GitHub token works by returning the authenticated user login.',
    inputSchema: objectSchema({}),
  },
  z.object({}).strict(),
  async (_args, deps) => {
    const identity = await deps.github().whoami();
    return JSON.stringify({ ok: true, login: identity.login, id: identity.id });
  }
);

// ═══════════════════════════════════════════════════════════════
// HEALTH
// ═══════════════════════════════════════════════════════════════

const healthCheck = defineTool(
  {
    name: 'health_check',
    description: 'Simple health check.',
    inputSchema: objectSchema({}),
  },
  z.object({}).strict(),
  (_args, deps) =>
    JSON.stringify({
      ok: true,
      service: SERVICE_NAME,
      version: deps.appVersion,
      ts: ts(deps),
      tools_loaded: TOOLS.length,
      outbox_pending: deps.outbox.countPending(),
    })
);

const ping = defineTool(
  {
    name: 'ping',
    description: 'Health check to verify MCP connectivity.',
    inputSchema: objectSchema({}),
  },
  z.object({}).strict(),
  () => `pong (from ${SERVICE_NAME})`
);

// ═══════════════════════════════════════════════════════════════
// JOBS
// ═══════════════════════════════════════════════════════════════

const enqueueJob = defineTool(
  {
    name: 'enqueue_job',
    description: 'Put a job descriptor into the outbox. With strict=true the job must be an {id, type, payload} envelope.',
    inputSchema: objectSchema(
      {
        job: { type: 'object', description: 'Job descriptor, e.g. {"task": "ROI_SCAN", "rules": [], "deliverables": []}' },
        file_name: { type: 'string', description: 'Outbox file name (optional)' },
        strict: { type: 'boolean', description: 'Validate as strict envelope (optional)' },
      },
      ['job']
    ),
  },
  z
    .object({
      job: jobObject,
      file_name: z.string().trim().min(1).optional(),
      strict: z.boolean().optional(),
    })
    .strict(),
  (args, deps) => {
    const descriptor = args.strict ? envelopeToDescriptor(parseJobEnvelope(args.job)) : parseJobDescriptor(args.job);
    const task = detectTaskType(descriptor);
    if (!task) {
      throw new InvalidParamsError('job needs one of job_type, task, type');
    }

    const written = deps.outbox.enqueue(descriptor, args.file_name, deps.now ? deps.now() : new Date());
    if (!written) {
      throw new InvalidParamsError(`Outbox file already exists: ${args.file_name ?? '(generated name)'}`);
    }
    return JSON.stringify({ ok: true, file: path.basename(written), task });
  }
);

const dispatchJob = defineTool(
  {
    name: 'dispatch_job',
    description: 'Run a job directly without the outbox. Unknown types return NEEDS_INPUT.',
    inputSchema: objectSchema(
      {
        job: { type: 'object', description: 'Job descriptor' },
        needs: { type: 'object', description: 'Additional inputs merged into the job (optional)' },
      },
      ['job']
    ),
  },
  z.object({ job: jobObject, needs: jobObject.optional() }).strict(),
  async (args, deps) => JSON.stringify(await deps.router.dispatch(parseJobDescriptor(args.job), args.needs ?? {}))
);

const routerTick = defineTool(
  {
    name: 'router_tick',
    description: 'Process pending outbox jobs now and return a summary.',
    inputSchema: objectSchema({}),
  },
  z.object({}).strict(),
  async (_args, deps) => {
    const summary = await deps.router.tick();
    return JSON.stringify({
      processed: summary.processed,
      done: summary.done,
      failed: summary.failed,
      skipped: summary.skipped,
      outcomes: summary.outcomes.map((o) => ({
        file: o.fileName,
        job_id: o.jobId,
        task: o.task,
        status: o.status,
        result_file: o.resultFile,
      })),
    });
  }
);

export const TOOLS: McpTool[] = [
  githubReadFile,
  githubWriteFile,
  githubWhoami,
  healthCheck,
  ping,
  enqueueJob,
  dispatchJob,
  routerTick,
];

export function toolSpecs(): ToolSpec[] {
  return TOOLS.map((tool) => tool.spec);
}

export function findTool(name: string): McpTool | undefined {
  return TOOLS.find((tool) => tool.spec.name === name);
}
