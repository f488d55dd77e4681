/**
 * Tests fuer den GitHub-Client mit einem In-Process Axios-Adapter
 */

import axios, { AxiosError, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import { describe, it, expect } from 'vitest';
import { GitHubClient, createGitHubClient } from '../api/github.js';
import { GitHubApiError, InvalidParamsError, MissingCredentialError } from '../utils/errors.js';

interface FakeReply {
  status: number;
  data: unknown;
}

type Handler = (config: InternalAxiosRequestConfig, call: number) => FakeReply;

function fakeHttp(handler: Handler): { http: AxiosInstance; calls: InternalAxiosRequestConfig[] } {
  const calls: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      calls.push(config);
      const { status, data } = handler(config, calls.length);
      return { data, status, statusText: String(status), headers: {}, config };
    },
  });
  return { http, calls };
}

function client(http: AxiosInstance, defaultRepo = 'octo/demo'): GitHubClient {
  return new GitHubClient({ token: 'test-token', defaultRepo, http, retries: 2, retryMinTimeoutMs: 1 });
}

function base64(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64');
}

describe('GitHubClient', () => {
  it('should require a token', () => {
    expect(() => new GitHubClient({ token: '  ' })).toThrow(MissingCredentialError);
    expect(() =>
      createGitHubClient({ token: '', defaultRepo: '', defaultBranch: 'main', apiBase: 'https://api.github.com' })
    ).toThrow('Missing GITHUB_TOKEN on server');
  });

  it('should require a repo and a path', () => {
    const { http } = fakeHttp(() => ({ status: 200, data: {} }));
    expect(() => client(http, '').normalizeRepo()).toThrow(InvalidParamsError);
    expect(() => client(http).contentsUrl('octo/demo', '/')).toThrow('path is required');
    expect(client(http).contentsUrl('octo/demo', '/docs/a b.md')).toBe(
      'https://api.github.com/repos/octo/demo/contents/docs/a%20b.md'
    );
  });

  describe('readFile', () => {
    it('should decode base64 file content and send auth headers', async () => {
      const encoded = base64('Hallo Welt\n').replace(/(.{8})/g, '$1\n');
      const { http, calls } = fakeHttp(() => ({ status: 200, data: { type: 'file', content: encoded } }));

      await expect(client(http).readFile({ path: 'README.md', ref: 'dev' })).resolves.toBe('Hallo Welt\n');
      expect(calls).toHaveLength(1);
      expect(calls[0].url).toBe('https://api.github.com/repos/octo/demo/contents/README.md');
      expect(calls[0].method).toBe('get');
      expect(calls[0].params).toEqual({ ref: 'dev' });
      expect(calls[0].headers.Authorization).toBe('Bearer test-token');
      expect(calls[0].headers['X-GitHub-Api-Version']).toBe('2022-11-28');
    });

    it('should return directory listings as JSON text', async () => {
      const { http } = fakeHttp(() => ({ status: 200, data: [{ name: 'a.md' }] }));
      await expect(client(http).readFile({ repo: 'o/r', path: 'docs' })).resolves.toBe('[{"name":"a.md"}]');
    });

    it('should not retry client errors', async () => {
      const { http, calls } = fakeHttp(() => ({ status: 404, data: { message: 'Not Found' } }));

      await expect(client(http).readFile({ path: 'missing.md' })).rejects.toThrow(
        'GitHub read failed: 404 {"message":"Not Found"}'
      );
      expect(calls).toHaveLength(1);
    });

    it('should retry server errors', async () => {
      const { http, calls } = fakeHttp((_config, call) =>
        call === 1 ? { status: 502, data: 'bad gateway' } : { status: 200, data: { type: 'file', content: base64('ok') } }
      );

      await expect(client(http).readFile({ path: 'a.md' })).resolves.toBe('ok');
      expect(calls).toHaveLength(2);
    });

    it('should retry network errors', async () => {
      const calls: InternalAxiosRequestConfig[] = [];
      const http = axios.create({
        adapter: async (config) => {
          calls.push(config);
          if (calls.length === 1) {
            throw new AxiosError('socket hang up', 'ECONNRESET', config);
          }
          return { data: { type: 'file', content: base64('ok') }, status: 200, statusText: 'OK', headers: {}, config };
        },
      });

      await expect(client(http).readFile({ path: 'a.md' })).resolves.toBe('ok');
      expect(calls).toHaveLength(2);
    });

    it('should give up after the configured retries', async () => {
      const { http, calls } = fakeHttp(() => ({ status: 500, data: 'boom' }));

      await expect(client(http).readFile({ path: 'a.md' })).rejects.toBeInstanceOf(GitHubApiError);
      expect(calls).toHaveLength(3);
    });
  });

  describe('writeFile', () => {
    it('should create a new file without sha', async () => {
      const { http, calls } = fakeHttp((config) =>
        config.method === 'get'
          ? { status: 404, data: { message: 'Not Found' } }
          : { status: 201, data: { commit: { sha: 'c1' }, content: { sha: 's1' } } }
      );

      const result = await client(http).writeFile({ path: 'agent_outbox/a.json', content: '{}', message: 'add job' });

      expect(result).toEqual({
        ok: true,
        repo: 'octo/demo',
        path: 'agent_outbox/a.json',
        branch: 'main',
        commit: 'c1',
        contentSha: 's1',
      });
      expect(calls[0].params).toEqual({ ref: 'main' });
      expect(JSON.parse(String(calls[1].data))).toEqual({ message: 'add job', content: base64('{}'), branch: 'main' });
    });

    it('should send the existing sha on update', async () => {
      const { http, calls } = fakeHttp((config) =>
        config.method === 'get' ? { status: 200, data: { sha: 'old' } } : { status: 200, data: {} }
      );

      const result = await client(http).writeFile({ path: 'a.md', content: 'x', message: 'm', branch: 'dev' });

      expect(result.commit).toBeNull();
      expect(JSON.parse(String(calls[1].data))).toEqual({ message: 'm', content: base64('x'), branch: 'dev', sha: 'old' });
    });

    it('should fail on preflight errors and empty messages', async () => {
      const { http, calls } = fakeHttp(() => ({ status: 403, data: 'forbidden' }));

      await expect(client(http).writeFile({ path: 'a.md', content: 'x', message: 'm' })).rejects.toThrow(
        'GitHub preflight failed: 403 forbidden'
      );
      await expect(client(http).writeFile({ path: 'a.md', content: 'x', message: ' ' })).rejects.toThrow(
        'message is required'
      );
      expect(calls).toHaveLength(1);
    });
  });

  it('should return the authenticated login', async () => {
    const { http, calls } = fakeHttp(() => ({ status: 200, data: { login: 'octo', id: 7 } }));

    await expect(client(http).whoami()).resolves.toEqual({ login: 'octo', id: 7 });
    expect(calls[0].url).toBe('https://api.github.com/user');
  });
});
