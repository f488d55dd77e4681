import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import pRetry, { AbortError } from 'p-retry';
import type { Config } from '../types/index.js';
import { config } from '../utils/config.js';
import logger from '../utils/logger.js';
import { GitHubApiError, InvalidParamsError, MissingCredentialError } from '../utils/errors.js';
import { isPlainObject } from '../jobs/schema.js';

const REQUEST_TIMEOUT_MS = 25000;
const USER_AGENT = 'taskrelay-gateway';

export interface GitHubClientOptions {
  token: string;
  defaultRepo?: string;
  defaultBranch?: string;
  apiBase?: string;
  http?: AxiosInstance;
  retries?: number;
  retryMinTimeoutMs?: number;
}

export interface ReadFileParams {
  repo?: string;
  path: string;
  ref?: string;
}

export interface WriteFileParams {
  repo?: string;
  path: string;
  content: string;
  message: string;
  branch?: string;
}

export interface WriteFileResult {
  ok: true;
  repo: string;
  path: string;
  branch: string;
  commit: string | null;
  contentSha: string | null;
}

export interface GitHubIdentity {
  login: string | null;
  id: number | null;
}

function bodyText(data: unknown): string {
  if (typeof data === 'string') return data;
  return JSON.stringify(data) ?? '';
}

function stringField(data: unknown, key: string): string | null {
  if (!isPlainObject(data)) return null;
  const v = data[key];
  return typeof v === 'string' ? v : null;
}

function nestedSha(data: unknown, key: string): string | null {
  return isPlainObject(data) ? stringField(data[key], 'sha') : null;
}

/**
 * GitHub Contents API (lesen, schreiben, Token prüfen)
 */
export class GitHubClient {
  private http: AxiosInstance;
  private readonly token: string;
  private readonly defaultRepo: string;
  private readonly defaultBranch: string;
  private readonly apiBase: string;
  private readonly retries: number;
  private readonly retryMinTimeoutMs: number;

  constructor(options: GitHubClientOptions) {
    if (!options.token.trim()) {
      throw new MissingCredentialError('GITHUB_TOKEN', 'Missing GITHUB_TOKEN on server');
    }
    this.token = options.token.trim();
    this.defaultRepo = options.defaultRepo ?? '';
    this.defaultBranch = options.defaultBranch || 'main';
    this.apiBase = (options.apiBase ?? 'https://api.github.com').replace(/\/+$/, '');
    this.retries = options.retries ?? 3;
    this.retryMinTimeoutMs = options.retryMinTimeoutMs ?? 1000;
    this.http = options.http ?? axios.create({ timeout: REQUEST_TIMEOUT_MS });
  }

  normalizeRepo(repo?: string): string {
    const value = (repo ?? '').trim() || this.defaultRepo;
    if (!value) {
      throw new InvalidParamsError('repo is required (owner/repo)');
    }
    return value;
  }

  normalizeBranch(branch?: string): string {
    return (branch ?? '').trim() || this.defaultBranch;
  }

  contentsUrl(repo: string, filePath: string): string {
    const clean = filePath.replace(/^\/+/, '');
    if (!clean.trim()) {
      throw new InvalidParamsError('path is required');
    }
    const encoded = clean.split('/').map(encodeURIComponent).join('/');
    return `${this.apiBase}/repos/${repo}/contents/${encoded}`;
  }

  /**
   * 5xx und Netzwerkfehler werden wiederholt, alles andere geht an den Aufrufer
   */
  private async request(operation: string, request: AxiosRequestConfig): Promise<AxiosResponse<unknown>> {
    return pRetry(
      async () => {
        let response: AxiosResponse<unknown>;
        try {
          response = await this.http.request<unknown>({
            ...request,
            headers: {
              Authorization: `Bearer ${this.token}`,
              Accept: 'application/vnd.github+json',
              'User-Agent': USER_AGENT,
              'X-GitHub-Api-Version': '2022-11-28',
            },
            validateStatus: () => true,
          });
        } catch (err) {
          if (axios.isAxiosError(err)) throw err;
          throw new AbortError(err instanceof Error ? err : String(err));
        }

        if (response.status >= 500) {
          throw new GitHubApiError(operation, response.status, bodyText(response.data));
        }
        return response;
      },
      {
        retries: this.retries,
        minTimeout: this.retryMinTimeoutMs,
        onFailedAttempt: (error) => {
          logger.warn(`GitHub ${operation} Fehler (Versuch ${error.attemptNumber}): ${error.message}`);
        },
      }
    );
  }

  async readFile(params: ReadFileParams): Promise<string> {
    const repo = this.normalizeRepo(params.repo);
    const url = this.contentsUrl(repo, params.path);
    const ref = (params.ref ?? '').trim();

    const response = await this.request('read', {
      method: 'GET',
      url,
      ...(ref ? { params: { ref } } : {}),
    });
    if (response.status !== 200) {
      throw new GitHubApiError('read', response.status, bodyText(response.data));
    }

    const data = response.data;
    if (isPlainObject(data) && data.type === 'file' && typeof data.content === 'string') {
      return Buffer.from(data.content.replace(/\n/g, ''), 'base64').toString('utf-8');
    }

    // Verzeichnisse, Symlinks etc. als JSON zurückgeben
    return bodyText(data);
  }

  async writeFile(params: WriteFileParams): Promise<WriteFileResult> {
    const repo = this.normalizeRepo(params.repo);
    const branch = this.normalizeBranch(params.branch);
    if (!params.message.trim()) {
      throw new InvalidParamsError('message is required');
    }
    const url = this.contentsUrl(repo, params.path);

    // Preflight: sha der bestehenden Datei
    const existing = await this.request('preflight', { method: 'GET', url, params: { ref: branch } });
    let sha: string | null = null;
    if (existing.status === 200) {
      sha = stringField(existing.data, 'sha');
    } else if (existing.status !== 404) {
      throw new GitHubApiError('preflight', existing.status, bodyText(existing.data));
    }

    const payload: Record<string, string> = {
      message: params.message,
      content: Buffer.from(params.content, 'utf-8').toString('base64'),
      branch,
    };
    if (sha) {
      payload.sha = sha;
    }

    const response = await this.request('write', { method: 'PUT', url, data: payload });
    if (response.status !== 200 && response.status !== 201) {
      throw new GitHubApiError('write', response.status, bodyText(response.data));
    }

    logger.info(`GitHub: ${repo}/${params.path} auf ${branch} ${sha ? 'aktualisiert' : 'angelegt'}`);
    return {
      ok: true,
      repo,
      path: params.path,
      branch,
      commit: nestedSha(response.data, 'commit'),
      contentSha: nestedSha(response.data, 'content'),
    };
  }

  async whoami(): Promise<GitHubIdentity> {
    const response = await this.request('whoami', { method: 'GET', url: `${this.apiBase}/user` });
    if (response.status !== 200) {
      throw new GitHubApiError('whoami', response.status, bodyText(response.data));
    }
    const data = response.data;
    const id = isPlainObject(data) && typeof data.id === 'number' ? data.id : null;
    return { login: stringField(data, 'login'), id };
  }
}

/**
 * @throws MissingCredentialError ohne Token
 */
export function createGitHubClient(github: Config['github'] = config.github, http?: AxiosInstance): GitHubClient {
  return new GitHubClient({
    token: github.token,
    defaultRepo: github.defaultRepo,
    defaultBranch: github.defaultBranch,
    apiBase: github.apiBase,
    http,
  });
}
