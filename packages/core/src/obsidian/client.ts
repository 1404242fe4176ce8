import { Agent, fetch, type Dispatcher } from 'undici';
import { z } from 'zod';
import { RemoteFailure, toError } from '../errors.ts';
import { buildRecentChangesQuery } from './dql.ts';
import type {
  JsonLogicQuery,
  ObsidianClientOptions,
  PatchOperation,
  PatchTargetType,
  Period,
  Protocol,
  RemoteResult,
  SimpleSearchResult
} from './types.ts';

const CONNECT_TIMEOUT_MS = 3_000;
const READ_TIMEOUT_MS = 6_000;

const JSONLOGIC_CONTENT_TYPE = 'application/vnd.olrapi.jsonlogic+json';
const DQL_CONTENT_TYPE = 'application/vnd.olrapi.dataview.dql+txt';
const MARKDOWN_CONTENT_TYPE = 'text/markdown';

const fileListingSchema = z.object({ files: z.array(z.string()) });

const searchResultsSchema = z.array(
  z.object({
    filename: z.string().optional(),
    score: z.number().optional(),
    matches: z
      .array(
        z.object({
          context: z.string().optional(),
          match: z
            .object({
              start: z.number().optional(),
              end: z.number().optional()
            })
            .optional()
        })
      )
      .optional()
  })
);

// each field falls back on its own, so a malformed code keeps the message
const errorBodySchema = z.object({
  errorCode: z.number().optional().catch(undefined),
  message: z.string().optional().catch(undefined)
});

type QueryParams = Record<string, string | number | boolean>;

interface RequestOptions {
  method: 'GET' | 'POST' | 'PATCH';
  path: string;
  /** Appended to `path` with each segment percent-encoded. */
  vaultPath?: string;
  query?: QueryParams;
  headers?: Record<string, string>;
  /** Header values that are sent percent-encoded. */
  encodedHeaders?: Record<string, string>;
  body?: string;
}

/**
 * Percent-encodes each segment of a vault-relative path, keeping separators.
 */
export function encodeVaultPath(vaultPath: string): string {
  return vaultPath.split('/').map(encodeURIComponent).join('/');
}

/**
 * Client for the Obsidian Local REST API.
 *
 * Every operation resolves to a {@link RemoteResult}; HTTP errors and
 * transport failures come back as a {@link RemoteFailure} and are never
 * thrown.
 */
export class ObsidianClient {
  readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly dispatcher: Dispatcher;

  constructor({
    apiKey,
    protocol = 'https',
    host = '127.0.0.1',
    port = 27124,
    verifySsl = false,
    dispatcher
  }: ObsidianClientOptions) {
    this.apiKey = apiKey;
    this.baseUrl = buildBaseUrl(protocol, host, port);
    this.dispatcher =
      dispatcher ??
      new Agent({
        connect: {
          timeout: CONNECT_TIMEOUT_MS,
          rejectUnauthorized: verifySsl
        },
        headersTimeout: READ_TIMEOUT_MS,
        bodyTimeout: READ_TIMEOUT_MS
      });
  }

  async listFilesInVault(): Promise<RemoteResult<string[]>> {
    const result = await this.requestJson({ method: 'GET', path: '/vault/' });
    return result.ok
      ? parseWith(fileListingSchema, result.value, r => r.files)
      : result;
  }

  /**
   * Lists a directory. The service leaves out directories that contain no
   * files of their own.
   */
  async listFilesInDir(dirpath: string): Promise<RemoteResult<string[]>> {
    const result = await this.requestJson({
      method: 'GET',
      path: '/vault/',
      vaultPath: `${dirpath.replace(/\/+$/, '')}/`
    });
    return result.ok
      ? parseWith(fileListingSchema, result.value, r => r.files)
      : result;
  }

  async getFileContents(filepath: string): Promise<RemoteResult<string>> {
    return this.request({
      method: 'GET',
      path: '/vault/',
      vaultPath: filepath
    });
  }

  /**
   * Reads each file in turn and joins them under `# path` headers. A file
   * that fails to load gets an inline error note instead of failing the batch.
   */
  async getBatchFileContents(filepaths: readonly string[]): Promise<string> {
    const sections: string[] = [];
    for (const filepath of filepaths) {
      const result = await this.getFileContents(filepath);
      const body = result.ok
        ? result.value
        : `Error reading file: ${result.error.message}`;
      sections.push(`# ${filepath}\n\n${body}\n\n---\n\n`);
    }
    return sections.join('');
  }

  async search(
    query: string,
    contextLength: number = 100
  ): Promise<RemoteResult<SimpleSearchResult[]>> {
    const result = await this.requestJson({
      method: 'POST',
      path: '/search/simple/',
      query: { query, contextLength }
    });
    return result.ok
      ? parseWith(searchResultsSchema, result.value, r => r)
      : result;
  }

  async searchJson(query: JsonLogicQuery): Promise<RemoteResult<unknown>> {
    return this.requestJson({
      method: 'POST',
      path: '/search/',
      headers: { 'Content-Type': JSONLOGIC_CONTENT_TYPE },
      body: JSON.stringify(query)
    });
  }

  async appendContent(
    filepath: string,
    content: string
  ): Promise<RemoteResult<void>> {
    const result = await this.request({
      method: 'POST',
      path: '/vault/',
      vaultPath: filepath,
      headers: { 'Content-Type': MARKDOWN_CONTENT_TYPE },
      body: content
    });
    return result.ok ? { ok: true, value: undefined } : result;
  }

  async patchContent(
    filepath: string,
    operation: PatchOperation,
    targetType: PatchTargetType,
    target: string,
    content: string
  ): Promise<RemoteResult<void>> {
    const result = await this.request({
      method: 'PATCH',
      path: '/vault/',
      vaultPath: filepath,
      headers: {
        'Content-Type': MARKDOWN_CONTENT_TYPE,
        Operation: operation,
        'Target-Type': targetType
      },
      encodedHeaders: { Target: target },
      body: content
    });
    return result.ok ? { ok: true, value: undefined } : result;
  }

  async getPeriodicNote(period: Period): Promise<RemoteResult<string>> {
    return this.request({ method: 'GET', path: `/periodic/${period}/` });
  }

  async getRecentPeriodicNotes(
    period: Period,
    limit: number = 5,
    includeContent: boolean = false
  ): Promise<RemoteResult<unknown>> {
    return this.requestJson({
      method: 'GET',
      path: `/periodic/${period}/recent`,
      query: { limit, includeContent }
    });
  }

  async getRecentChanges(
    limit: number = 10,
    days: number = 90
  ): Promise<RemoteResult<unknown>> {
    return this.requestJson({
      method: 'POST',
      path: '/search/',
      headers: { 'Content-Type': DQL_CONTENT_TYPE },
      body: buildRecentChangesQuery({ limit, days })
    });
  }

  private async requestJson(
    options: RequestOptions
  ): Promise<RemoteResult<unknown>> {
    const result = await this.request(options);
    if (!result.ok) {
      return result;
    }
    try {
      return { ok: true, value: JSON.parse(result.value) };
    } catch (error) {
      return {
        ok: false,
        error: new RemoteFailure(
          -1,
          `Invalid response: ${error instanceof Error ? error.message : String(error)}`
        )
      };
    }
  }

  /**
   * Performs one round trip and returns the response body as text.
   */
  private async request(
    options: RequestOptions
  ): Promise<RemoteResult<string>> {
    let url: URL;
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.apiKey}`,
      ...options.headers
    };
    // encodeURIComponent throws on lone surrogates
    try {
      url = new URL(
        options.path + encodeVaultPath(options.vaultPath ?? ''),
        this.baseUrl
      );
      for (const [name, value] of Object.entries(
        options.encodedHeaders ?? {}
      )) {
        headers[name] = encodeURIComponent(value);
      }
    } catch (error) {
      return {
        ok: false,
        error: new RemoteFailure(
          -1,
          `Invalid request: ${toError(error).message}`
        )
      };
    }
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, String(value));
    }

    let status: number;
    let text: string;
    try {
      const response = await fetch(url, {
        method: options.method,
        headers,
        body: options.body,
        dispatcher: this.dispatcher
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      return { ok: false, error: RemoteFailure.transport(error) };
    }

    if (status < 200 || status >= 300) {
      return { ok: false, error: failureFromBody(text) };
    }
    return { ok: true, value: text };
  }
}

function buildBaseUrl(protocol: Protocol, host: string, port: number): string {
  return `${protocol}://${host}:${port}`;
}

function failureFromBody(text: string): RemoteFailure {
  let parsed: unknown = undefined;
  if (text) {
    try {
      parsed = JSON.parse(text);
    } catch {
      parsed = undefined;
    }
  }
  const body = errorBodySchema.safeParse(parsed);
  const errorCode = body.success ? body.data.errorCode : undefined;
  const message = body.success ? body.data.message : undefined;
  return new RemoteFailure(errorCode ?? -1, message ?? '<unknown>');
}

function parseWith<P, T>(
  schema: z.ZodType<P>,
  value: unknown,
  select: (parsed: P) => T
): RemoteResult<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    return {
      ok: false,
      error: new RemoteFailure(
        -1,
        `Invalid response: ${parsed.error.issues[0]?.message ?? 'unexpected body'}`
      )
    };
  }
  return { ok: true, value: select(parsed.data) };
}
