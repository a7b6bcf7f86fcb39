import { z } from 'zod';
import type { Logger } from 'pino';
import { JamaApiError } from '../core/errors.js';
import type {
  CredentialPair,
  ItemInput,
  ItemUpdateInput,
  JamaClient,
  JamaRecord,
  ProjectInput,
  RelationshipInput
} from '../core/types.js';

const DEFAULT_PAGE_SIZE = 50;
// Refresh the access token this long before Jama says it expires
const TOKEN_EXPIRY_MARGIN_MS = 30_000;
const MAX_ERROR_DETAIL_CHARS = 200;

const TokenSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().optional()
});

const RecordSchema = z.record(z.unknown());

const EnvelopeSchema = z
  .object({
    meta: z
      .object({
        id: z.number().optional(),
        pageInfo: z
          .object({
            startIndex: z.number(),
            resultCount: z.number(),
            totalResults: z.number()
          })
          .optional()
      })
      .passthrough()
      .optional(),
    data: z.unknown().optional()
  })
  .passthrough();

type Envelope = z.infer<typeof EnvelopeSchema>;

type FetchFn = typeof fetch;

export interface JamaRestClientOptions {
  /** Jama base URL without trailing slash, e.g. `https://example.jamacloud.com` */
  baseUrl: string;
  credentials: CredentialPair;
  log: Logger;
  /** Injection seam for tests. Defaults to the global `fetch`. */
  fetch?: FetchFn;
  pageSize?: number;
}

interface RequestOptions {
  query?: Record<string, string | number>;
  body?: unknown;
}

interface CachedToken {
  value: string;
  expiresAt: number;
}

/**
 * Jama Connect REST v1 client using OAuth client credentials.
 *
 * Construction does no I/O; the first API call exchanges the client id and
 * secret for an access token, which is reused until shortly before it expires.
 */
export class JamaRestClient implements JamaClient {
  readonly #baseUrl: string;
  readonly #credentials: CredentialPair;
  readonly #log: Logger;
  readonly #fetch: FetchFn;
  readonly #pageSize: number;
  #token: Promise<CachedToken> | undefined;

  constructor({ baseUrl, credentials, log, fetch: fetchFn = fetch, pageSize = DEFAULT_PAGE_SIZE }: JamaRestClientOptions) {
    this.#baseUrl = baseUrl;
    this.#credentials = credentials;
    this.#log = log;
    this.#fetch = fetchFn;
    this.#pageSize = pageSize;
  }

  // ==================== TRANSPORT ====================

  private async accessToken(): Promise<string> {
    const cached = this.#token ? await this.#token : undefined;
    if (cached && cached.expiresAt > Date.now()) return cached.value;

    this.#token = this.requestToken();
    try {
      return (await this.#token).value;
    } catch (err) {
      this.#token = undefined;
      throw err;
    }
  }

  private async requestToken(): Promise<CachedToken> {
    const { clientId, clientSecret } = this.#credentials;
    const basic = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');

    this.#log.debug('Requesting Jama OAuth access token');
    const res = await this.#fetch(`${this.#baseUrl}/rest/oauth/token`, {
      method: 'POST',
      headers: {
        authorization: `Basic ${basic}`,
        'content-type': 'application/x-www-form-urlencoded',
        accept: 'application/json'
      },
      body: new URLSearchParams({ grant_type: 'client_credentials' }).toString()
    });

    if (!res.ok) {
      throw new JamaApiError(res.status, 'POST', 'oauth/token', await errorDetail(res));
    }

    const parsed = TokenSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new JamaApiError(res.status, 'POST', 'oauth/token', 'response has no access_token');
    }

    const ttlMs = (parsed.data.expires_in ?? 3600) * 1000;
    return {
      value: parsed.data.access_token,
      expiresAt: Date.now() + Math.max(ttlMs - TOKEN_EXPIRY_MARGIN_MS, 0)
    };
  }

  private async request(method: string, resource: string, opts: RequestOptions = {}): Promise<Response> {
    const url = new URL(`${this.#baseUrl}/rest/v1/${resource}`);
    for (const [key, value] of Object.entries(opts.query ?? {})) {
      url.searchParams.set(key, String(value));
    }

    const token = await this.accessToken();
    this.#log.debug({ method, resource }, 'Jama API request');

    return this.#fetch(url.toString(), {
      method,
      headers: {
        authorization: `Bearer ${token}`,
        accept: 'application/json',
        ...(opts.body !== undefined ? { 'content-type': 'application/json' } : {})
      },
      body: opts.body !== undefined ? JSON.stringify(opts.body) : undefined
    });
  }

  private async send(method: string, resource: string, opts: RequestOptions = {}): Promise<Envelope> {
    const res = await this.request(method, resource, opts);
    if (!res.ok) {
      throw new JamaApiError(res.status, method, resource, await errorDetail(res));
    }
    return readEnvelope(res, method, resource);
  }

  private async getList(resource: string, query: Record<string, string> = {}): Promise<JamaRecord[]> {
    const out: JamaRecord[] = [];
    let startAt = 0;

    for (;;) {
      const envelope = await this.send('GET', resource, {
        query: { ...query, startAt, maxResults: this.#pageSize }
      });
      const page = z.array(RecordSchema).safeParse(envelope.data ?? []);
      if (!page.success) {
        throw new JamaApiError(200, 'GET', resource, 'expected a list of records');
      }
      out.push(...page.data);

      // The next offset comes from our own count, not the startIndex the server echoes.
      const info = envelope.meta?.pageInfo;
      if (!info || info.resultCount === 0) return out;
      startAt += info.resultCount;
      if (startAt >= info.totalResults) return out;
    }
  }

  private async getOne(resource: string): Promise<JamaRecord | null> {
    const res = await this.request('GET', resource);
    if (res.status === 404) return null;
    if (!res.ok) {
      throw new JamaApiError(res.status, 'GET', resource, await errorDetail(res));
    }
    const envelope = await readEnvelope(res, 'GET', resource);
    const record = RecordSchema.safeParse(envelope.data);
    return record.success ? record.data : null;
  }

  private async create(resource: string, body: unknown): Promise<number> {
    const envelope = await this.send('POST', resource, { body });
    const id = envelope.meta?.id;
    if (id === undefined) {
      throw new JamaApiError(201, 'POST', resource, 'response has no meta.id');
    }
    return id;
  }

  private async status(method: string, resource: string, body: unknown): Promise<number> {
    const res = await this.request(method, resource, { body });
    if (!res.ok) {
      throw new JamaApiError(res.status, method, resource, await errorDetail(res));
    }
    return res.status;
  }

  // ==================== READS ====================

  getProjects(): Promise<JamaRecord[]> {
    return this.getList('projects');
  }

  getItem(itemId: string): Promise<JamaRecord | null> {
    return this.getOne(`items/${encodeURIComponent(itemId)}`);
  }

  getItems(projectId: string): Promise<JamaRecord[]> {
    return this.getList('items', { project: projectId });
  }

  getItemChildren(itemId: string): Promise<JamaRecord[]> {
    return this.getList(`items/${encodeURIComponent(itemId)}/children`);
  }

  getRelationships(projectId: string): Promise<JamaRecord[]> {
    return this.getList('relationships', { project: projectId });
  }

  getRelationship(relationshipId: string): Promise<JamaRecord | null> {
    return this.getOne(`relationships/${encodeURIComponent(relationshipId)}`);
  }

  getItemsUpstreamRelationships(itemId: string): Promise<JamaRecord[]> {
    return this.getList(`items/${encodeURIComponent(itemId)}/upstreamrelationships`);
  }

  getItemsDownstreamRelationships(itemId: string): Promise<JamaRecord[]> {
    return this.getList(`items/${encodeURIComponent(itemId)}/downstreamrelationships`);
  }

  getItemsUpstreamRelated(itemId: string): Promise<JamaRecord[]> {
    return this.getList(`items/${encodeURIComponent(itemId)}/upstreamrelated`);
  }

  getItemsDownstreamRelated(itemId: string): Promise<JamaRecord[]> {
    return this.getList(`items/${encodeURIComponent(itemId)}/downstreamrelated`);
  }

  getItemTypes(): Promise<JamaRecord[]> {
    return this.getList('itemtypes');
  }

  getItemType(itemTypeId: string): Promise<JamaRecord | null> {
    return this.getOne(`itemtypes/${encodeURIComponent(itemTypeId)}`);
  }

  getPickLists(): Promise<JamaRecord[]> {
    return this.getList('picklists');
  }

  getPickList(pickListId: string): Promise<JamaRecord | null> {
    return this.getOne(`picklists/${encodeURIComponent(pickListId)}`);
  }

  getPickListOptions(pickListId: string): Promise<JamaRecord[]> {
    return this.getList(`picklists/${encodeURIComponent(pickListId)}/options`);
  }

  getPickListOption(pickListOptionId: string): Promise<JamaRecord | null> {
    return this.getOne(`picklistoptions/${encodeURIComponent(pickListOptionId)}`);
  }

  getTags(projectId: string): Promise<JamaRecord[]> {
    return this.getList('tags', { project: projectId });
  }

  getTaggedItems(tagId: string): Promise<JamaRecord[]> {
    return this.getList(`tags/${encodeURIComponent(tagId)}/items`);
  }

  getTestCycle(testCycleId: string): Promise<JamaRecord | null> {
    return this.getOne(`testcycles/${encodeURIComponent(testCycleId)}`);
  }

  getTestRuns(testCycleId: string): Promise<JamaRecord[]> {
    return this.getList(`testcycles/${encodeURIComponent(testCycleId)}/testruns`);
  }

  async getAvailableEndpoints(): Promise<JamaRecord> {
    const envelope = await this.send('GET', '');
    return { data: envelope.data ?? [] };
  }

  // ==================== MUTATIONS ====================

  postItem(input: ItemInput): Promise<number> {
    return this.create('items', itemBody(input));
  }

  postTag(name: string, project: number): Promise<number> {
    return this.create('tags', { name, project });
  }

  postItemTag(itemId: number, tagId: number): Promise<number> {
    return this.status('POST', `items/${itemId}/tags`, { tag: tagId });
  }

  putItem(input: ItemUpdateInput): Promise<number> {
    return this.status('PUT', `items/${input.itemId}`, itemBody(input));
  }

  postProject(input: ProjectInput): Promise<number> {
    return this.create('projects', {
      projectKey: input.projectKey,
      isFolder: false,
      itemType: input.itemTypeId,
      fields: { name: input.name }
    });
  }

  postRelationship(input: RelationshipInput): Promise<number> {
    return this.create('relationships', {
      fromItem: input.fromItem,
      toItem: input.toItem,
      ...(input.relationshipType !== undefined ? { relationshipType: input.relationshipType } : {})
    });
  }
}

function itemBody(input: ItemInput) {
  return {
    project: input.project,
    itemType: input.itemTypeId,
    childItemType: input.childItemTypeId,
    location: { parent: input.location },
    fields: input.fields
  };
}

async function readEnvelope(res: Response, method: string, resource: string): Promise<Envelope> {
  const text = await res.text();
  if (text.trim() === '') return {};

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new JamaApiError(res.status, method, resource, 'response is not JSON');
  }
  const parsed = EnvelopeSchema.safeParse(json);
  if (!parsed.success) {
    throw new JamaApiError(res.status, method, resource, 'unexpected response envelope');
  }
  return parsed.data;
}

async function errorDetail(res: Response): Promise<string> {
  const text = await res.text().catch((err: unknown) => `unreadable body: ${String(err)}`);
  return text.slice(0, MAX_ERROR_DETAIL_CHARS);
}
