// src/upstream/buildkite-client.ts - Buildkite REST API build source

import { z } from 'zod';
import { Build, BuildSource } from '../core/types/build.js';
import { UpstreamError, errorMessage } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

const DEFAULT_API_URL = 'https://api.buildkite.com';
const PAGE_SIZE = 100;
const USER_AGENT = 'build-stats/1.0.0';

const timestampSchema = z.string().datetime({ offset: true }).nullish();

const apiBuildSchema = z.object({
  id: z.string(),
  number: z.number(),
  state: z.string(),
  branch: z.string(),
  commit: z.string(),
  message: z.string().nullish(),
  web_url: z.string(),
  created_at: timestampSchema,
  scheduled_at: timestampSchema,
  started_at: timestampSchema,
  finished_at: timestampSchema,
  pipeline: z.object({
    name: z.string(),
    slug: z.string(),
  }),
});

type ApiBuild = z.infer<typeof apiBuildSchema>;

export interface BuildkiteClientOptions {
  org: string;
  token: string;
  apiUrl?: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

function toDate(value: string | null | undefined): Date | undefined {
  return value ? new Date(value) : undefined;
}

function toBuild(raw: ApiBuild): Build {
  return {
    id: raw.id,
    number: raw.number,
    state: raw.state,
    branch: raw.branch,
    commit: raw.commit,
    message: raw.message ?? '',
    webUrl: raw.web_url,
    pipeline: { name: raw.pipeline.name, slug: raw.pipeline.slug },
    createdAt: toDate(raw.created_at),
    scheduledAt: toDate(raw.scheduled_at),
    startedAt: toDate(raw.started_at),
    finishedAt: toDate(raw.finished_at),
  };
}

/**
 * Extract the rel="next" target from an RFC 8288 Link header.
 */
export function parseNextLink(header: string | null): string | undefined {
  if (!header) return undefined;

  for (const part of header.split(',')) {
    const match = part.match(/<([^>]+)>\s*;\s*rel="?next"?/);
    if (match) {
      return match[1];
    }
  }
  return undefined;
}

export class BuildkiteClient implements BuildSource {
  private readonly apiUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private options: BuildkiteClientOptions) {
    this.apiUrl = (options.apiUrl ?? DEFAULT_API_URL).replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? fetch;
  }

  async listBuilds(createdFrom: Date, createdTo?: Date): Promise<Build[]> {
    const url = new URL(
      `${this.apiUrl}/v2/organizations/${encodeURIComponent(this.options.org)}/builds`
    );
    url.searchParams.set('created_from', createdFrom.toISOString());
    if (createdTo) {
      url.searchParams.set('created_to', createdTo.toISOString());
    }
    url.searchParams.set('per_page', String(PAGE_SIZE));

    const builds: Build[] = [];
    let next: string | undefined = url.toString();
    let page = 0;

    while (next) {
      page++;
      const { items, nextUrl } = await this.fetchPage(next);
      builds.push(...items);
      Logger.debug(`Fetched page ${page} (${items.length} builds) from Buildkite`);
      next = nextUrl;
    }

    return builds;
  }

  private async fetchPage(url: string): Promise<{ items: Build[]; nextUrl?: string }> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    let response: Response;
    let body: unknown;
    try {
      response = await this.fetchImpl(url, {
        headers: {
          Authorization: `Bearer ${this.options.token}`,
          Accept: 'application/json',
          'User-Agent': USER_AGENT,
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new UpstreamError(
          `Buildkite API error: ${response.status} ${response.statusText}`,
          response.status,
          url
        );
      }

      body = await response.json();
    } catch (error) {
      if (error instanceof UpstreamError) throw error;
      const message =
        error instanceof Error && error.name === 'AbortError'
          ? `Buildkite request timed out after ${this.options.timeoutMs}ms`
          : `Buildkite request failed: ${errorMessage(error)}`;
      throw new UpstreamError(message, undefined, url);
    } finally {
      clearTimeout(timeoutId);
    }

    const parsed = z.array(apiBuildSchema).safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new UpstreamError(
        `Unexpected Buildkite response at ${issue?.path.join('.') || '(root)'}: ${issue?.message}`,
        response.status,
        url
      );
    }

    return {
      items: parsed.data.map(toBuild),
      nextUrl: parseNextLink(response.headers.get('link')),
    };
  }
}
