// src/config/config-loader.ts

import * as fs from 'fs/promises';
import * as path from 'path';
import * as YAML from 'yaml';
import { AppConfig, ConfigFile, configFileSchema } from './schema.js';
import { compileQueries, parseReportFlag } from '../core/query-compiler.js';
import { parseDuration } from '../utils/duration.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

export const DEFAULT_CONFIG_FILE = 'build-stats.yml';

const DEFAULTS = {
  apiUrl: 'https://api.buildkite.com',
  upstreamTimeout: '30s',
  keyPrefix: 'build-stats:',
  ttl: '720h',
  recentTtl: '10m',
  bucketSize: '1h',
  commandTimeout: '5s',
  scrapeHistory: '672h',
  refreshHistory: '3h',
  settleAfter: '3h',
} as const;

/**
 * Values given on the command line. They win over the config file.
 */
export interface ConfigOverrides {
  configPath?: string;
  buildkiteToken?: string;
  buildkiteOrg?: string;
  redisUrl?: string;
  scrapeHistory?: string;
  refreshHistory?: string;
  /** JSON report definitions; when present they replace the file's reports */
  reports?: string[];
}

/**
 * Builds the immutable AppConfig from build-stats.yml, CLI overrides and the
 * environment. Report definitions are compiled here, so a malformed report
 * stops the process before anything is fetched or evaluated.
 */
export class ConfigLoader {
  constructor(
    private cwd: string,
    private env: NodeJS.ProcessEnv = process.env
  ) {}

  async load(overrides: ConfigOverrides = {}): Promise<AppConfig> {
    const file = await this.readConfigFile(overrides.configPath);

    const rawReports = overrides.reports && overrides.reports.length > 0
      ? overrides.reports.map((json, i) => parseReportFlag(json, i))
      : file.reports ?? [];
    const queries = compileQueries(rawReports);

    const token = overrides.buildkiteToken ?? file.buildkite?.token ?? this.env.BUILDKITE_API_TOKEN;
    const org = overrides.buildkiteOrg ?? file.buildkite?.org ?? this.env.BUILDKITE_ORGANIZATION;
    const redisUrl = overrides.redisUrl ?? file.cache?.redisUrl;

    const config: AppConfig = {
      buildkite: Object.freeze({
        org: org || undefined,
        token: await this.expandToken(token),
        apiUrl: file.buildkite?.apiUrl ?? DEFAULTS.apiUrl,
        timeoutMs: this.duration('buildkite.timeout', file.buildkite?.timeout ?? DEFAULTS.upstreamTimeout),
      }),
      cache: Object.freeze({
        redisUrl: redisUrl || undefined,
        keyPrefix: file.cache?.keyPrefix ?? DEFAULTS.keyPrefix,
        ttlMs: this.duration('cache.ttl', file.cache?.ttl ?? DEFAULTS.ttl),
        recentTtlMs: this.duration('cache.recentTtl', file.cache?.recentTtl ?? DEFAULTS.recentTtl),
        bucketSizeMs: this.duration('cache.bucketSize', file.cache?.bucketSize ?? DEFAULTS.bucketSize),
        commandTimeoutMs: this.duration(
          'cache.commandTimeout',
          file.cache?.commandTimeout ?? DEFAULTS.commandTimeout
        ),
      }),
      scrapeHistoryMs: this.duration(
        'scrapeHistory',
        overrides.scrapeHistory ?? file.scrapeHistory ?? DEFAULTS.scrapeHistory
      ),
      refreshHistoryMs: this.duration(
        'refreshHistory',
        overrides.refreshHistory ?? file.refreshHistory ?? DEFAULTS.refreshHistory
      ),
      settleAfterMs: this.duration('settleAfter', file.settleAfter ?? DEFAULTS.settleAfter, true),
      queries: Object.freeze(queries),
    };

    return Object.freeze(config);
  }

  /**
   * Reads the YAML config. A missing default file is fine (flags and
   * environment may carry everything); a missing explicit file is not.
   */
  private async readConfigFile(explicitPath?: string): Promise<ConfigFile> {
    const configPath = path.resolve(this.cwd, explicitPath ?? DEFAULT_CONFIG_FILE);

    let content: string;
    try {
      content = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT' && !explicitPath) {
        Logger.debug(`No ${DEFAULT_CONFIG_FILE} found, using flags and defaults`);
        return {};
      }
      throw new ConfigurationError(`Cannot read config file ${configPath}: ${errorMessage(error)}`);
    }

    let parsed: unknown;
    try {
      parsed = YAML.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Invalid YAML in ${configPath}: ${errorMessage(error)}`);
    }

    const result = configFileSchema.safeParse(parsed ?? {});
    if (!result.success) {
      const issue = result.error.issues[0];
      const field = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
      throw new ConfigurationError(`Invalid config ${configPath} at ${field}: ${issue?.message}`);
    }
    return result.data;
  }

  private duration(field: string, value: string, allowZero: boolean = false): number {
    const ms = parseDuration(value);
    if (ms === null) {
      throw new ConfigurationError(`Invalid duration for ${field}: "${value}" (expected e.g. 3h, 90m, 1h30m)`);
    }
    if (ms === 0 && !allowZero) {
      throw new ConfigurationError(`Duration for ${field} must be greater than zero`);
    }
    return ms;
  }

  /**
   * "@path" reads the token from a file (trailing newlines trimmed, as
   * mounted secrets usually end with one).
   */
  private async expandToken(token: string | undefined): Promise<string | undefined> {
    if (!token) return undefined;
    if (!token.startsWith('@')) return token;

    const tokenPath = path.resolve(this.cwd, token.slice(1));
    try {
      const content = await fs.readFile(tokenPath, 'utf-8');
      return content.replace(/\n+$/, '') || undefined;
    } catch (error) {
      throw new ConfigurationError(`Cannot read Buildkite token file ${tokenPath}: ${errorMessage(error)}`);
    }
  }
}
