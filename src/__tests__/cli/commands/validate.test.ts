import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { validateCommand } from '../../../cli/commands/validate.js';
import { QueryCompileError } from '../../../utils/errors.js';
import { createTempDir, cleanupTempDir } from '../../setup.js';

const CONFIG_YAML = `
refreshHistory: 90m
reports:
  - name: Build time
    from: started
    to: finished
    branches: "^main$"
    group: "{{.Pipeline.Name}}"
`;

describe('validateCommand', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir('validate-command-test-');
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should print the resolved settings and each compiled report', async () => {
    await fs.writeFile(path.join(tempDir, 'build-stats.yml'), CONFIG_YAML, 'utf-8');

    const code = await validateCommand(tempDir, {});

    expect(code).toBe(0);
    expect(console.log).toHaveBeenCalledWith('\nScrape history:  672h');
    expect(console.log).toHaveBeenCalledWith('Refresh history: 1h30m');
    expect(console.log).toHaveBeenCalledWith('Cache:           in-process');
    expect(console.log).toHaveBeenCalledWith('  Build time');
    expect(console.log).toHaveBeenCalledWith('    duration: started → finished');
    expect(console.log).toHaveBeenCalledWith('    pipelines: /.*/  branches: /^main$/');
    expect(console.log).toHaveBeenCalledWith('    group: {{.Pipeline.Name}}');
    expect(console.log).toHaveBeenCalledWith('✅ 1 report(s) compiled');
  });

  it('should show the Redis cache without connecting to it', async () => {
    await validateCommand(tempDir, { redisUrl: 'redis://127.0.0.1:6379' });

    expect(console.log).toHaveBeenCalledWith('Cache:           redis');
  });

  it('should warn when there is nothing to evaluate', async () => {
    const code = await validateCommand(tempDir, {});

    expect(code).toBe(0);
    expect(console.warn).toHaveBeenCalledWith('⚠️  No reports configured');
  });

  it('should reject a report that does not compile', async () => {
    await expect(
      validateCommand(tempDir, {
        reports: [JSON.stringify({ name: 'Bad', from: 'started', to: 'finished', group: '{{.Nope}}' })],
      })
    ).rejects.toThrow(QueryCompileError);
  });
});
