import { Build } from '../../core/types/build.js';
import { RetentionPolicy } from '../../core/build-cache.js';

export const MINUTE = 60 * 1000;
export const HOUR = 60 * MINUTE;

/** 720h for buckets that ended 3h ago or earlier, 10m for the rest */
export const RETENTION: RetentionPolicy = {
  ttlMs: 720 * HOUR,
  recentTtlMs: 10 * MINUTE,
  settleAfterMs: 3 * HOUR,
};

/** Evaluation instant used across data-layer tests */
export const NOW = new Date('2024-03-04T12:30:00.000Z');

export function at(iso: string): Date {
  return new Date(iso);
}

export function minutesAfter(base: Date, minutes: number): Date {
  return new Date(base.getTime() + minutes * MINUTE);
}

let sequence = 0;

/**
 * A finished build. Timestamps are derived from createdAt unless overridden:
 * scheduled +1m, started +2m, finished +7m.
 */
export function makeBuild(overrides: Partial<Build> = {}): Build {
  sequence++;
  const createdAt = overrides.createdAt ?? at('2024-03-04T10:00:00.000Z');
  return {
    id: `build-${sequence}`,
    number: sequence,
    state: 'passed',
    branch: 'main',
    commit: 'abc123',
    message: 'Test commit',
    webUrl: `https://buildkite.example/acme/svc-a/builds/${sequence}`,
    pipeline: { name: 'svc-a', slug: 'svc-a' },
    createdAt,
    scheduledAt: minutesAfter(createdAt, 1),
    startedAt: minutesAfter(createdAt, 2),
    finishedAt: minutesAfter(createdAt, 7),
    ...overrides,
  };
}

export const roundTripDefinition = {
  name: 'X',
  from: 'started',
  to: 'finished',
  pipelines: '.*',
  branches: '^main$',
  group: '{{.Pipeline.Name}}',
};
