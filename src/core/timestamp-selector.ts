// src/core/timestamp-selector.ts

import { Build } from './types/build.js';
import { InvalidTimestampNameError } from '../utils/errors.js';

export const TIMESTAMP_SELECTORS = ['created', 'scheduled', 'started', 'finished'] as const;

export type TimestampSelector = (typeof TIMESTAMP_SELECTORS)[number];

export function isTimestampSelector(value: string): value is TimestampSelector {
  return TIMESTAMP_SELECTORS.some((selector) => selector === value);
}

/**
 * Case-sensitive: "Started" is rejected.
 */
export function parseTimestampSelector(value: string): TimestampSelector {
  if (!isTimestampSelector(value)) {
    throw new InvalidTimestampNameError(value);
  }
  return value;
}

export function extractTimestamp(selector: TimestampSelector, build: Build): Date | undefined {
  switch (selector) {
    case 'created':
      return build.createdAt;
    case 'scheduled':
      return build.scheduledAt;
    case 'started':
      return build.startedAt;
    case 'finished':
      return build.finishedAt;
  }
}
