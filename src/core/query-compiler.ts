// src/core/query-compiler.ts

import { ZodError } from 'zod';
import { ReportDefinition, reportDefinitionSchema } from '../config/schema.js';
import { Query } from './query.js';
import { parseTimestampSelector, TimestampSelector } from './timestamp-selector.js';
import { compileGroupTemplate, GroupTemplate } from './group-template.js';
import { QueryCompileError, errorMessage } from '../utils/errors.js';

function reportLabel(raw: unknown, index: number): string {
  if (typeof raw === 'object' && raw !== null && 'name' in raw) {
    const { name } = raw;
    if (typeof name === 'string' && name.length > 0) {
      return name;
    }
  }
  return `#${index + 1}`;
}

function describeZodError(error: ZodError): { field: string; reason: string } {
  const issue = error.issues[0];
  return {
    field: issue && issue.path.length > 0 ? issue.path.join('.') : 'definition',
    reason: issue ? issue.message : error.message,
  };
}

function compileTimestamp(label: string, field: 'from' | 'to', value: string): TimestampSelector {
  try {
    return parseTimestampSelector(value);
  } catch (error) {
    throw new QueryCompileError(label, field, errorMessage(error));
  }
}

function compilePattern(label: string, field: 'pipelines' | 'branches', pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new QueryCompileError(label, field, errorMessage(error));
  }
}

function compileTemplate(label: string, source: string): GroupTemplate {
  try {
    return compileGroupTemplate(source);
  } catch (error) {
    throw new QueryCompileError(label, 'group', errorMessage(error));
  }
}

/**
 * Parse a --report flag value. The flag carries one JSON report definition.
 */
export function parseReportFlag(json: string, index: number): unknown {
  try {
    return JSON.parse(json);
  } catch (error) {
    throw new QueryCompileError(`#${index + 1}`, 'json', errorMessage(error));
  }
}

/**
 * Compile one report definition.
 * @param index - Position in the report list, used to label unnamed reports
 * @throws QueryCompileError naming the report and the offending field
 */
export function compileQuery(raw: unknown, index: number = 0): Query {
  const label = reportLabel(raw, index);

  let definition: ReportDefinition;
  try {
    definition = reportDefinitionSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      const { field, reason } = describeZodError(error);
      throw new QueryCompileError(label, field, reason);
    }
    throw error;
  }

  return new Query(
    definition.name,
    compileTimestamp(label, 'from', definition.from),
    compileTimestamp(label, 'to', definition.to),
    compilePattern(label, 'pipelines', definition.pipelines),
    compilePattern(label, 'branches', definition.branches),
    compileTemplate(label, definition.group)
  );
}

/**
 * Compile the full report set. The first failure aborts the whole set,
 * so callers never see a partially compiled list.
 */
export function compileQueries(raws: readonly unknown[]): Query[] {
  return raws.map((raw, index) => compileQuery(raw, index));
}
