// src/core/group-template.ts

import { Build } from './types/build.js';
import { GroupRenderError, TemplateSyntaxError } from '../utils/errors.js';

type FieldValue = string | number | Date | undefined;
type FieldResolver = (build: Build) => FieldValue;

/**
 * Fields a group template may reference, e.g. {{.Pipeline.Name}}.
 */
const FIELD_RESOLVERS = new Map<string, FieldResolver>(Object.entries({
  'ID': (b: Build) => b.id,
  'Number': (b: Build) => b.number,
  'State': (b: Build) => b.state,
  'Branch': (b: Build) => b.branch,
  'Commit': (b: Build) => b.commit,
  'Message': (b: Build) => b.message,
  'WebURL': (b: Build) => b.webUrl,
  'CreatedAt': (b: Build) => b.createdAt,
  'ScheduledAt': (b: Build) => b.scheduledAt,
  'StartedAt': (b: Build) => b.startedAt,
  'FinishedAt': (b: Build) => b.finishedAt,
  'Pipeline.Name': (b: Build) => b.pipeline.name,
  'Pipeline.Slug': (b: Build) => b.pipeline.slug,
}));

export const TEMPLATE_FIELDS = Array.from(FIELD_RESOLVERS.keys());

type Segment =
  | { kind: 'text'; text: string }
  | { kind: 'field'; path: string; resolve: FieldResolver };

export interface GroupTemplate {
  readonly source: string;
  /** @throws GroupRenderError when a referenced value is not set on the build */
  render(build: Build): string;
}

const FIELD_ACTION = /^\.([A-Za-z]+(?:\.[A-Za-z]+)*)$/;

function parseSegments(source: string): Segment[] {
  const segments: Segment[] = [];
  let cursor = 0;

  while (cursor < source.length) {
    const open = source.indexOf('{{', cursor);
    if (open === -1) {
      segments.push({ kind: 'text', text: source.slice(cursor) });
      break;
    }
    if (open > cursor) {
      segments.push({ kind: 'text', text: source.slice(cursor, open) });
    }

    const close = source.indexOf('}}', open + 2);
    if (close === -1) {
      throw new TemplateSyntaxError(`unclosed action starting at offset ${open}`);
    }

    const action = source.slice(open + 2, close).trim();
    const match = action.match(FIELD_ACTION);
    if (!match) {
      throw new TemplateSyntaxError(
        `unsupported action "{{${action}}}": only field references such as {{.Pipeline.Name}} are allowed`
      );
    }

    const path = match[1];
    const resolve = FIELD_RESOLVERS.get(path);
    if (!resolve) {
      throw new TemplateSyntaxError(
        `unknown field ".${path}" (available: ${TEMPLATE_FIELDS.map((f) => `.${f}`).join(', ')})`
      );
    }

    segments.push({ kind: 'field', path, resolve });
    cursor = close + 2;
  }

  return segments;
}

function formatValue(value: string | number | Date): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

export function compileGroupTemplate(source: string): GroupTemplate {
  const segments = parseSegments(source);

  return Object.freeze({
    source,
    render(build: Build): string {
      let out = '';
      for (const segment of segments) {
        if (segment.kind === 'text') {
          out += segment.text;
          continue;
        }

        const value = segment.resolve(build);
        if (value === undefined) {
          throw new GroupRenderError(
            build.id,
            segment.path,
            `cannot render {{.${segment.path}}}: value is not set`
          );
        }
        out += formatValue(value);
      }
      return out;
    },
  });
}
