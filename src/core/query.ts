// src/core/query.ts

import { Build } from './types/build.js';
import { TimestampSelector, extractTimestamp } from './timestamp-selector.js';
import { GroupTemplate } from './group-template.js';

/**
 * A compiled report definition. Immutable, and pure with respect to a Build.
 */
export class Query {
  constructor(
    readonly name: string,
    readonly from: TimestampSelector,
    readonly to: TimestampSelector,
    private readonly pipelines: RegExp,
    private readonly branches: RegExp,
    private readonly template: GroupTemplate
  ) {
    Object.freeze(this);
  }

  /** Both the pipeline and the branch filter must match. */
  predicate(build: Build): boolean {
    return this.pipelines.test(build.pipeline.name) && this.branches.test(build.branch);
  }

  /**
   * Milliseconds between the `from` and `to` timestamps.
   * Undefined when either stage has not happened yet or its time is not a
   * valid date; may be negative.
   */
  duration(build: Build): number | undefined {
    const start = extractTimestamp(this.from, build);
    const end = extractTimestamp(this.to, build);
    if (!start || !end) {
      return undefined;
    }
    const ms = end.getTime() - start.getTime();
    return Number.isNaN(ms) ? undefined : ms;
  }

  /** @throws GroupRenderError */
  group(build: Build): string {
    return this.template.render(build);
  }

  describe(): Record<string, string> {
    return {
      name: this.name,
      from: this.from,
      to: this.to,
      pipelines: this.pipelines.source,
      branches: this.branches.source,
      group: this.template.source,
    };
  }
}
