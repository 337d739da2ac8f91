// src/core/types/build.ts

export interface PipelineRef {
  name: string;
  slug: string;
}

/**
 * One recorded execution of a CI pipeline.
 * Timestamps are absent until the build reaches that lifecycle stage.
 */
export interface Build {
  id: string;
  number: number;
  state: string;
  branch: string;
  commit: string;
  message: string;
  webUrl: string;
  pipeline: PipelineRef;
  createdAt?: Date;
  scheduledAt?: Date;
  startedAt?: Date;
  finishedAt?: Date;
}

/**
 * Upstream supplier of build records for a single organization.
 * Records are immutable and may be fetched any number of times.
 */
export interface BuildSource {
  /** Builds created within [createdFrom, createdTo), or since createdFrom when no end is given */
  listBuilds(createdFrom: Date, createdTo?: Date): Promise<Build[]>;
}
