/**
 * Invalid planner configuration. Raised before any planning work starts
 * and never retried.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Segment input the sliding-window pass cannot work with: non-finite
 * bounds, empty spans, or segments out of start order.
 */
export class InvalidSegmentsError extends ConfigurationError {
  readonly segmentIndex: number;

  constructor(message: string, segmentIndex: number) {
    super(message);
    this.name = 'InvalidSegmentsError';
    this.segmentIndex = segmentIndex;
  }
}

/** Environment or command-line values that cannot be turned into settings. */
export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SettingsError';
  }
}

export class TimelineArtifactError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimelineArtifactError';
  }
}
