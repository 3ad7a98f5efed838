export class DatasetLoadError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly issues?: unknown
  ) {
    super(message);
    this.name = 'DatasetLoadError';
  }
}

export class SpecialPlayerConfigError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly issues?: unknown
  ) {
    super(message);
    this.name = 'SpecialPlayerConfigError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly issues?: unknown) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class EnrichmentError extends Error {
  constructor(
    message: string,
    public readonly code: 'organization_lookup_failed' | 'english_name_lookup_failed',
    public readonly context: { playerId: string; subject: string },
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'EnrichmentError';
  }
}
