export class ConfigurationError extends Error {
  constructor(
    readonly source: string,
    message: string,
    readonly issues: string[] = [],
  ) {
    super(`[${source}] ${message}`);
    this.name = 'ConfigurationError';
  }
}
