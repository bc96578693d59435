/**
 * Raised when a dependency manifest line cannot be parsed
 */
export class ManifestError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly line?: number
  ) {
    super(line !== undefined ? `${source}:${line}: ${message}` : `${source}: ${message}`);
    this.name = 'ManifestError';
  }
}
