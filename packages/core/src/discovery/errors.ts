import { SieveError } from '../errors';

/**
 * A test source could not be loaded. Discovery records it as one synthetic
 * errored unit and carries on with the rest of the tree.
 */
export class DiscoveryLoadError extends SieveError {
  public readonly sourcePath: string;

  constructor(sourcePath: string, cause: Error) {
    super(`Could not load test source ${sourcePath}: ${cause.message}`, 'DISCOVERY_LOAD_ERROR', { cause });
    this.name = "DiscoveryLoadError";
    this.sourcePath = sourcePath;
    Object.setPrototypeOf(this, DiscoveryLoadError.prototype);
  }
}
