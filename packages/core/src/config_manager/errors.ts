import { SieveError } from '../errors';

/**
 * Options or a project configuration file that cannot describe a run.
 * Raised before any unit executes; the CLI exits with code 2.
 */
export class ConfigurationFault extends SieveError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIGURATION_FAULT', options);
    this.name = "ConfigurationFault";
    Object.setPrototypeOf(this, ConfigurationFault.prototype);
  }
}
