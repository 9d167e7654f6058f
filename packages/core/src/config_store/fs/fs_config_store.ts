/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Looks for sieve.config.yml, sieve.config.yaml and sieve.config.json in the
 * project root, in that order, and parses the first one found.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import type { ConfigStore, ProjectConfigSource } from '../config_store';
import { ConfigManager } from '../../config_manager/config_manager';
import type { ConfigManagerDependencies } from '../../config_manager/config_manager.types';
import { ConfigurationFault } from '../../config_manager/errors';
import { toError } from '../../errors';

export const CONFIG_FILE_NAMES = ['sieve.config.yml', 'sieve.config.yaml', 'sieve.config.json'];

/**
 * Filesystem-based ConfigStore implementation.
 *
 * A missing file is not an error (null). A file that exists but cannot be
 * read or parsed is a ConfigurationFault.
 *
 * @example
 * ```typescript
 * const store = new FsConfigStore('/path/to/project');
 * const source = await store.loadConfig();
 * if (source) {
 *   console.log(source.path);
 * }
 * ```
 */
export class FsConfigStore implements ConfigStore {
  private readonly projectRootPath: string;

  constructor(projectRootPath: string) {
    this.projectRootPath = projectRootPath;
  }

  async loadConfig(): Promise<ProjectConfigSource | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(this.projectRootPath, fileName);
      const content = await this.readIfPresent(configPath);
      if (content === null) {
        continue;
      }
      return { path: configPath, data: this.parse(configPath, content) };
    }
    return null;
  }

  private async readIfPresent(configPath: string): Promise<string | null> {
    try {
      return await fs.readFile(configPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw new ConfigurationFault(`Could not read ${configPath}: ${toError(error).message}`, { cause: error });
    }
  }

  private parse(configPath: string, content: string): unknown {
    try {
      const data: unknown = configPath.endsWith('.json') ? JSON.parse(content) : yaml.load(content);
      // An empty YAML document loads as undefined
      return data ?? {};
    } catch (error) {
      throw new ConfigurationFault(`Could not parse ${configPath}: ${toError(error).message}`, { cause: error });
    }
  }
}

/**
 * Create a ConfigManager backed by the project's configuration file.
 *
 * @param rootPath - Project root, also the base for relative log file paths in the file
 */
export function createConfigManager(
  rootPath: string,
  options: Omit<ConfigManagerDependencies, 'configStore' | 'rootPath'> = {}
): ConfigManager {
  return new ConfigManager({ ...options, configStore: new FsConfigStore(rootPath), rootPath });
}
