/**
 * Project Discovery Utilities
 *
 * Filesystem-based detection of the repository a run starts in.
 * Used at CLI bootstrap to resolve the root before it is injected.
 *
 * NOTE: These functions should only be called at the CLI/bootstrap level.
 * Core modules receive rootPath via constructor injection.
 */

import * as path from 'path';
import { existsSync } from 'fs';

/**
 * Files or directories whose presence marks a repository root, checked in order.
 */
export const REPOSITORY_INDICATORS = ['.git', 'package.json', 'tsconfig.json', 'pyproject.toml', 'setup.py'];

// Repository root cache for performance
let rootCache: string | null = null;
let lastSearchPath: string | null = null;

/**
 * Finds the nearest directory, walking up from `startPath`, that holds any
 * repository indicator. Caches the result per start path.
 *
 * @param startPath - Starting path (default: process.cwd())
 * @returns Path to the repository root, or null if not found
 */
export function detectRepositoryRoot(startPath: string = process.cwd()): string | null {
  const resolved = path.resolve(startPath);
  if (lastSearchPath === resolved) {
    return rootCache;
  }

  lastSearchPath = resolved;
  rootCache = null;

  let currentPath = resolved;
  while (true) {
    if (REPOSITORY_INDICATORS.some(indicator => existsSync(path.join(currentPath, indicator)))) {
      rootCache = currentPath;
      return rootCache;
    }
    const parent = path.dirname(currentPath);
    if (parent === currentPath) {
      return null;
    }
    currentPath = parent;
  }
}

/**
 * Reset the repository root cache.
 * Useful for testing when switching between project contexts.
 */
export function resetDiscoveryCache(): void {
  rootCache = null;
  lastSearchPath = null;
}
