/**
 * @fileoverview Configuration discovery and loading for the host.
 * Handles finding pawlink.json files and layering them over the defaults.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError, getErrorMessage } from '../errors';
import { assertValidHostConfig, normalizeHostConfig, validateHostConfig } from './config-validation';
import type { HostConfig, HostConfigFile } from './types';

export interface LoadedConfig {
  config: HostConfig;
  /** File the configuration came from; undefined when defaults were used */
  source: string | undefined;
  warnings: string[];
}

function readPackageSection(pkgPath: string): unknown {
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
  if (typeof pkg !== 'object' || pkg === null || !('pawlink' in pkg)) {
    return undefined;
  }
  return pkg.pawlink;
}

/**
 * Searches for a configuration file starting from startDir and walking up
 * the directory tree.
 *
 * @param configCandidates - Config file names to look for in each directory
 * @returns The absolute path to the config file, or undefined if not found
 */
export function findConfigFile(startDir: string, configCandidates: string[]): string | undefined {
  const dirsToCheck: string[] = [];
  for (let dir = path.resolve(startDir); ; ) {
    dirsToCheck.push(dir);
    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }

  for (const dir of dirsToCheck) {
    for (const candidate of configCandidates) {
      const full = path.isAbsolute(candidate) ? candidate : path.join(dir, candidate);
      if (fs.existsSync(full)) {
        return full;
      }
    }

    // Check package.json for a pawlink section
    const pkgPath = path.join(dir, 'package.json');
    if (fs.existsSync(pkgPath)) {
      try {
        if (readPackageSection(pkgPath) !== undefined) {
          return pkgPath;
        }
      } catch {
        // An unreadable package.json is not ours to report.
        continue;
      }
    }
  }

  return undefined;
}

/**
 * Gets the list of configuration file candidates.
 *
 * @param explicitPath - Optional config path given on the command line
 */
export function getConfigCandidates(explicitPath?: string): string[] {
  const candidates: string[] = [];

  if (explicitPath !== undefined && explicitPath !== '') {
    candidates.push(explicitPath);
  }

  candidates.push('pawlink.json');
  candidates.push('.pawlink.json');

  return candidates;
}

/**
 * Reads the raw configuration object from a file path.
 * @throws {ConfigurationError} If the file cannot be read or parsed
 */
export function loadConfigFile(configPath: string): unknown {
  try {
    if (path.basename(configPath) === 'package.json') {
      return readPackageSection(configPath) ?? {};
    }
    return JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Failed to read ${configPath}: ${getErrorMessage(err)}`, {
      configPath,
    });
  }
}

/**
 * Finds, validates and normalizes the host configuration. An explicit path that does
 * not exist is an error; no file at all means defaults.
 */
export function loadHostConfig(startDir: string = process.cwd(), explicitPath?: string): LoadedConfig {
  if (explicitPath !== undefined && explicitPath !== '') {
    const resolved = path.resolve(startDir, explicitPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigurationError(`Configuration file not found: ${resolved}`, {
        configPath: resolved,
      });
    }
    return fromFile(resolved);
  }

  const found = findConfigFile(startDir, getConfigCandidates());
  if (found === undefined) {
    return { config: normalizeHostConfig({}), source: undefined, warnings: [] };
  }
  return fromFile(found);
}

function fromFile(configPath: string): LoadedConfig {
  const raw = loadConfigFile(configPath);
  const { warnings } = validateHostConfig(raw);
  assertValidHostConfig(raw);
  const file: HostConfigFile = raw;
  return { config: normalizeHostConfig(file), source: configPath, warnings };
}
