/**
 * Configuration file utilities
 *
 * Reads the optional YAML override file and validates it against the provision config schema.
 */

import fs from 'fs';
import YAML from 'yaml';
import type { ZodError } from 'zod';
import {
  ProvisionConfigSchema,
  type ProvisionConfig,
  type ProvisionConfigInput
} from '../schemas/provision-config.zod.js';

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return 'code' in error && typeof error.code === 'string' ? error.code : error.message;
  }
  return String(error);
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate a raw config object. `source` only shows up in error messages.
 */
export function parseProvisionConfig(raw: unknown, source = '(inline)'): ProvisionConfig {
  // An empty YAML document parses to null.
  const parsed = ProvisionConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new Error(`Invalid provision config ${source}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Load the provision config.
 *
 * Without a file path the built-in defaults are returned.
 */
export function loadProvisionConfig(
  filePath?: string,
  overrides: Partial<Pick<ProvisionConfigInput, 'logFile'>> = {}
): ProvisionConfig {
  let raw: unknown = {};
  if (filePath) {
    let text: string;
    try {
      text = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      throw new Error(`Invalid provision config ${filePath}: cannot read file (${describeError(error)})`);
    }
    try {
      raw = YAML.parse(text);
    } catch (error) {
      throw new Error(`Invalid provision config ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  const config = parseProvisionConfig(raw, filePath);
  if (overrides.logFile) {
    return { ...config, logFile: overrides.logFile };
  }
  return config;
}
