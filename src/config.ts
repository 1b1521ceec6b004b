/**
 * Action inputs, read with @actions/core and validated with zod
 */

import * as core from '@actions/core';
import {z} from 'zod';
import {DEFAULT_COMPRESSION_LEVEL} from './compression';

const DIGEST_PATTERN = /^[0-9a-fA-F]{64}$/;

const compressionLevelSchema = z
  .string()
  .regex(/^\d+$/, 'must be an integer')
  .transform(Number)
  .pipe(z.number().int().min(1).max(9));

const booleanSchema = z
  .enum(['true', 'false'])
  .transform(value => value === 'true');

const commonFields = {
  path: z.string().min(1),
  outputDirectory: z.string().min(1),
  progress: booleanSchema,
};

const configSchema = z.discriminatedUnion('mode', [
  z.object({
    mode: z.literal('compress'),
    ...commonFields,
    outputFilename: z.string().min(1),
    includes: z.array(z.string()).optional(),
    excludes: z.array(z.string()),
    compressionLevel: compressionLevelSchema,
  }),
  z.object({
    mode: z.literal('extract'),
    ...commonFields,
    sha256: z.string().regex(DIGEST_PATTERN, 'must be 64 hex digits').optional(),
  }),
]);

export type ActionConfig = z.infer<typeof configSchema>;
export type CompressConfig = Extract<ActionConfig, {mode: 'compress'}>;
export type ExtractConfig = Extract<ActionConfig, {mode: 'extract'}>;

// Schema field -> action input name, for error messages
const INPUT_NAMES: Record<string, string> = {
  mode: 'mode',
  path: 'path',
  outputDirectory: 'output-directory',
  outputFilename: 'output-filename',
  includes: 'includes',
  excludes: 'excludes',
  sha256: 'sha256',
  compressionLevel: 'compression-level',
  progress: 'progress',
};

export class ConfigurationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid action inputs:\n${issues.map(issue => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * Read every input. Empty inputs fall back to their defaults; an empty
 * `includes` means every file is selected.
 */
export function getConfig(): ActionConfig {
  const includes = core.getMultilineInput('includes');

  const raw = {
    mode: core.getInput('mode'),
    path: core.getInput('path'),
    outputDirectory: core.getInput('output-directory'),
    outputFilename: core.getInput('output-filename'),
    includes: includes.length > 0 ? includes : undefined,
    excludes: core.getMultilineInput('excludes'),
    sha256: core.getInput('sha256') || undefined,
    compressionLevel:
      core.getInput('compression-level') || String(DEFAULT_COMPRESSION_LEVEL),
    progress: core.getInput('progress').toLowerCase() || 'true',
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map(issue => {
        const field = String(issue.path[0] ?? '');
        const input = INPUT_NAMES[field] ?? field;
        return `${input}: ${issue.message}`;
      })
    );
  }

  const config = result.data;
  core.debug('Configuration:');
  core.debug(`  Mode: ${config.mode}`);
  core.debug(`  Path: ${config.path}`);
  core.debug(`  Output directory: ${config.outputDirectory}`);
  if (config.mode === 'compress') {
    core.debug(`  Output filename: ${config.outputFilename}`);
    core.debug(`  Includes: ${config.includes ? config.includes.join(', ') : '(all)'}`);
    core.debug(`  Excludes: ${config.excludes.join(', ') || '(none)'}`);
    core.debug(`  Compression: Level ${config.compressionLevel}`);
  } else {
    core.debug(`  Digest check: ${config.sha256 ? 'Enabled' : 'Disabled'}`);
  }
  core.debug(`  Progress: ${config.progress ? 'Enabled' : 'Disabled'}`);

  return config;
}
