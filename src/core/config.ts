/**
 * Paperwork Migrate - Config Resolution
 *
 * Turns the CLI arguments into a validated MigrationConfig.
 * Resolution order for the paperwork-json command line:
 * --paperwork-command > PAPERWORK_JSON_COMMAND > flatpak default
 */

import { existsSync, statSync } from 'fs';
import path from 'path';
import { z } from 'zod';

import { MigrationError } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export interface MigrationInput {
  archivePath: string;
  paperlessUrl: string;
  token: string;
  exportDir: string;
  dryRun?: boolean;
  continueOnError?: boolean;
  paperworkCommand?: string;
  reportPath?: string;
}

export interface MigrationConfig {
  archivePath: string;
  paperlessUrl: string;       // No trailing slash
  token: string;
  exportDir: string;
  dryRun: boolean;
  continueOnError: boolean;
  paperworkCommand: string[];
  reportPath?: string;
}

// ============================================================================
// Defaults
// ============================================================================

// Only the flatpak build of Paperwork ships paperwork-json on most distros
export const DEFAULT_PAPERWORK_COMMAND = [
  'flatpak',
  'run',
  '--command=paperwork-json',
  'work.openpaper.Paperwork',
];

// ============================================================================
// Validation
// ============================================================================

const InputSchema = z.object({
  archivePath: z.string().min(1, 'Archive path is required'),
  paperlessUrl: z
    .string()
    .url('paperless-ngx URL must be a valid URL')
    .refine((url) => /^https?:\/\//i.test(url), 'paperless-ngx URL must use http or https'),
  token: z.string().trim().min(1, 'paperless-ngx token is required'),
  exportDir: z.string().min(1, 'Export directory is required'),
  dryRun: z.boolean().default(false),
  continueOnError: z.boolean().default(false),
  paperworkCommand: z.string().optional(),
  reportPath: z.string().optional(),
});

/**
 * Split a command line on whitespace. Quoting is not supported.
 */
export function parseCommandLine(command: string): string[] {
  return command.trim().split(/\s+/).filter(Boolean);
}

function requireDirectory(dir: string, label: string): string {
  const resolved = path.resolve(dir);
  if (!existsSync(resolved)) {
    throw new MigrationError('configuration', `${label} '${resolved}' does not exist!`);
  }
  if (!statSync(resolved).isDirectory()) {
    throw new MigrationError('configuration', `${label} '${resolved}' is not a directory`);
  }
  return resolved;
}

export function resolveMigrationConfig(
  input: MigrationInput,
  env: NodeJS.ProcessEnv = process.env
): MigrationConfig {
  const parsed = InputSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new MigrationError('configuration', issue?.message ?? 'Invalid arguments', parsed.error.issues);
  }
  const options = parsed.data;

  const commandLine = options.paperworkCommand || env.PAPERWORK_JSON_COMMAND;
  const paperworkCommand = commandLine ? parseCommandLine(commandLine) : DEFAULT_PAPERWORK_COMMAND;
  if (paperworkCommand.length === 0) {
    throw new MigrationError('configuration', 'paperwork-json command is empty');
  }

  return {
    archivePath: requireDirectory(options.archivePath, 'Paperwork archive'),
    paperlessUrl: options.paperlessUrl.replace(/\/+$/, ''),
    token: options.token,
    exportDir: requireDirectory(options.exportDir, 'Export directory'),
    dryRun: options.dryRun,
    continueOnError: options.continueOnError,
    paperworkCommand,
    reportPath: options.reportPath ? path.resolve(options.reportPath) : undefined,
  };
}
