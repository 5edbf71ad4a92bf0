#!/usr/bin/env node

/**
 * Paperwork Migrate CLI
 *
 * Migrates documents from a Paperwork archive to a paperless-ngx instance.
 *
 * paperwork-json is used to list the documents, export them and read their
 * labels. The paperless-ngx REST API consumes the exported PDFs. Paperwork
 * labels are assumed to match paperless-ngx tag slugs.
 */

// Load environment variables from .env files
// .env.local takes precedence over .env
import { existsSync, readFileSync } from 'fs';
import { parse } from 'dotenv';

function loadEnvFile(filePath: string, override = false): void {
  if (!existsSync(filePath)) return;
  try {
    const parsed = parse(readFileSync(filePath, 'utf-8'));
    for (const [key, value] of Object.entries(parsed)) {
      if (override || process.env[key] === undefined) {
        process.env[key] = value;
      }
    }
  } catch (error) {
    console.warn(`[env] Could not read ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

loadEnvFile('.env');
loadEnvFile('.env.local', true);

import { Command } from 'commander';

import { c } from './cli/colors.js';
import { registerMigrateCommand } from './cli/commands/migrate.js';
import { errorMessage } from './core/errors.js';

const program = new Command();

program
  .name('paperwork-migrate')
  .description('Migrate paperwork documents to paperless-ngx')
  .version('0.1.0');

registerMigrateCommand(program);

program.parseAsync().catch((error: unknown) => {
  console.error(`\n${c.error('Error')} ${errorMessage(error)}`);
  process.exit(1);
});
