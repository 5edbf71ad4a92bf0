/**
 * Migrate Command
 *
 * paperwork-migrate <archive> <paperless-url> <token> <export-dir>
 */

import type { Command } from 'commander';
import { writeFile } from 'fs/promises';

import { c } from '../colors.js';
import { resolveMigrationConfig } from '../../core/config.js';
import { PaperlessClient } from '../../core/paperless-client.js';
import type { MigrationSummary } from '../../core/types.js';
import { PaperworkJson, execFileRunner, type CommandRunner } from '../../ingest/paperwork-json.js';
import { migrateArchive } from '../../migrate/index.js';

/** Swapped out by tests; defaults run the real subprocess and network */
export interface MigrateCommandDeps {
  run?: CommandRunner;
  fetch?: typeof fetch;
}

interface MigrateCommandOptions {
  dryRun?: boolean;
  continueOnError?: boolean;
  paperworkCommand?: string;
  report?: string;
}

export function formatSummary(summary: MigrationSummary): string[] {
  const { counts } = summary;
  const lines = [
    c.title(summary.dryRun ? 'Migration Summary (dry run)' : 'Migration Summary'),
    `  Documents:   ${summary.total}`,
    `  Uploaded:    ${counts.uploaded}`,
    `  Exported:    ${counts.exported}`,
    `  Skipped:     ${counts.skipped}`,
    `  Unsupported: ${counts.unsupported}`,
    `  Failed:      ${counts.failed}`,
  ];

  const unsupported = summary.results.filter((r) => r.status === 'unsupported');
  if (unsupported.length > 0) {
    lines.push('', c.warning('Not exported (no known filter chain):'));
    for (const r of unsupported) {
      lines.push(`  - ${r.id}`);
    }
  }

  const failed = summary.results.filter((r) => r.status === 'failed');
  if (failed.length > 0) {
    lines.push('', c.warning('Failed:'));
    for (const r of failed) {
      lines.push(`  - ${r.id}: ${r.error ?? 'unknown error'}`);
    }
  }

  return lines;
}

export function registerMigrateCommand(program: Command, deps: MigrateCommandDeps = {}): void {
  program
    .argument('<archive>', 'Path to paperwork archive')
    .argument('<paperless-url>', 'URL to paperless-ngx instance')
    .argument('<token>', 'paperless-ngx token to use for authentication')
    .argument('<export-dir>', 'Path to store exported PDFs')
    .option('--dry-run', 'Export PDFs without uploading them')
    .option('--continue-on-error', 'Record failed documents and keep going instead of aborting')
    .option('--paperwork-command <cmd>', 'Command line for paperwork-json (default: flatpak)')
    .option('--report <file>', 'Write a JSON summary of the run')
    .action(async (
      archive: string,
      paperlessUrl: string,
      token: string,
      exportDir: string,
      options: MigrateCommandOptions
    ) => {
      const config = resolveMigrationConfig({
        archivePath: archive,
        paperlessUrl,
        token,
        exportDir,
        dryRun: options.dryRun,
        continueOnError: options.continueOnError,
        paperworkCommand: options.paperworkCommand,
        reportPath: options.report,
      });

      console.log(`\n${c.title('Paperwork → paperless-ngx')}`);
      console.log(`Archive:    ${c.path(config.archivePath)}`);
      console.log(`Server:     ${config.paperlessUrl}`);
      console.log(`Export dir: ${c.path(config.exportDir)}`);
      console.log(`Mode:       ${config.dryRun ? c.warning('DRY RUN (nothing is uploaded)') : 'LIVE'}\n`);

      const paperwork = new PaperworkJson(config.paperworkCommand, deps.run ?? execFileRunner);
      const paperless = new PaperlessClient({
        baseUrl: config.paperlessUrl,
        token: config.token,
        fetch: deps.fetch,
      });

      const summary = await migrateArchive(paperwork, paperless, {
        archivePath: config.archivePath,
        exportDir: config.exportDir,
        dryRun: config.dryRun,
        continueOnError: config.continueOnError,
        onProgress: (current, total, docId) => {
          console.log(`${c.dim(`[${current}/${total}]`)} Processing ${docId}...`);
        },
      });

      console.log('');
      for (const line of formatSummary(summary)) {
        console.log(line);
      }

      if (config.reportPath) {
        await writeFile(config.reportPath, JSON.stringify(summary, null, 2) + '\n');
        console.log(`\nReport written to ${c.path(config.reportPath)}`);
      }

      if (summary.counts.failed > 0) {
        process.exitCode = 1;
      }
    });
}
