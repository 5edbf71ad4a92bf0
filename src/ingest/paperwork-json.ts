/**
 * Paperwork Migrate - paperwork-json Adapter
 *
 * Wraps the two paperwork-json subcommands the migration needs:
 * - show <id>: document metadata as JSON (labels live under document.labels)
 * - export <id> [--filter f]... [--out path]: without --out, prints the
 *   filters available for the document; with --out, writes the export
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import path from 'path';
import { z } from 'zod';

import { MigrationError } from '../core/errors.js';

const execFileAsync = promisify(execFile);

// ============================================================================
// Command Runner
// ============================================================================

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (file: string, args: string[]) => Promise<CommandResult>;

/**
 * Run a command to completion, rejecting on a non-zero exit
 */
export const execFileRunner: CommandRunner = async (file, args) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    encoding: 'utf-8',
    maxBuffer: 64 * 1024 * 1024,
  });
  return { stdout, stderr };
};

function describeFailure(error: unknown): { code?: number | string; stderr?: string } {
  if (typeof error !== 'object' || error === null) return {};
  const code =
    'code' in error && (typeof error.code === 'number' || typeof error.code === 'string')
      ? error.code
      : undefined;
  const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr.trim() : undefined;
  return { code, stderr };
}

// ============================================================================
// Output Schemas
// ============================================================================

const ShowOutputSchema = z.object({
  document: z.object({
    labels: z.array(z.object({ label: z.string() })),
  }),
});

const FilterListSchema = z.array(z.string());

// ============================================================================
// Adapter
// ============================================================================

export class PaperworkJson {
  constructor(
    private readonly command: string[],
    private readonly run: CommandRunner = execFileRunner
  ) {
    if (command.length === 0) {
      throw new MigrationError('configuration', 'paperwork-json command is empty');
    }
  }

  private async invoke(args: string[]): Promise<string> {
    const [file, ...baseArgs] = this.command;
    try {
      const { stdout } = await this.run(file, [...baseArgs, ...args]);
      return stdout;
    } catch (error) {
      const { code, stderr } = describeFailure(error);
      const exit = code === undefined ? '' : ` (exit code ${code})`;
      throw new MigrationError(
        'subprocess',
        `paperwork-json ${args.join(' ')} failed${exit}${stderr ? `: ${stderr}` : ''}`,
        { args, code, stderr }
      );
    }
  }

  private async invokeJson(args: string[]): Promise<unknown> {
    const stdout = await this.invoke(args);
    try {
      return JSON.parse(stdout);
    } catch {
      throw new MigrationError(
        'subprocess',
        `paperwork-json ${args.join(' ')} did not print valid JSON`,
        { args, stdout: stdout.slice(0, 200) }
      );
    }
  }

  /**
   * Labels attached to a document. A document without labels is not an error.
   */
  async getLabels(docId: string): Promise<string[]> {
    const info = await this.invokeJson(['show', docId]);
    const parsed = ShowOutputSchema.safeParse(info);
    if (!parsed.success) {
      console.warn(`[paperwork] No labels for ${docId}`);
      return [];
    }
    return parsed.data.document.labels.map((l) => l.label);
  }

  /**
   * Filters paperwork-json can apply to this document (depends on how it was
   * created: imported PDF vs scanned pages)
   */
  async listFilters(docId: string): Promise<string[]> {
    const output = await this.invokeJson(['export', docId]);
    const parsed = FilterListSchema.safeParse(output);
    if (!parsed.success) {
      throw new MigrationError(
        'subprocess',
        `paperwork-json export ${docId} printed an unexpected filter list`,
        parsed.error.issues
      );
    }
    return parsed.data;
  }

  /**
   * Export a document through the given filter chain
   */
  async exportDocument(docId: string, filters: string[], outPath: string): Promise<void> {
    const args = ['export', docId];
    for (const filter of filters) {
      args.push('--filter', filter);
    }
    args.push('--out', path.resolve(outPath));
    await this.invoke(args);
  }
}
