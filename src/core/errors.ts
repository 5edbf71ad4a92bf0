/**
 * Migration errors
 *
 * Every failure that aborts a run (or a single document, with
 * --continue-on-error) is raised as a MigrationError tagged with its kind.
 */

export type MigrationErrorKind =
  | 'configuration'  // Missing paths, bad arguments
  | 'connectivity'   // paperless-ngx unreachable, probe or tag list failed
  | 'subprocess'     // paperwork-json exited non-zero or printed garbage
  | 'data'           // Document name without a usable date
  | 'upload';        // post_document rejected the file

export class MigrationError extends Error {
  readonly kind: MigrationErrorKind;
  readonly details?: unknown;

  constructor(kind: MigrationErrorKind, message: string, details?: unknown) {
    super(message);
    this.name = 'MigrationError';
    this.kind = kind;
    this.details = details;
  }
}

/**
 * Human-readable message for anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
