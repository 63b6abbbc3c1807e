import type { FreezeErrorCode } from './errors';
import type { PropertyPath } from './types';

/**
 * Failure reporting for generation runs.
 *
 * A failed unit aborts the whole run (no partial file is written for it). The
 * report names the unit, the first failure, and, where the cause is fixable in
 * the value's schema rather than in the source, a hint.
 */

export type GenerateSummaryContext = {
  /**
   * Files written by the run, in write order.
   */
  writtenFiles: readonly string[];

  /**
   * Directories that yielded no unit.
   */
  skippedDirectories: number;

  /**
   * Maximum number of files to list in the summary string.
   * @default 5
   */
  maxPreviewFiles?: number;
};

/**
 * Formats a value path as a dotted string.
 *
 * @param path - Value path (e.g., `["Files", 0, "Body"]`)
 * @returns Dotted path (e.g., `"Files.0.Body"`), or `"<root>"` for the empty path
 */
export function formatPathForDisplay(path: PropertyPath): string {
  return path.length > 0 ? path.join('.') : '<root>';
}

/**
 * Formats a limited preview list of written files.
 *
 * @param files - Files to preview
 * @param limit - Maximum number of items to display
 * @returns Formatted preview string; undefined if input is empty or limit is <= 0
 */
function formatFilePreview(
  files: readonly string[],
  limit: number
): string | undefined {
  if (files.length === 0 || limit <= 0) return undefined;

  const items = files.slice(0, limit).map(file => `"${file}"`);

  // Truncation indicator
  if (files.length > limit) {
    items.push(`… (${files.length - limit} more)`);
  }

  return `preview: ${items.join(', ')}`;
}

/**
 * Formats a one-line summary of a finished run.
 *
 * @example
 * `Summary: wrote 3 files, skipped 2 directories; preview: "a/frozen.gen.js", … (1 more)`
 */
export function formatGenerateSummary(context: GenerateSummaryContext): string {
  const parts = [
    `Summary: wrote ${context.writtenFiles.length} files, skipped ${context.skippedDirectories} directories`
  ];

  const preview = formatFilePreview(
    context.writtenFiles,
    context.maxPreviewFiles ?? 5
  );
  if (preview) parts.push(preview);

  return parts.join('; ');
}

/**
 * Formats an actionable hint for a failure code.
 *
 * Only failures caused by the value's schema get a hint; the others point at
 * the parser or at the input itself.
 *
 * @param code - The failure code, or undefined for foreign errors
 * @returns Hint line, or undefined
 */
function formatFailureHint(
  code: FreezeErrorCode | undefined
): string | undefined {
  switch (code) {
    case 'UnsupportedKind':
      return (
        'Hint: values of this kind cannot be frozen. Hide the field that holds ' +
        'it (field(name, type, { visible: false })) or change its type.'
      );

    case 'CyclicValue':
      return (
        'Hint: hide the field that points back to an ancestor ' +
        '(e.g. a parent link) so the frozen value stays a tree.'
      );

    default:
      return undefined;
  }
}

/**
 * Report (and throw) when a unit could not be frozen.
 *
 * @param directory - Directory of the failing unit
 * @param error - The failure
 * @param code - The failure code when the error is a `FreezeError`
 * @throws Always throws with the formatted message; the original error is the `cause`
 * @returns never
 */
export function reportUnitFailure(
  directory: string,
  error: Error,
  code: FreezeErrorCode | undefined
): never {
  const messageParts = [
    `[freeze] Cannot freeze the unit in "${directory}".`,
    error.message
  ];

  const hint = formatFailureHint(code);
  if (hint) messageParts.push(hint);

  throw new Error(messageParts.join('\n'), { cause: error });
}
