/**
 * Raised for anything the user can fix by changing the command line:
 * unknown check names, conflicting or missing path selectors, directories
 * that don't exist, a tool installation that failed.
 *
 * The CLI prints the message and exits with exitCode; everything else that
 * reaches the top level is treated as a bug.
 */
export class CheckUsageError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = "CheckUsageError";
    this.exitCode = exitCode;
  }
}
