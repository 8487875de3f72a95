/**
 * Thrown by a command that has already reported its failure. The runner
 * exits with status 1 without printing anything more.
 */
export class CliFailure extends Error {
  constructor(message = "command failed") {
    super(message);
    this.name = "CliFailure";
  }
}
