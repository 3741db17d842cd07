/**
 * A failure the CLI reports with its own message instead of `Error: …`.
 *
 * `usage` errors also point at `--help`.
 */
export class CliError extends Error {
  constructor(
    message: string,
    readonly options: { usage?: boolean; exitCode?: number } = {},
  ) {
    super(message);
    this.name = 'CliError';
  }

  get exitCode(): number {
    return this.options.exitCode ?? 1;
  }
}
