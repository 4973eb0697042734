/** One-line CLI failure text; every error path of the CLI prints through this. */
export const formatCliError = (error: unknown): string =>
  `✖ ${error instanceof Error ? error.message : String(error)}`;
