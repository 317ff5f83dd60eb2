export interface ExportArgs {
  positional: string[];
  master: boolean;
  /** Titles given with --skip, in order */
  skipSheets: string[];
}

/**
 * Split export-sheets arguments into flags and positional arguments
 * @throws Error if --skip has no title after it
 */
export function parseExportArgs(args: string[]): ExportArgs {
  const result: ExportArgs = { positional: [], master: false, skipSheets: [] };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--master') {
      result.master = true;
    } else if (arg === '--skip') {
      const title = args[i + 1];
      if (title === undefined) {
        throw new Error('--skip needs a sheet title');
      }
      result.skipSheets.push(title);
      i++;
    } else {
      result.positional.push(arg);
    }
  }
  return result;
}
