export interface CliOptions {
  prompt?: string;
  historySize?: number;
  minimumWidth?: number;
  debug?: boolean;
}

/** Unknown flags are ignored; numeric values are checked by the console options. */
export function parseArgs(args: string[]): CliOptions {
  const opts: CliOptions = {};
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if ((args[i] === '--prompt' || args[i] === '-p') && value !== undefined) {
      opts.prompt = value;
      i++;
    } else if (args[i] === '--history-size' && value !== undefined) {
      opts.historySize = Number(value);
      i++;
    } else if (args[i] === '--minimum-width' && value !== undefined) {
      opts.minimumWidth = Number(value);
      i++;
    } else if (args[i] === '--debug') {
      opts.debug = true;
    }
  }
  return opts;
}
