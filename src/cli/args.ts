export interface CliArgs {
  targetDate?: string;
  scrapeOnly: boolean;
  help: boolean;
}

export const USAGE = [
  'Usage: paper-digest [--date YYYY-MM-DD] [--scrape-only]',
  '',
  '  --date YYYY-MM-DD  run for this arXiv publication day instead of the latest workday',
  '  --scrape-only      fetch and store raw papers without classifying or sending',
].join('\n');

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { scrapeOnly: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--scrape-only') {
      args.scrapeOnly = true;
    } else if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--date') {
      const value = argv[i + 1];
      if (!value || value.startsWith('--')) {
        throw new RangeError('--date needs a value in YYYY-MM-DD form');
      }
      args.targetDate = value;
      i += 1;
    } else if (arg?.startsWith('--date=')) {
      args.targetDate = arg.slice('--date='.length);
    } else {
      throw new RangeError(`Unknown argument: ${arg}`);
    }
  }

  return args;
}
