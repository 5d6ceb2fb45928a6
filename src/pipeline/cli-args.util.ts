export const PIPELINE_COMMANDS = [
  'collect-reference',
  'scrape',
  'catalogue',
  'labels',
  'all',
] as const;

export type PipelineCommand = (typeof PIPELINE_COMMANDS)[number];

export interface CliArgs {
  command: PipelineCommand;
  /** Environment overrides, e.g. `--output-dir=out` -> `OUTPUT_DIR=out` */
  overrides: Record<string, string>;
  help: boolean;
}

export const USAGE = `Usage: game-label-automator <command> [--key=value ...]

Commands:
  collect-reference  Collect IGDB reference data (platforms, families, logos, ...)
  scrape             Scrape platform and game details for the platforms CSV
  catalogue          Select games per platform and write catalogue.json
  labels             Render labels for the catalogue selection
  all                scrape, catalogue and labels in sequence

Options map onto environment variables:
  --output-dir=./output  --catalogue-quota=20  --label-formats=svg,png`;

function isCommand(value: string): value is PipelineCommand {
  return PIPELINE_COMMANDS.some((command) => command === value);
}

export function toEnvKey(option: string): string {
  return option.replace(/^-+/, '').replace(/-/g, '_').toUpperCase();
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { command: 'all', overrides: {}, help: false };
  let commandSeen = false;

  for (const token of argv.slice(2)) {
    if (token === '--help' || token === '-h') {
      args.help = true;
    } else if (token.startsWith('--')) {
      const [key, ...rest] = token.split('=');
      args.overrides[toEnvKey(key)] = rest.length > 0 ? rest.join('=') : 'true';
    } else if (!commandSeen && isCommand(token)) {
      args.command = token;
      commandSeen = true;
    } else {
      throw new Error(`Unknown argument '${token}'\n\n${USAGE}`);
    }
  }

  return args;
}
