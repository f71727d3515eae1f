export interface CliArgs {
  configFile: string;
  dryRun: boolean;
  seed?: number;
  ui: boolean;
  replay?: string;
}

export function parseArgs(argv: string[]): CliArgs {
  let configFile: string | undefined;
  let dryRun = false;
  let seed: number | undefined;
  let ui = true;
  let replay: string | undefined;

  const valueOf = (flag: string, i: number): string => {
    const next = argv[i + 1];
    if (!next || next.startsWith('--')) throw new Error(`Missing value for ${flag}`);
    return next;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]!;

    // npm forwards a literal `--` with `npm start -- --dry-run`.
    if (arg === '--') continue;

    if (arg === '--dry-run' || arg === '--dryrun') {
      dryRun = true;
      continue;
    }
    if (arg === '--no-ui' || arg === '--no-tui') {
      ui = false;
      continue;
    }
    if (arg === '--seed') {
      const raw = valueOf(arg, i);
      const n = Number(raw);
      if (!Number.isInteger(n)) throw new Error(`Invalid seed "${raw}" for ${arg}`);
      seed = n;
      i++;
      continue;
    }
    if (arg === '--config') {
      configFile = valueOf(arg, i);
      i++;
      continue;
    }
    if (arg === '--replay') {
      const next = argv[i + 1];
      replay = next && !next.startsWith('--') ? next : 'latest';
      if (replay === next) i++;
      continue;
    }
    if (arg.startsWith('-')) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    // First positional arg is the config file.
    if (!configFile) configFile = arg;
  }

  return { configFile: configFile ?? 'game-config.yaml', dryRun, seed, ui, replay };
}
