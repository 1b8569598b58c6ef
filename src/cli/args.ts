export type CliMode = "externalTables" | "models" | "generate";

export type CliArgs = {
  mode: CliMode;
};

const MODE_FLAGS: readonly [string, CliMode][] = [
  ["--externalTables", "externalTables"],
  ["--models", "models"],
  ["--generate", "generate"],
];

const USAGE = MODE_FLAGS.map(([flag]) => flag).join(" | ");

export function parseArgs(argv: string[]): CliArgs {
  const flags = new Set(argv);

  const modes = MODE_FLAGS.filter(([flag]) => flags.has(flag)).map(([, mode]) => mode);

  if (modes.length === 0) {
    throw new Error(`No mode specified. Use one of: ${USAGE}`);
  }

  if (modes.length > 1) {
    throw new Error(`Multiple modes specified. Use only one of: ${USAGE}`);
  }

  return { mode: modes[0] };
}
