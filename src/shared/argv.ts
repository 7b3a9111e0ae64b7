/** Value following `--name`, or undefined when the flag is absent or has no value */
export function readFlag(argv: readonly string[], name: string): string | undefined {
  const idx = argv.indexOf(`--${name}`);
  if (idx === -1 || idx + 1 >= argv.length) return undefined;
  const value = argv[idx + 1];
  return value.startsWith('--') ? undefined : value;
}

export function hasFlag(argv: readonly string[], name: string): boolean {
  return argv.includes(`--${name}`);
}
