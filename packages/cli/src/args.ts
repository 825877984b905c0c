export function optionalString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

export function projectDir(argv: Record<string, unknown>): string {
  return optionalString(argv['project']) ?? process.cwd();
}

export function isVerbose(argv: Record<string, unknown>): boolean {
  return argv['verbose'] === true;
}
