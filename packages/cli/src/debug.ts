/**
 * Print one labelled diagnostic line to stderr.
 * Intended to be used behind the --debug flag.
 */
export function printDebug(label: string, value: unknown): void {
  process.stderr.write(`[semregex] ${label}: ${JSON.stringify(value)}\n`);
}
