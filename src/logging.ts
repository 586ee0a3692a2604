const warned = new Set<string>();

/**
 * Print a warning the first time a given message is seen in this process.
 */
export function warnOnce(message: string): void {
  if (warned.has(message)) return;
  warned.add(message);
  // eslint-disable-next-line no-console
  console.warn(message);
}
