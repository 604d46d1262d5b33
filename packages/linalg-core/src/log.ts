const WARNED_TAGS = new Set<string>();

/**
 * console.warn with a `[tag]` prefix, at most once per tag+message.
 */
export function warnOnce(tag: string, message: string): void {
  const key = `${tag}:${message}`;
  if (WARNED_TAGS.has(key)) return;
  WARNED_TAGS.add(key);
  console.warn(`[${tag}] ${message}`);
}

export function resetWarnings(): void {
  WARNED_TAGS.clear();
}
