export function lowercaseFirst(text: string): string {
  return text.charAt(0).toLowerCase() + text.slice(1);
}

export function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

export function stripQuotes(text: string): string {
  return text.replaceAll(/^["']+|["']+$/g, "");
}

export function normalizeIdentifier(text: string): string {
  return stripQuotes(text).replaceAll(/[^A-Za-z0-9_]/g, "_");
}

export function dedupe<T>(items: readonly T[]): readonly T[] {
  return [...new Set(items)];
}
