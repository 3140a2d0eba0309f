/**
 * Keeps entries whose key starts with `prefix`, keyed without it.
 * An empty prefix keeps everything.
 */
export function stripPrefix<V>(values: Record<string, V>, prefix: string): Record<string, V> {
  if (!prefix) return { ...values }

  const filtered: Record<string, V> = {}

  for (const [key, value] of Object.entries(values)) {
    if (key.startsWith(prefix) && key.length > prefix.length) {
      filtered[key.slice(prefix.length)] = value
    }
  }

  return filtered
}
