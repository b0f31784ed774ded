/**
 * Removes repeated comma-separated tags from a prompt.
 *
 * Tags are compared case-insensitively; the first spelling wins. Weight and
 * bracket syntax (`{tag}`, `[tag]`, `-0.8::tag::`) is part of a tag's
 * identity, so `{tag}` and `tag` are both kept.
 */
export function deduplicateTags(prompt: string): string {
  if (!prompt) {
    return prompt;
  }

  const seen = new Set<string>();
  const kept: string[] = [];

  for (const part of prompt.split(",")) {
    const tag = part.trim();
    if (!tag) continue;

    const key = tag.toLowerCase();
    if (seen.has(key)) continue;

    seen.add(key);
    kept.push(tag);
  }

  return kept.join(", ");
}
