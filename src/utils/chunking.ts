/**
 * Split text into chunks of at most `maxTokens` whitespace-delimited tokens.
 * Whitespace is normalised to single spaces inside each chunk.
 */
export function chunkText(text: string, maxTokens = 500): string[] {
  if (maxTokens < 1) throw new RangeError('maxTokens must be at least 1');

  const tokens = text.split(/\s+/).filter((t) => t.length > 0);
  const chunks: string[] = [];
  for (let i = 0; i < tokens.length; i += maxTokens) {
    chunks.push(tokens.slice(i, i + maxTokens).join(' '));
  }
  return chunks;
}
