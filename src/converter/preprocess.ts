const BLOCK_BEGIN = /^\s*BEGIN\b/i;
const BLOCK_END = /^\s*END\s*;?\s*$/i;

/** Drops a UTF-8 byte order mark and converts CRLF / CR line endings to LF. */
export function normalizeSource(text: string): string {
  return text.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');
}

/**
 * Removes `BEGIN ... END` bodies line by line, counting nested blocks.
 * Lines outside any block are kept as they are.
 */
export function stripProceduralBlocks(text: string): string {
  const kept: string[] = [];
  let depth = 0;

  for (const line of text.split('\n')) {
    if (BLOCK_BEGIN.test(line)) {
      depth++;
      continue;
    }
    if (depth > 0) {
      if (BLOCK_END.test(line)) depth--;
      continue;
    }
    kept.push(line);
  }
  return kept.join('\n');
}
