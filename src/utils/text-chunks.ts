/** MP3 frames are self-contained, so byte concatenation yields a playable file. */
export function concatBytes(parts: Uint8Array[]): Uint8Array {
  const totalLength = parts.reduce((sum, buf) => sum + buf.byteLength, 0);
  const combined = new Uint8Array(totalLength);
  let offset = 0;

  for (const buf of parts) {
    combined.set(buf, offset);
    offset += buf.byteLength;
  }

  return combined;
}

export function splitTextIntoChunks(text: string, maxChars: number): string[] {
  const chunks: string[] = [];
  let start = 0;

  while (start < text.length) {
    let end = start + maxChars;

    // Prefer paragraph breaks, then sentence breaks, looking up to 500 chars past the limit
    if (end < text.length) {
      const searchEnd = Math.min(end + 500, text.length);
      const slice = text.substring(start, searchEnd);

      let sentenceEnd = -1;
      const regex = /[.!?]\s/g;
      let match;
      while ((match = regex.exec(slice)) !== null) {
        sentenceEnd = match.index + 1;
      }
      const paragraphEnd = slice.lastIndexOf('\n\n');

      if (paragraphEnd > maxChars - 500 && paragraphEnd > 0) {
        end = start + paragraphEnd;
      } else if (sentenceEnd > maxChars - 200) {
        end = start + sentenceEnd + 1;
      }
    }

    if (end <= start) {
      end = start + maxChars;
    }

    const chunk = text.substring(start, end);

    // Only trim first chunk's start and last chunk's end to preserve internal whitespace
    const trimmedChunk = start === 0
      ? chunk.trimStart()
      : (end >= text.length ? chunk.trimEnd() : chunk);

    if (trimmedChunk.trim().length > 0) {
      chunks.push(trimmedChunk);
    }

    start = end;
  }

  return chunks;
}
