/** Longest text WhatsApp Web accepts in a single message. */
export const WHATSAPP_MAX_LENGTH = 65_536;

/**
 * Split text into chunks no longer than `maxLength`, preferring paragraph,
 * then sentence, then line boundaries over a hard cut.
 */
export function splitMessage(text: string, maxLength: number = WHATSAPP_MAX_LENGTH): string[] {
  if (maxLength <= 0) throw new Error(`maxLength must be positive (got ${maxLength})`);
  if (text.length <= maxLength) return [text];

  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > maxLength) {
    const window = remaining.slice(0, maxLength);
    let splitIdx = -1;

    const paragraphIdx = window.lastIndexOf("\n\n");
    if (paragraphIdx > maxLength * 0.3) {
      splitIdx = paragraphIdx;
    }

    if (splitIdx === -1) {
      const sentenceMatch = window.match(/.*[.!?]\s/s);
      if (sentenceMatch) {
        splitIdx = sentenceMatch[0].length;
      }
    }

    if (splitIdx === -1) {
      const newlineIdx = window.lastIndexOf("\n");
      if (newlineIdx > maxLength * 0.3) {
        splitIdx = newlineIdx;
      }
    }

    if (splitIdx === -1) {
      splitIdx = maxLength;
    }

    chunks.push(remaining.slice(0, splitIdx).trimEnd());
    remaining = remaining.slice(splitIdx).trimStart();
  }

  if (remaining) {
    chunks.push(remaining);
  }

  return chunks;
}
