export interface SseFrame {
  event: string;
  id?: string;
  data: string;
}

/**
 * Splits buffered `text/event-stream` input into complete frames. The
 * unterminated tail comes back as `rest` for the next chunk.
 */
export const parseSseFrames = (buffer: string): { frames: SseFrame[]; rest: string } => {
  const normalized = buffer.replace(/\r\n/g, '\n');
  const blocks = normalized.split('\n\n');
  const rest = blocks.pop() ?? '';
  const frames: SseFrame[] = [];

  for (const block of blocks) {
    let event = 'message';
    let id: string | undefined;
    const data: string[] = [];

    for (const line of block.split('\n')) {
      if (!line || line.startsWith(':')) continue;
      const colon = line.indexOf(':');
      const field = colon === -1 ? line : line.slice(0, colon);
      const value = colon === -1 ? '' : line.slice(colon + 1).replace(/^ /, '');
      if (field === 'event') event = value;
      else if (field === 'id') id = value;
      else if (field === 'data') data.push(value);
    }

    if (data.length > 0) {
      frames.push({ event, id, data: data.join('\n') });
    }
  }

  return { frames, rest };
};
