export type AudioFieldExtractor = (payload: unknown) => Buffer | undefined;

/**
 * Reads a newline-delimited JSON response and concatenates the audio carried by each line,
 * in arrival order. Lines that are not JSON or carry no audio are skipped.
 */
export async function collectNdjsonAudio(
  stream: AsyncIterable<Buffer | string>,
  extract: AudioFieldExtractor,
): Promise<Buffer> {
  const decoder = new TextDecoder();
  const pieces: Buffer[] = [];
  let buffer = '';

  const consume = (line: string) => {
    const trimmed = line.trim();
    const data = trimmed.startsWith('data:') ? trimmed.slice(5).trim() : trimmed;
    if (!data) {
      return;
    }
    let payload: unknown;
    try {
      payload = JSON.parse(data);
    } catch {
      return;
    }
    try {
      const audio = extract(payload);
      if (audio && audio.length > 0) {
        pieces.push(audio);
      }
    } catch {
      // undecodable audio field on this line
      return;
    }
  };

  for await (const chunk of stream) {
    buffer += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
    const lines = buffer.split('\n');
    buffer = lines.pop() ?? '';
    lines.forEach(consume);
  }
  buffer += decoder.decode();
  consume(buffer);

  return Buffer.concat(pieces);
}
