export interface SseEvent {
  id?: string;
  event?: string;
  data: string;
}

/**
 * Incremental text/event-stream decoder over a Node readable (or any async
 * iterable of byte or string chunks). Events may be split across chunks at
 * arbitrary boundaries, including inside a multi-byte character.
 */
export async function* parseSse(
  source: AsyncIterable<Uint8Array | string>,
): AsyncGenerator<SseEvent, void, undefined> {
  const decoder = new TextDecoder('utf-8');
  let buffer = '';
  let eventId: string | undefined;
  let eventName: string | undefined;
  let dataLines: string[] = [];

  const flushEvent = (): SseEvent | null => {
    if (dataLines.length === 0) {
      eventId = undefined;
      eventName = undefined;
      return null;
    }
    const evt: SseEvent = { data: dataLines.join('\n') };
    if (eventId !== undefined) evt.id = eventId;
    if (eventName) evt.event = eventName;
    eventId = undefined;
    eventName = undefined;
    dataLines = [];
    return evt;
  };

  const takeLine = (line: string) => {
    if (line.startsWith(':')) return;

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) value = value.slice(1);

    switch (field) {
      case 'data':
        dataLines.push(value);
        break;
      case 'event':
        eventName = value;
        break;
      case 'id':
        eventId = value;
        break;
      default:
        // retry and unknown fields carry nothing we use
        break;
    }
  };

  for await (const chunk of source) {
    buffer += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
    buffer = buffer.replace(/\r\n/g, '\n').replace(/\r(?!$)/g, '\n');

    while (true) {
      const nl = buffer.indexOf('\n');
      if (nl === -1) break;
      const line = buffer.slice(0, nl);
      buffer = buffer.slice(nl + 1);

      if (line === '') {
        const evt = flushEvent();
        if (evt) yield evt;
        continue;
      }
      takeLine(line);
    }
  }

  buffer += decoder.decode();
  const tail = buffer.replace(/\r$/, '');
  if (tail !== '') takeLine(tail);
  const evt = flushEvent();
  if (evt) yield evt;
}
