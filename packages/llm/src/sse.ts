// ──────────────────────────────────────────────
// Weft - Server-Sent Events reader
// Yields the `data:` payload of each event in a fetch body
// ──────────────────────────────────────────────

export async function* readEventData(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      buffer += decoder.decode(value, { stream: true });

      let boundary = buffer.indexOf("\n");
      while (boundary >= 0) {
        const line = buffer.slice(0, boundary).replace(/\r$/, "");
        buffer = buffer.slice(boundary + 1);
        const data = parseDataLine(line);
        if (data !== null) yield data;
        boundary = buffer.indexOf("\n");
      }
    }

    buffer += decoder.decode();
    const tail = parseDataLine(buffer.replace(/\r$/, ""));
    if (tail !== null) yield tail;
  } finally {
    await reader.cancel().catch(() => undefined);
    reader.releaseLock();
  }
}

function parseDataLine(line: string): string | null {
  if (!line.startsWith("data:")) return null;
  return line.slice(5).trimStart();
}
