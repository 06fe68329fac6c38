export interface SSEMessage {
  event: string;
  data: string;
  id?: string;
}

export interface SSEWriter {
  writeSSE(message: SSEMessage): Promise<void>;
  close(): void;
}

/**
 * Creates a web-standard Response with SSE content.
 * The handler receives an SSEWriter to write events; writes after the
 * client went away are dropped.
 */
export function createSSEStream(
  handler: (writer: SSEWriter) => Promise<void>,
  signal?: AbortSignal,
): Response {
  let controller: ReadableStreamDefaultController<Uint8Array> | undefined;
  let closed = false;
  const encoder = new TextEncoder();

  const stream = new ReadableStream<Uint8Array>({
    start(ctrl) {
      controller = ctrl;
    },
    cancel() {
      closed = true;
    },
  });

  const writer: SSEWriter = {
    async writeSSE({ event, data, id }) {
      if (closed || !controller) return;
      let message = "";
      if (id) message += `id: ${id}\n`;
      message += `event: ${event}\n`;
      message += `data: ${data}\n\n`;
      controller.enqueue(encoder.encode(message));
    },
    close() {
      if (closed || !controller) return;
      closed = true;
      controller.close();
    },
  };

  void handler(writer)
    .catch((err: unknown) => console.error("[sse] stream handler failed:", err))
    .finally(() => writer.close());

  signal?.addEventListener("abort", () => writer.close(), { once: true });

  return new Response(stream, {
    headers: {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    },
  });
}
