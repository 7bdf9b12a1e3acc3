// src/rpc/sse.ts — Server-Sent Events decoder
//
// Parses an AsyncIterable<Uint8Array> (a fetch response body) into events.
// Used by the RPC client for server streams and by the provider adapters for
// vendor streams.

export interface SSEEvent {
  /** "message" when the event carried no event: field */
  event: string
  data: string
}

interface PendingEvent {
  event: string
  dataLines: string[]
}

function applyField(line: string, pending: PendingEvent): void {
  if (line.startsWith(":")) return // comment

  const colonIdx = line.indexOf(":")
  const field = colonIdx === -1 ? line : line.slice(0, colonIdx)
  let value = colonIdx === -1 ? "" : line.slice(colonIdx + 1)
  if (value.startsWith(" ")) value = value.slice(1)

  if (field === "event") pending.event = value
  else if (field === "data") pending.dataLines.push(value)
  // id, retry and unknown fields carry nothing we use
}

function fresh(): PendingEvent {
  return { event: "message", dataLines: [] }
}

/**
 * Decode an SSE byte stream. Handles CRLF/CR line endings (including a CRLF
 * split across chunks), multi-line data and events split across chunks.
 * Events dispatch on blank lines; a final event without a trailing blank
 * line is still emitted.
 */
export async function* parseSSEBytes(stream: AsyncIterable<Uint8Array>): AsyncGenerator<SSEEvent> {
  const decoder = new TextDecoder("utf-8")
  let buffer = ""
  let heldCR = false
  let pending = fresh()

  // Appends text to the buffer and returns the complete events it closes
  const feed = (text: string): SSEEvent[] => {
    if (heldCR) text = "\r" + text
    // A trailing CR waits for the next chunk, which may start with its LF
    heldCR = text.endsWith("\r")
    if (heldCR) text = text.slice(0, -1)
    buffer += text.replace(/\r\n/g, "\n").replace(/\r/g, "\n")

    const events: SSEEvent[] = []
    let idx = buffer.indexOf("\n")
    while (idx !== -1) {
      const line = buffer.slice(0, idx)
      buffer = buffer.slice(idx + 1)

      if (line === "") {
        if (pending.dataLines.length > 0) {
          events.push({ event: pending.event, data: pending.dataLines.join("\n") })
        }
        pending = fresh()
      } else {
        applyField(line, pending)
      }
      idx = buffer.indexOf("\n")
    }
    return events
  }

  for await (const chunk of stream) {
    yield* feed(decoder.decode(chunk, { stream: true }))
  }

  yield* feed(decoder.decode())
  if (heldCR) yield* feed("\n")
  if (buffer) applyField(buffer, pending)
  if (pending.dataLines.length > 0) {
    yield { event: pending.event, data: pending.dataLines.join("\n") }
  }
}

/** Decode each event's data as JSON, skipping events whose data is not JSON */
export async function* parseSSEJson(
  stream: AsyncIterable<Uint8Array>,
): AsyncGenerator<{ event: string; data: unknown }> {
  for await (const ev of parseSSEBytes(stream)) {
    let data: unknown
    try {
      data = JSON.parse(ev.data)
    } catch {
      continue
    }
    yield { event: ev.event, data }
  }
}
