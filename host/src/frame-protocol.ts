/**
 * Stream framing protocol.
 *
 * Responses to multiplexed requests (those carrying `STREAM-ID`) are split
 * into frames of at most {@link MAX_FRAME_PAYLOAD} bytes. Frames of
 * different streams interleave on the connection; frames of one stream keep
 * their order and the last one carries the end flag.
 *
 * Length-prefixed frame (default):
 * +-------------+----------+------------+-----------------+
 * | u32 stream  | u8 flags | u32 length | payload bytes   |
 * +-------------+----------+------------+-----------------+
 * flags bit 0 = end of stream, integers big-endian.
 *
 * Delimited frame:
 *   <stream_id>|<0|1>|<payload>
 * Only decodable one frame at a time; it carries no length.
 */
export const MAX_FRAME_PAYLOAD = 1024;
export const FRAME_HEADER_BYTES = 9;
export const FRAME_DELIMITER = "|";

const FLAG_END = 0x01;
const MAX_STREAM_ID = 0xffffffff;
const DELIMITER_BYTE = 0x7c;

export type FrameEncoding = "length-prefixed" | "delimited";

export type Frame = {
  streamId: number;
  end: boolean;
  payload: Buffer;
};

export class FrameDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FrameDecodeError";
  }
}

function assertStreamId(streamId: number) {
  if (!Number.isInteger(streamId) || streamId < 0 || streamId > MAX_STREAM_ID) {
    throw new RangeError("stream id must be a uint32");
  }
}

function assertChunkSize(maxPayload: number) {
  if (!Number.isInteger(maxPayload) || maxPayload <= 0 || maxPayload > MAX_FRAME_PAYLOAD) {
    throw new RangeError(`frame payload size must be 1..${MAX_FRAME_PAYLOAD}`);
  }
}

/**
 * Split a payload into frames. The iterator is lazy and yields a single
 * empty end frame for an empty payload.
 */
export function* frameResponse(
  streamId: number,
  payload: Buffer,
  maxPayload = MAX_FRAME_PAYLOAD,
): Generator<Frame, void, undefined> {
  assertStreamId(streamId);
  assertChunkSize(maxPayload);

  if (payload.length === 0) {
    yield { streamId, end: true, payload: Buffer.alloc(0) };
    return;
  }

  for (let offset = 0; offset < payload.length; offset += maxPayload) {
    const next = offset + maxPayload;
    yield {
      streamId,
      end: next >= payload.length,
      payload: payload.subarray(offset, next),
    };
  }
}

/**
 * Frame a source of unknown length. One chunk is held back so the end flag
 * lands on the true last frame.
 */
export async function* frameStream(
  streamId: number,
  source: AsyncIterable<Buffer>,
  maxPayload = MAX_FRAME_PAYLOAD,
): AsyncGenerator<Frame, void, undefined> {
  assertStreamId(streamId);
  assertChunkSize(maxPayload);

  let pending: Buffer | null = null;
  for await (const chunk of source) {
    for (let offset = 0; offset < chunk.length; offset += maxPayload) {
      if (pending) yield { streamId, end: false, payload: pending };
      pending = chunk.subarray(offset, offset + maxPayload);
    }
  }

  yield { streamId, end: true, payload: pending ?? Buffer.alloc(0) };
}

export function encodeFrame(frame: Frame, encoding: FrameEncoding = "length-prefixed"): Buffer {
  assertStreamId(frame.streamId);
  if (frame.payload.length > MAX_FRAME_PAYLOAD) {
    throw new RangeError(`frame payload exceeds ${MAX_FRAME_PAYLOAD} bytes`);
  }

  if (encoding === "delimited") {
    const header = Buffer.from(
      `${frame.streamId}${FRAME_DELIMITER}${frame.end ? 1 : 0}${FRAME_DELIMITER}`,
      "ascii",
    );
    return Buffer.concat([header, frame.payload]);
  }

  const header = Buffer.alloc(FRAME_HEADER_BYTES);
  header.writeUInt32BE(frame.streamId, 0);
  header.writeUInt8(frame.end ? FLAG_END : 0, 4);
  header.writeUInt32BE(frame.payload.length, 5);
  return Buffer.concat([header, frame.payload]);
}

/**
 * Decode one delimited frame: split on the first two delimiters, the rest
 * is payload (so the payload may itself contain `|`).
 */
export function decodeDelimitedFrame(data: Buffer): Frame {
  const first = data.indexOf(DELIMITER_BYTE);
  const second = first === -1 ? -1 : data.indexOf(DELIMITER_BYTE, first + 1);
  if (first === -1 || second === -1) {
    throw new FrameDecodeError("delimited frame is missing a delimiter");
  }

  const idText = data.subarray(0, first).toString("ascii");
  const flagText = data.subarray(first + 1, second).toString("ascii");
  if (!/^\d+$/.test(idText)) {
    throw new FrameDecodeError(`invalid stream id: ${JSON.stringify(idText)}`);
  }
  if (flagText !== "0" && flagText !== "1") {
    throw new FrameDecodeError(`invalid end flag: ${JSON.stringify(flagText)}`);
  }

  const streamId = Number.parseInt(idText, 10);
  if (streamId > MAX_STREAM_ID) {
    throw new FrameDecodeError(`stream id out of range: ${idText}`);
  }

  return {
    streamId,
    end: flagText === "1",
    payload: data.subarray(second + 1),
  };
}

/**
 * Incremental decoder for length-prefixed frames read off a byte stream.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  constructor(private readonly maxPayload = MAX_FRAME_PAYLOAD) {}

  get bufferedBytes() {
    return this.buffer.length;
  }

  push(chunk: Buffer, onFrame: (frame: Frame) => void) {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    while (this.buffer.length >= FRAME_HEADER_BYTES) {
      const streamId = this.buffer.readUInt32BE(0);
      const flags = this.buffer.readUInt8(4);
      const length = this.buffer.readUInt32BE(5);

      if (length > this.maxPayload) {
        throw new FrameDecodeError(`frame payload too large: ${length}`);
      }
      if ((flags & ~FLAG_END) !== 0) {
        throw new FrameDecodeError(`unknown frame flags: 0x${flags.toString(16)}`);
      }

      const total = FRAME_HEADER_BYTES + length;
      if (this.buffer.length < total) return;

      const payload = Buffer.from(this.buffer.subarray(FRAME_HEADER_BYTES, total));
      this.buffer = this.buffer.subarray(total);
      onFrame({ streamId, end: (flags & FLAG_END) !== 0, payload });
    }
  }
}

/**
 * Regroups decoded frames into whole per-stream payloads.
 */
export class StreamAssembler {
  private readonly partial = new Map<number, Buffer[]>();
  private readonly finished = new Set<number>();

  push(frame: Frame): Buffer | null {
    if (this.finished.has(frame.streamId)) {
      throw new FrameDecodeError(`frame for ended stream ${frame.streamId}`);
    }

    const parts = this.partial.get(frame.streamId) ?? [];
    parts.push(frame.payload);

    if (!frame.end) {
      this.partial.set(frame.streamId, parts);
      return null;
    }

    this.partial.delete(frame.streamId);
    this.finished.add(frame.streamId);
    return Buffer.concat(parts);
  }

  /** stream ids with frames received but no end frame yet */
  openStreams(): number[] {
    return [...this.partial.keys()];
  }

  /** number of stream ids currently remembered (open or ended) */
  get trackedStreams(): number {
    return this.partial.size + this.finished.size;
  }

  /**
   * Forget a stream so its id can carry a new stream. A stream that is
   * still open loses its buffered frames.
   */
  release(streamId: number) {
    this.partial.delete(streamId);
    this.finished.delete(streamId);
  }
}
