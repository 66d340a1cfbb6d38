/**
 * `Content-Length` framing shared with the bridged process. A frame is an
 * ASCII header block terminated by CRLFCRLF followed by exactly
 * `Content-Length` bytes of UTF-8 JSON:
 *
 * ```
 * Content-Length: 17\r\n\r\n{"jsonrpc":"2.0"}
 * ```
 */
import { Buffer } from "node:buffer";
import type { Readable, Writable } from "node:stream";
import { TextDecoder } from "node:util";

import { FramingError } from "../errors.js";
import type { JsonValue } from "../json/value.js";

const CR = 0x0d;
const LF = 0x0a;

/** Header blocks larger than this are treated as corruption. */
export const MAX_HEADER_BYTES = 8 * 1024;

/** Upper bound accepted for a single body. */
export const DEFAULT_MAX_BODY_BYTES = 64 * 1024 * 1024;

/** Buffered bytes above which the source stream is paused. */
const DEFAULT_HIGH_WATER_MARK = 1024 * 1024;

/** Once this many consumed bytes sit at the head of the buffer it gets compacted. */
const COMPACTION_THRESHOLD = 64 * 1024;

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

/** Serialises {@link message} into a single framed buffer (header + body). */
export function encodeFrame(message: JsonValue): Buffer {
  const body = Buffer.from(JSON.stringify(message), "utf8");
  const header = Buffer.from(`Content-Length: ${body.length}\r\n\r\n`, "ascii");
  return Buffer.concat([header, body], header.length + body.length);
}

/**
 * Writes one frame with a single `write()` call so no other writer can
 * interleave bytes inside it. Resolves once the chunk is flushed, waiting for
 * `drain` when the stream signals backpressure.
 */
export async function writeFrame(stream: Writable, message: JsonValue): Promise<void> {
  const frame = encodeFrame(message);

  await new Promise<void>((resolve, reject) => {
    const cleanup = () => {
      stream.off("error", onError);
      stream.off("drain", onDrain);
    };

    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };

    const onDrain = () => {
      cleanup();
      resolve();
    };

    stream.once("error", onError);
    const wrote = stream.write(frame, (err) => {
      if (err) {
        cleanup();
        reject(err);
      } else if (wrote) {
        cleanup();
        resolve();
      }
    });

    if (!wrote) {
      stream.once("drain", onDrain);
    }
  });
}

/** Options accepted by {@link FrameReader}. */
export interface FrameReaderOptions {
  /** Buffered byte count above which the source is paused (defaults to 1 MiB). */
  highWaterMark?: number;
  maxHeaderBytes?: number;
  maxBodyBytes?: number;
}

/**
 * Incremental decoder pulling frames out of a readable byte stream. The header
 * block is consumed byte by byte until the CRLFCRLF terminator; the body is
 * then read in full, looping over as many chunks as needed.
 */
export class FrameReader {
  private buffer: Buffer = Buffer.alloc(0);
  private offset = 0;
  private ended = false;
  private failure: Error | null = null;
  private paused = false;
  private waiter: (() => void) | null = null;
  private readonly highWaterMark: number;
  private readonly maxHeaderBytes: number;
  private readonly maxBodyBytes: number;

  constructor(
    private readonly stream: Readable,
    options: FrameReaderOptions = {},
  ) {
    this.highWaterMark = Math.max(1, options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK);
    this.maxHeaderBytes = Math.max(4, options.maxHeaderBytes ?? MAX_HEADER_BYTES);
    this.maxBodyBytes = Math.max(0, options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES);
    stream.on("data", this.handleData);
    stream.on("end", this.handleEnd);
    stream.on("close", this.handleEnd);
    stream.on("error", this.handleError);
  }

  /** Number of bytes received but not consumed yet. */
  get bufferedBytes(): number {
    return this.buffer.length - this.offset;
  }

  /**
   * Decodes the next frame. Rejects with a {@link FramingError} on malformed
   * headers, undecodable bodies or when the stream ends; `atBoundary` is set
   * when the stream ended cleanly between two frames.
   */
  async readFrame(): Promise<JsonValue> {
    const headers = await this.readHeaders();
    const rawLength = headers.get("content-length");
    if (rawLength === undefined) {
      throw new FramingError("E-FRAME-LENGTH", "Missing Content-Length header");
    }
    if (!/^\d+$/.test(rawLength)) {
      throw new FramingError("E-FRAME-LENGTH", `Bad Content-Length: ${JSON.stringify(rawLength)}`);
    }
    const length = Number.parseInt(rawLength, 10);
    if (!Number.isSafeInteger(length) || length > this.maxBodyBytes) {
      throw new FramingError("E-FRAME-LENGTH", `Content-Length ${rawLength} exceeds ${this.maxBodyBytes} bytes`);
    }

    const body = await this.readExact(length);
    let text: string;
    try {
      text = utf8Decoder.decode(body);
    } catch (error) {
      throw new FramingError("E-FRAME-BODY", "Frame body is not valid UTF-8", { cause: error });
    }
    try {
      const parsed: JsonValue = JSON.parse(text);
      return parsed;
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new FramingError("E-FRAME-BODY", `Bad JSON payload: ${detail}`, { cause: error });
    }
  }

  /** Detaches every listener from the underlying stream. */
  close(): void {
    this.stream.off("data", this.handleData);
    this.stream.off("end", this.handleEnd);
    this.stream.off("close", this.handleEnd);
    this.stream.off("error", this.handleError);
    this.ended = true;
    this.wake();
  }

  private async readHeaders(): Promise<Map<string, string>> {
    const bytes: number[] = [];
    for (;;) {
      if (this.bufferedBytes === 0) {
        this.throwIfDrained(bytes.length === 0, "Unexpected EOF while reading headers");
        await this.waitForData();
        continue;
      }

      const byte = this.buffer[this.offset];
      this.offset += 1;
      bytes.push(byte);

      if (bytes.length > this.maxHeaderBytes) {
        throw new FramingError("E-FRAME-HEADER", `Header block exceeds ${this.maxHeaderBytes} bytes`);
      }
      const size = bytes.length;
      if (
        size >= 4 &&
        bytes[size - 4] === CR &&
        bytes[size - 3] === LF &&
        bytes[size - 2] === CR &&
        bytes[size - 1] === LF
      ) {
        break;
      }
    }
    this.afterConsume();
    return parseHeaderBlock(bytes.slice(0, -4));
  }

  private async readExact(length: number): Promise<Buffer> {
    const chunks: Buffer[] = [];
    let received = 0;
    while (received < length) {
      const available = this.bufferedBytes;
      if (available === 0) {
        this.throwIfDrained(false, "Unexpected EOF while reading framed body");
        await this.waitForData();
        continue;
      }
      const take = Math.min(available, length - received);
      chunks.push(Buffer.from(this.buffer.subarray(this.offset, this.offset + take)));
      this.offset += take;
      received += take;
      this.afterConsume();
    }
    return Buffer.concat(chunks, length);
  }

  private throwIfDrained(atBoundary: boolean, message: string): void {
    if (this.failure) {
      throw new FramingError("E-FRAME-EOF", `Stream failed: ${this.failure.message}`, {
        cause: this.failure,
        atBoundary,
      });
    }
    if (this.ended) {
      throw new FramingError("E-FRAME-EOF", atBoundary ? "End of stream" : message, { atBoundary });
    }
  }

  private waitForData(): Promise<void> {
    if (this.bufferedBytes > 0 || this.ended || this.failure) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  private afterConsume(): void {
    if (this.offset >= COMPACTION_THRESHOLD && this.offset * 2 >= this.buffer.length) {
      this.buffer = this.buffer.subarray(this.offset);
      this.offset = 0;
    }
    if (this.paused && this.bufferedBytes <= this.highWaterMark / 2) {
      this.paused = false;
      this.stream.resume();
    }
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }

  private readonly handleData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    if (this.offset >= this.buffer.length) {
      this.buffer = bytes;
    } else {
      const pending = this.buffer.subarray(this.offset);
      this.buffer = Buffer.concat([pending, bytes], pending.length + bytes.length);
    }
    this.offset = 0;
    if (!this.paused && this.bufferedBytes > this.highWaterMark) {
      this.paused = true;
      this.stream.pause();
    }
    this.wake();
  };

  private readonly handleEnd = (): void => {
    this.ended = true;
    this.wake();
  };

  private readonly handleError = (error: Error): void => {
    this.failure = error;
    this.wake();
  };
}

/** Decodes the next frame from {@link reader}. */
export function readFrame(reader: FrameReader): Promise<JsonValue> {
  return reader.readFrame();
}

/** Parses the ASCII header lines into a map keyed by lower-cased names. */
function parseHeaderBlock(bytes: number[]): Map<string, string> {
  for (const byte of bytes) {
    if (byte > 0x7f) {
      throw new FramingError("E-FRAME-HEADER", "Header block contains non-ASCII bytes");
    }
  }
  const text = Buffer.from(bytes).toString("ascii");
  const headers = new Map<string, string>();
  for (const line of text.split("\r\n")) {
    if (line.length === 0) {
      continue;
    }
    const separator = line.indexOf(":");
    if (separator < 0) {
      throw new FramingError("E-FRAME-HEADER", `Malformed header line: ${JSON.stringify(line)}`);
    }
    headers.set(line.slice(0, separator).trim().toLowerCase(), line.slice(separator + 1).trim());
  }
  return headers;
}
