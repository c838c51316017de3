/**
 * STOMP frames and their wire codec.
 *
 * Wire format:
 * ```
 * COMMAND\n
 * name:value\n
 * ...
 * \n
 * body\0
 * ```
 *
 * Header values are passed through as-is; no escaping is applied.
 *
 * @module stomp/frame
 */

import { FrameDecodeError, STOMP_DEFAULTS } from './types.js';

const LF = 0x0a;
const CR = 0x0d;
const NUL = 0x00;
const NUL_BUFFER = Buffer.from([NUL]);
const EMPTY_BODY = Buffer.alloc(0);

/**
 * A header as a `[name, value]` pair. Order is preserved on the wire.
 */
export type StompHeader = readonly [name: string, value: string];

/**
 * An immutable STOMP frame.
 *
 * @example
 * ```typescript
 * const frame = new StompFrame('SEND', [['destination', '/queue/load-0']], Buffer.from('hi'));
 * const wire = encodeFrame(frame);
 * ```
 */
export class StompFrame {
  readonly headers: readonly StompHeader[];

  constructor(
    readonly command: string,
    headers: readonly StompHeader[] = [],
    readonly body: Buffer = EMPTY_BODY,
  ) {
    this.headers = Object.freeze([...headers]);
  }

  /**
   * Returns the value of the first header with the given name.
   */
  getHeader(name: string): string | undefined {
    for (const [key, value] of this.headers) {
      if (key === name) {
        return value;
      }
    }
    return undefined;
  }

  hasHeader(name: string): boolean {
    return this.getHeader(name) !== undefined;
  }

  /**
   * Returns a copy of this frame with one more header appended.
   */
  withHeader(name: string, value: string): StompFrame {
    return new StompFrame(this.command, [...this.headers, [name, value]], this.body);
  }

  bodyText(): string {
    return this.body.toString('utf8');
  }
}

/**
 * Splits a `name:value` header specification at the first colon.
 *
 * @throws {Error} If the specification has no colon or an empty name
 */
export function parseHeader(spec: string): StompHeader {
  const idx = spec.indexOf(':');
  if (idx <= 0) {
    throw new Error(`Invalid header '${spec}': expected name:value`);
  }
  return [spec.slice(0, idx), spec.slice(idx + 1)];
}

/**
 * Encodes a frame for the wire. A `content-length` header is added when the
 * body is non-empty and the frame does not carry one.
 */
export function encodeFrame(frame: StompFrame): Buffer {
  const lines = [frame.command];
  for (const [name, value] of frame.headers) {
    lines.push(`${name}:${value}`);
  }
  if (frame.body.length > 0 && !frame.hasHeader('content-length')) {
    lines.push(`content-length:${frame.body.length}`);
  }

  const head = Buffer.from(`${lines.join('\n')}\n\n`, 'utf8');
  return Buffer.concat([head, frame.body, NUL_BUFFER]);
}

/**
 * Incremental frame decoder.
 *
 * Feed raw socket chunks to `push()`; complete frames come back in arrival
 * order and partial input stays buffered until the rest arrives. Heart-beat
 * EOLs between frames are skipped.
 */
export class FrameDecoder {
  private buffer: Buffer = EMPTY_BODY;

  constructor(private readonly maxFrameSize: number = STOMP_DEFAULTS.MAX_FRAME_SIZE) {}

  /**
   * Number of buffered bytes not yet decoded into a frame.
   */
  get pendingBytes(): number {
    return this.buffer.length;
  }

  /**
   * @throws {FrameDecodeError} On malformed input or an oversized frame
   */
  push(chunk: Buffer): StompFrame[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    const frames: StompFrame[] = [];
    let offset = 0;

    for (;;) {
      offset = skipEols(this.buffer, offset);
      if (offset >= this.buffer.length) {
        break;
      }

      const result = decodeAt(this.buffer, offset);
      if (result === null) {
        break;
      }

      frames.push(result.frame);
      offset = result.next;
    }

    this.buffer = offset >= this.buffer.length ? EMPTY_BODY : this.buffer.subarray(offset);

    if (this.buffer.length > this.maxFrameSize) {
      throw new FrameDecodeError(`frame exceeds maximum size of ${this.maxFrameSize} bytes`);
    }

    return frames;
  }

  reset(): void {
    this.buffer = EMPTY_BODY;
  }
}

function skipEols(buffer: Buffer, offset: number): number {
  let pos = offset;
  while (pos < buffer.length) {
    const byte = buffer[pos];
    if (byte === LF) {
      pos++;
    } else if (byte === CR && buffer[pos + 1] === LF) {
      pos += 2;
    } else {
      break;
    }
  }
  return pos;
}

/**
 * Decodes one frame starting at `offset`, or returns null if the buffer
 * does not yet hold all of it.
 */
function decodeAt(buffer: Buffer, offset: number): { frame: StompFrame; next: number } | null {
  const lines: string[] = [];
  let pos = offset;

  for (;;) {
    const nl = buffer.indexOf(LF, pos);
    if (nl === -1) {
      return null;
    }
    const end = nl > pos && buffer[nl - 1] === CR ? nl - 1 : nl;
    const line = buffer.toString('utf8', pos, end);
    pos = nl + 1;
    if (line.length === 0) {
      break;
    }
    lines.push(line);
  }

  const [command, ...headerLines] = lines;
  if (command === undefined) {
    throw new FrameDecodeError('missing command');
  }

  const headers: StompHeader[] = [];
  for (const line of headerLines) {
    const idx = line.indexOf(':');
    if (idx <= 0) {
      throw new FrameDecodeError(`malformed header line '${line}'`);
    }
    headers.push([line.slice(0, idx), line.slice(idx + 1)]);
  }

  const lengthHeader = headers.find(([name]) => name === 'content-length');
  if (lengthHeader) {
    const length = Number(lengthHeader[1]);
    if (!Number.isInteger(length) || length < 0) {
      throw new FrameDecodeError(`invalid content-length '${lengthHeader[1]}'`);
    }
    if (pos + length >= buffer.length) {
      return null;
    }
    if (buffer[pos + length] !== NUL) {
      throw new FrameDecodeError('body is not terminated by NUL');
    }
    const body = Buffer.from(buffer.subarray(pos, pos + length));
    return { frame: new StompFrame(command, headers, body), next: pos + length + 1 };
  }

  const nul = buffer.indexOf(NUL, pos);
  if (nul === -1) {
    return null;
  }
  const body = Buffer.from(buffer.subarray(pos, nul));
  return { frame: new StompFrame(command, headers, body), next: nul + 1 };
}
