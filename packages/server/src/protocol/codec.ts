/**
 * Wire Protocol Codec
 *
 * Frames are single lines of the form `TYPE|PAYLOAD\n`. Only the first `|`
 * separates type from payload. Lines without a recognised type prefix are
 * raw chat text from basic clients and decode as `MSG` frames carrying the
 * whole line.
 */

import { PROTOCOL } from '../constants.js';
import type { Frame, FrameType } from '../types.js';

const FRAME_TYPES: ReadonlySet<string> = new Set<FrameType>(['MSG', 'SRV', 'ULIST', 'CMD_USER', 'CMD_QUIT']);

const NEWLINE = 0x0a;

export function isFrameType(value: string): value is FrameType {
  return FRAME_TYPES.has(value);
}

/**
 * Replace embedded line breaks so a payload can never split a frame.
 */
export function sanitizePayload(payload: string): string {
  return payload.replace(/\r\n|\r|\n/g, ' ');
}

export function encodeFrame(type: FrameType, payload: string): string {
  return `${type}${PROTOCOL.SEPARATOR}${sanitizePayload(payload)}${PROTOCOL.DELIMITER}`;
}

/**
 * Decode one line (without its trailing `\n`). Never throws.
 */
export function decodeLine(line: string): Frame {
  const text = line.endsWith('\r') ? line.slice(0, -1) : line;
  const separatorIndex = text.indexOf(PROTOCOL.SEPARATOR);

  if (separatorIndex === -1) {
    return { type: 'MSG', payload: text };
  }

  const prefix = text.slice(0, separatorIndex);
  if (isFrameType(prefix)) {
    return { type: prefix, payload: text.slice(separatorIndex + 1) };
  }

  return { type: 'MSG', payload: text };
}

export interface RosterEntry {
  username: string;
  address: string;
}

/**
 * Encode a roster as `user1(addr1),user2(addr2)`.
 */
export function encodeRoster(entries: readonly RosterEntry[]): string {
  return entries.map((e) => `${e.username}(${e.address})`).join(PROTOCOL.ROSTER_SEPARATOR);
}

export function parseRoster(payload: string): RosterEntry[] {
  if (!payload) return [];

  const entries: RosterEntry[] = [];
  for (const part of payload.split(PROTOCOL.ROSTER_SEPARATOR)) {
    const match = /^(.*)\((.*)\)$/.exec(part);
    if (match) {
      entries.push({ username: match[1] ?? '', address: match[2] ?? '' });
    }
  }
  return entries;
}

export interface DecodeResult {
  lines: string[];
  /** Set when a line exceeded the byte limit; the connection must be dropped */
  overflow: boolean;
}

/**
 * Streaming line splitter for socket data.
 *
 * Splits on `\n` at the byte level (UTF-8 never uses 0x0A inside a
 * multi-byte sequence) and decodes each line leniently: invalid sequences
 * become U+FFFD. Blank lines are skipped.
 */
export class LineDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  private readonly maxLineBytes: number;

  constructor(maxLineBytes: number = PROTOCOL.MAX_LINE_BYTES) {
    this.maxLineBytes = maxLineBytes;
  }

  write(chunk: Buffer | string): DecodeResult {
    const data = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    this.buffer = this.buffer.length === 0 ? data : Buffer.concat([this.buffer, data]);

    const lines: string[] = [];
    let start = 0;
    let newlineIndex: number;

    while ((newlineIndex = this.buffer.indexOf(NEWLINE, start)) !== -1) {
      if (newlineIndex - start > this.maxLineBytes) {
        this.reset();
        return { lines, overflow: true };
      }

      const line = this.buffer.toString('utf8', start, newlineIndex);
      start = newlineIndex + 1;

      if (line.trim().length === 0) continue;
      lines.push(line);
    }

    this.buffer = this.buffer.subarray(start);

    if (this.buffer.length > this.maxLineBytes) {
      this.reset();
      return { lines, overflow: true };
    }

    return { lines, overflow: false };
  }

  /** Bytes held while waiting for a line terminator */
  get pendingBytes(): number {
    return this.buffer.length;
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
  }
}
