/**
 * LineCodec - Wire format for group chat messages
 *
 * One JSON object per line, UTF-8, newline-terminated. No other framing.
 *
 * Wire Format:
 * ┌──────────────────────────────────────────────────────────┬────┐
 * │ {"agent":"Anna","message":"hello","timestamp":1718.5}    │ \n │
 * └──────────────────────────────────────────────────────────┴────┘
 */

import { WireMessageSchema } from '@murmur/types';
import type { WireMessage } from '@murmur/types';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

/** Line terminator byte */
export const LINE_DELIMITER = 0x0a;

/** Longest unterminated line a decoder will buffer (64 KB) */
export const MAX_LINE_BYTES = 64 * 1024;

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export class WireDecodeError extends Error {
  readonly line: string;

  constructor(message: string, line: string) {
    super(message);
    this.name = 'WireDecodeError';
    this.line = line;
  }
}

export interface DecodeAllResult {
  messages: WireMessage[];
  errors: WireDecodeError[];
  remaining: Buffer;
}

export interface LineCodecOptions {
  maxLineBytes?: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// LINE CODEC CLASS
// ═══════════════════════════════════════════════════════════════════════════

export class LineCodec {
  private readonly maxLineBytes: number;

  constructor(options?: LineCodecOptions) {
    this.maxLineBytes = options?.maxLineBytes ?? MAX_LINE_BYTES;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // ENCODING
  // ─────────────────────────────────────────────────────────────────────────

  encode(message: WireMessage): Buffer {
    const record = {
      agent: message.agent,
      message: message.message,
      timestamp: message.timestamp,
    };
    return Buffer.from(JSON.stringify(record) + '\n', 'utf-8');
  }

  // ─────────────────────────────────────────────────────────────────────────
  // DECODING
  // ─────────────────────────────────────────────────────────────────────────

  decodeLine(line: string | Buffer): WireMessage {
    const text = typeof line === 'string' ? line : line.toString('utf-8');

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw new WireDecodeError('Invalid JSON', text);
    }

    const result = WireMessageSchema.safeParse(parsed);
    if (!result.success) {
      throw new WireDecodeError(`Invalid message format: ${result.error.issues[0]?.message ?? 'unknown'}`, text);
    }
    return result.data;
  }

  /**
   * Decode every complete line in `buffer`.
   * A trailing partial line is returned in `remaining` for the next chunk.
   */
  decodeAll(buffer: Buffer): DecodeAllResult {
    const messages: WireMessage[] = [];
    const errors: WireDecodeError[] = [];
    let offset = 0;

    while (offset < buffer.length) {
      const end = buffer.indexOf(LINE_DELIMITER, offset);
      if (end === -1) {
        break;
      }

      const line = buffer.subarray(offset, end).toString('utf-8').trim();
      offset = end + 1;

      if (line.length === 0) {
        continue;
      }

      try {
        messages.push(this.decodeLine(line));
      } catch (error) {
        if (error instanceof WireDecodeError) {
          errors.push(error);
        } else {
          throw error;
        }
      }
    }

    const remaining = buffer.subarray(offset);
    if (remaining.length > this.maxLineBytes) {
      throw new Error(`Line too long: ${remaining.length} bytes (max: ${this.maxLineBytes})`);
    }

    return { messages, errors, remaining };
  }

  getMaxLineBytes(): number {
    return this.maxLineBytes;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// FACTORY
// ═══════════════════════════════════════════════════════════════════════════

export function createLineCodec(options?: LineCodecOptions): LineCodec {
  return new LineCodec(options);
}
