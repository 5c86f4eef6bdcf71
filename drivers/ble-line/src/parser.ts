import { DEFAULT_MAX_PENDING_BYTES } from "./config";

export interface DataFrame {
  timestampMs: number;
  millivolts: number;
}

export interface ManagementFrame {
  payload: string;
}

export interface DrainResult {
  dataFrames: DataFrame[];
  managementFrames: ManagementFrame[];
  /** Lines that looked numeric but failed to convert. */
  malformed: number;
}

export const DECODE_ERROR_PAYLOAD = "<decode-error>";

const CR = 0x0d;
const LF = 0x0a;
const I32_MIN = -2_147_483_648;
const I32_MAX = 2_147_483_647;

const DATA_LINE = /^(\d+),([+-]?\d+)$/;
const NEAR_DATA_LINE = /^\d+,[+-]+\d+$/;

/**
 * Turns notification chunks into frames. `feed` only stores bytes; all
 * splitting happens in `drain`, which consumes every complete CRLF-terminated
 * line and keeps the partial tail for the next call.
 */
export class FrameParser {
  private chunks: Uint8Array[] = [];
  private size = 0;
  private overflows = 0;
  private readonly decoder = new TextDecoder("utf-8", { fatal: true });

  constructor(private readonly maxPendingBytes: number = DEFAULT_MAX_PENDING_BYTES) {}

  feed(chunk: Uint8Array): void {
    if (chunk.length === 0) return;
    this.chunks.push(new Uint8Array(chunk));
    this.size += chunk.length;
    if (this.size > this.maxPendingBytes) {
      this.enforceBound();
    }
  }

  drain(): DrainResult {
    const result: DrainResult = { dataFrames: [], managementFrames: [], malformed: 0 };
    if (this.size === 0) return result;

    const buffer = this.compact();
    const end = lastTerminator(buffer);
    if (end < 0) return result;

    const rest = buffer.slice(end + 2);
    this.chunks = rest.length > 0 ? [rest] : [];
    this.size = rest.length;

    let start = 0;
    for (let i = 0; i <= end; i += 1) {
      if (buffer[i] === CR && buffer[i + 1] === LF) {
        this.classify(buffer.subarray(start, i), result);
        start = i + 2;
        i += 1;
      }
    }
    return result;
  }

  /** Bytes received after the last complete line. */
  pending(): Uint8Array {
    return this.compact().slice();
  }

  get pendingBytes(): number {
    return this.size;
  }

  get overflowCount(): number {
    return this.overflows;
  }

  reset(): void {
    this.chunks = [];
    this.size = 0;
  }

  private classify(line: Uint8Array, result: DrainResult): void {
    const text = this.decode(line).trim();
    if (!text) return;

    const match = DATA_LINE.exec(text);
    if (match) {
      const timestampMs = Number(match[1]);
      const millivolts = Number(match[2]);
      if (Number.isSafeInteger(timestampMs) && millivolts >= I32_MIN && millivolts <= I32_MAX) {
        result.dataFrames.push({ timestampMs, millivolts });
      } else {
        result.malformed += 1;
      }
      return;
    }
    if (NEAR_DATA_LINE.test(text)) {
      result.malformed += 1;
      return;
    }
    result.managementFrames.push({ payload: text });
  }

  private decode(line: Uint8Array): string {
    try {
      return this.decoder.decode(line);
    } catch {
      return DECODE_ERROR_PAYLOAD;
    }
  }

  private compact(): Uint8Array {
    if (this.chunks.length === 1) return this.chunks[0];
    const joined = new Uint8Array(this.size);
    let offset = 0;
    for (const chunk of this.chunks) {
      joined.set(chunk, offset);
      offset += chunk.length;
    }
    this.chunks = this.size > 0 ? [joined] : [];
    return joined;
  }

  private enforceBound(): void {
    const buffer = this.compact();
    if (lastTerminator(buffer) >= 0) return;
    this.overflows += 1;
    this.reset();
  }
}

function lastTerminator(buffer: Uint8Array): number {
  for (let i = buffer.length - 2; i >= 0; i -= 1) {
    if (buffer[i] === CR && buffer[i + 1] === LF) return i;
  }
  return -1;
}
