import * as fs from "node:fs";
import { encodeText } from "./token.js";

/**
 * Incremental byte input. `read` fills a prefix of `into` and returns how
 * many bytes it wrote; 0 means the input is exhausted.
 */
export interface ByteSource {
  read(into: Uint8Array): number;
}

/** A source over pre-split chunks, e.g. to simulate arbitrary read boundaries */
export function chunkSource(chunks: Iterable<string | Uint8Array>): ByteSource {
  const iterator = chunks[Symbol.iterator]();
  let pending: Uint8Array = new Uint8Array(0);
  return {
    read(into: Uint8Array): number {
      while (pending.length === 0) {
        const next = iterator.next();
        if (next.done) {
          return 0;
        }
        pending = typeof next.value === "string" ? encodeText(next.value) : next.value;
      }
      const n = Math.min(into.length, pending.length);
      into.set(pending.subarray(0, n));
      pending = pending.subarray(n);
      return n;
    },
  };
}

/** A source reading synchronously from an open file descriptor */
export function fileSource(fd: number): ByteSource {
  return {
    read(into: Uint8Array): number {
      return fs.readSync(fd, into, 0, into.length, null);
    },
  };
}

const DEFAULT_BUFFER_SIZE = 4096;

/** Byte-at-a-time reader with one byte of lookahead; -1 marks end of input */
export class ByteReader {
  private buffer: Uint8Array;
  private start = 0;
  private end = 0;
  private exhausted = false;

  constructor(
    private source: ByteSource,
    size = DEFAULT_BUFFER_SIZE,
  ) {
    this.buffer = new Uint8Array(size);
  }

  private fill(): boolean {
    if (this.start < this.end) {
      return true;
    }
    if (this.exhausted) {
      return false;
    }
    this.start = 0;
    this.end = this.source.read(this.buffer);
    if (this.end === 0) {
      this.exhausted = true;
      return false;
    }
    return true;
  }

  readByte(): number {
    if (!this.fill()) {
      return -1;
    }
    return this.buffer[this.start++];
  }

  peekByte(): number {
    if (!this.fill()) {
      return -1;
    }
    return this.buffer[this.start];
  }
}
