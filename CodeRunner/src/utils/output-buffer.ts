/**
 * Byte-bounded output capture.
 *
 * Keeps the first `maxBytes` of a stream and drops the rest. The caller keeps
 * draining the pipe so the child never blocks on a full buffer. The cut never
 * splits a UTF-8 character.
 */

function isContinuation(byte: number | undefined): boolean {
  return byte !== undefined && (byte & 0xc0) === 0x80;
}

function isLeadByte(byte: number | undefined): boolean {
  return byte !== undefined && (byte & 0xc0) === 0xc0;
}

export class BoundedOutput {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  private overflowed = false;

  constructor(private readonly maxBytes: number) {}

  push(chunk: Buffer): void {
    if (this.overflowed) return;

    const remaining = this.maxBytes - this.size;
    if (chunk.length <= remaining) {
      this.chunks.push(chunk);
      this.size += chunk.length;
      return;
    }

    if (remaining > 0) {
      this.chunks.push(chunk.subarray(0, remaining));
      this.size += remaining;
    }
    if (isContinuation(chunk[remaining])) {
      this.dropPartialCharacter();
    }
    this.overflowed = true;
  }

  /** The cut fell inside a multi-byte character: drop its leading bytes. */
  private dropPartialCharacter(): void {
    const head = Buffer.concat(this.chunks, this.size);
    let end = head.length;
    let stepped = 0;
    while (end > 0 && stepped < 3 && isContinuation(head[end - 1])) {
      end--;
      stepped++;
    }
    if (end > 0 && isLeadByte(head[end - 1])) end--;

    this.chunks.length = 0;
    this.chunks.push(head.subarray(0, end));
    this.size = end;
  }

  get truncated(): boolean {
    return this.overflowed;
  }

  get byteLength(): number {
    return this.size;
  }

  text(): string {
    return Buffer.concat(this.chunks, this.size).toString('utf-8');
  }
}
