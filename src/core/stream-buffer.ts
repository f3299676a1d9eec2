// Growable byte buffer for stream reassembly
const DEFAULT_BUFFER_SIZE = 4096

/**
 * Accumulates chunks from a byte stream until whole frames can be cut
 * from the front. Storage is reused; it only grows, never shrinks.
 */
export class StreamBuffer {
  private buffer: Uint8Array
  private start = 0
  private end = 0

  constructor(initialSize: number = DEFAULT_BUFFER_SIZE) {
    this.buffer = new Uint8Array(initialSize)
  }

  append(data: Uint8Array): void {
    const pending = this.length
    const required = pending + data.length

    if (required > this.buffer.length) {
      const grown = new Uint8Array(Math.max(this.buffer.length * 2, required))
      grown.set(this.contents())
      this.buffer = grown
      this.start = 0
      this.end = pending
    } else if (this.end + data.length > this.buffer.length) {
      this.buffer.copyWithin(0, this.start, this.end)
      this.start = 0
      this.end = pending
    }

    this.buffer.set(data, this.end)
    this.end += data.length
  }

  /**
   * View of the unconsumed bytes; invalidated by the next append
   */
  contents(): Uint8Array {
    return this.buffer.subarray(this.start, this.end)
  }

  consume(bytes: number): void {
    this.start = Math.min(this.start + bytes, this.end)
    if (this.start === this.end) {
      this.reset()
    }
  }

  reset(): void {
    this.start = 0
    this.end = 0
  }

  get length(): number {
    return this.end - this.start
  }
}
