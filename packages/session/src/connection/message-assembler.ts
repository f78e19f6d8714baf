import { SessionError } from '@dedbg/core';

/**
 * Joins text fragments into complete messages within a fixed byte capacity.
 */
export class MessageAssembler {
  private fragments: string[] = [];
  private size = 0;

  public constructor(public readonly capacity: number) {}

  public get bufferedBytes(): number {
    return this.size;
  }

  /**
   * Adds a fragment.
   * @returns The complete message on the final fragment, otherwise `null`
   * @throws SessionError with code `message_too_large` when the message
   *   outgrows the capacity
   */
  public append(data: string, final: boolean): string | null {
    this.size += Buffer.byteLength(data, 'utf8');
    if (this.size > this.capacity) {
      this.reset();
      throw SessionError.messageTooLarge(this.capacity);
    }
    this.fragments.push(data);
    if (!final) {
      return null;
    }
    const message = this.fragments.join('');
    this.reset();
    return message;
  }

  public reset(): void {
    this.fragments = [];
    this.size = 0;
  }
}
