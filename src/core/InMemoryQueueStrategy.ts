import { IQueueStrategy } from "../interfaces";

/**
 * Array-backed FIFO. Dequeued slots are reclaimed once the consumed prefix
 * outgrows the live part of the buffer.
 */
export class InMemoryQueueStrategy<T> implements IQueueStrategy<T> {
  private items: T[] = [];
  private head = 0;

  enqueue(message: T): void {
    this.items.push(message);
  }

  dequeue(): T | undefined {
    if (this.head >= this.items.length) return undefined;

    const message = this.items[this.head];
    this.head++;
    if (this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return message;
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }

  size(): number {
    return this.items.length - this.head;
  }
}
