import { Package } from '../types';

/**
 * FIFO of packages waiting for bin allocation.
 */
export class ConveyorQueue {
  private items: Package[] = [];
  private head = 0;

  enqueue(pkg: Package): void {
    this.items.push(pkg);
  }

  dequeue(): Package | undefined {
    if (this.head >= this.items.length) return undefined;

    const pkg = this.items[this.head];
    this.head++;

    // compact once the consumed prefix dominates
    if (this.head > 32 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return pkg;
  }

  peek(): Package | undefined {
    return this.items[this.head];
  }

  get size(): number {
    return this.items.length - this.head;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  *drain(): Generator<Package> {
    let pkg = this.dequeue();
    while (pkg !== undefined) {
      yield pkg;
      pkg = this.dequeue();
    }
  }
}
