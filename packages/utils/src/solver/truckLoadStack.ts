import { Package } from '../types';

/**
 * Packages on the truck in load order. Only the most recent load can be
 * taken off.
 */
export class TruckLoadStack {
  private items: Package[] = [];

  push(pkg: Package): void {
    this.items.push(pkg);
  }

  pop(): Package | null {
    return this.items.pop() ?? null;
  }

  peek(): Package | null {
    return this.items.length > 0 ? this.items[this.items.length - 1] : null;
  }

  get size(): number {
    return this.items.length;
  }

  /** Bottom of the truck first. */
  toArray(): Package[] {
    return [...this.items];
  }

  totalSize(): number {
    return this.items.reduce((sum, p) => sum + p.size, 0);
  }
}
