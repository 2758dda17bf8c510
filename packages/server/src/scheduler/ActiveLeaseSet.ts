import type { Lease } from '../lease/Lease';

/**
 * Insertion-ordered set of active leases with a round-robin cursor for auto-saving.
 */
export class ActiveLeaseSet {
  private leases: Lease<object>[] = [];
  private cursor = 0;

  add(lease: Lease<object>): void {
    if (!this.leases.includes(lease)) {
      this.leases.push(lease);
    }
  }

  remove(lease: Lease<object>): boolean {
    const index = this.leases.indexOf(lease);
    if (index === -1) {
      return false;
    }
    this.leases.splice(index, 1);
    // Keep the cursor on the lease it was pointing at
    if (index < this.cursor) {
      this.cursor--;
    }
    if (this.cursor >= this.leases.length) {
      this.cursor = 0;
    }
    return true;
  }

  has(lease: Lease<object>): boolean {
    return this.leases.includes(lease);
  }

  /**
   * Lease under the cursor; advances the cursor.
   */
  next(): Lease<object> | undefined {
    if (this.leases.length === 0) {
      return undefined;
    }
    const lease = this.leases[this.cursor];
    this.cursor = (this.cursor + 1) % this.leases.length;
    return lease;
  }

  values(): Lease<object>[] {
    return [...this.leases];
  }

  get size(): number {
    return this.leases.length;
  }
}
