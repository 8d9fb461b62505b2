/**
 * Candidate domain storage.
 *
 * Domains are sorted arrays that are replaced, never mutated in place, so a
 * table can share them freely between forks. `fork()` shares the slot array
 * itself until either side writes.
 */

export type Domain = readonly number[];

export class DomainTable {
  private slots: Domain[];
  private shared: boolean;

  private constructor(slots: Domain[], shared: boolean) {
    this.slots = slots;
    this.shared = shared;
  }

  static from(domains: readonly Domain[]): DomainTable {
    return new DomainTable(domains.slice(), false);
  }

  get size(): number {
    return this.slots.length;
  }

  get(index: number): Domain {
    const domain = this.slots[index];
    if (domain === undefined) {
      throw new RangeError(`No domain for variable index ${index}`);
    }
    return domain;
  }

  set(index: number, domain: Domain): void {
    if (this.shared) {
      this.slots = this.slots.slice();
      this.shared = false;
    }
    this.slots[index] = domain;
  }

  /** Copy-on-write clone; O(1) until the first write on either side */
  fork(): DomainTable {
    this.shared = true;
    return new DomainTable(this.slots, true);
  }

  toArray(): Domain[] {
    return this.slots.slice();
  }
}

/**
 * Normalize a domain: sort ascending and drop duplicates
 */
export function normalizeDomain(values: readonly number[]): Domain {
  const sorted = [...values].sort((a, b) => a - b);
  return sorted.filter((v, i) => i === 0 || v !== sorted[i - 1]);
}

export function domainMin(domain: Domain): number {
  return domain.length > 0 ? domain[0] : Infinity;
}

export function domainMax(domain: Domain): number {
  return domain.length > 0 ? domain[domain.length - 1] : -Infinity;
}

export function domainsEqual(a: Domain, b: Domain): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}
