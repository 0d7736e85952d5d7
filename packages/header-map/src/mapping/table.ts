import { HeaderMapStateError } from "../model/errors.js";

/** Where a mapping entry came from. Lookup treats all provenances alike. */
export type MappingProvenance =
  | { readonly kind: "default"; readonly resource: string }
  | { readonly kind: "source"; readonly resource: string }
  | { readonly kind: "programmatic" };

export interface MappingEntry {
  readonly qualifiedName: string;
  readonly header: string;
  readonly provenance: MappingProvenance;
}

const PROGRAMMATIC: MappingProvenance = { kind: "programmatic" };

/** Qualified type name → explicit header path. Last write wins. */
export class MappingTable {
  #entries = new Map<string, MappingEntry>();
  #frozen = false;

  get size(): number {
    return this.#entries.size;
  }

  get isFrozen(): boolean {
    return this.#frozen;
  }

  get(qualifiedName: string): string | undefined {
    return this.#entries.get(qualifiedName)?.header;
  }

  getEntry(qualifiedName: string): MappingEntry | undefined {
    return this.#entries.get(qualifiedName);
  }

  has(qualifiedName: string): boolean {
    return this.#entries.has(qualifiedName);
  }

  set(qualifiedName: string, header: string, provenance: MappingProvenance = PROGRAMMATIC): void {
    if (this.#frozen) {
      throw new HeaderMapStateError(`map ${qualifiedName}`);
    }
    this.#entries.set(qualifiedName, { qualifiedName, header, provenance });
  }

  /** Merge pairs in order; later pairs overwrite earlier ones. */
  merge(pairs: Iterable<readonly [string, string]>, provenance: MappingProvenance): number {
    let count = 0;
    for (const [qualifiedName, header] of pairs) {
      this.set(qualifiedName, header, provenance);
      count++;
    }
    return count;
  }

  /** Entries sorted by key in code-unit order. */
  entries(): MappingEntry[] {
    return Array.from(this.#entries.values()).sort((a, b) =>
      a.qualifiedName < b.qualifiedName ? -1 : a.qualifiedName > b.qualifiedName ? 1 : 0,
    );
  }

  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const entry of this.entries()) {
      record[entry.qualifiedName] = entry.header;
    }
    return record;
  }

  freeze(): void {
    this.#frozen = true;
  }
}
