/**
 * InMemoryTaskStore
 *
 * Ephemeral store scoped to a single pipeline run.
 * Backed by a Map with composite keys; computes SHA-256 hashes on set.
 */

import { contentHash } from "../shared/hash.js";
import type { TaskStore, ProducedRef, ProducedRefKind } from "./types.js";

export class InMemoryTaskStore implements TaskStore {
  private data = new Map<string, unknown>();
  private refs = new Map<string, ProducedRef>();

  private key(kind: ProducedRefKind, id: string): string {
    return `${kind}::${id}`;
  }

  set(kind: ProducedRefKind, id: string, value: unknown): ProducedRef {
    const k = this.key(kind, id);
    const ref: ProducedRef = { kind, id, hash: contentHash(value) };
    this.data.set(k, value);
    this.refs.set(k, ref);
    return ref;
  }

  get(kind: ProducedRefKind, id: string): unknown {
    const k = this.key(kind, id);
    if (!this.data.has(k)) {
      throw new Error(`TaskStore: key not found: ${k}`);
    }
    return this.data.get(k);
  }

  has(kind: ProducedRefKind, id: string): boolean {
    return this.data.has(this.key(kind, id));
  }

  getRef(kind: ProducedRefKind, id: string): ProducedRef | undefined {
    return this.refs.get(this.key(kind, id));
  }
}
