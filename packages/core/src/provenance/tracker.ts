/**
 * Records which mappings were synthesized from schema defaults rather than
 * supplied by the user. Membership is keyed by node identity and never
 * written onto the containers themselves, so it cannot leak into output.
 */
export class ProvenanceTracker {
  readonly #fromDefault = new WeakSet<object>();

  /** Record a node that was deep-copied from a schema `default` */
  markFromDefault(node: object): void {
    this.#fromDefault.add(node);
  }

  /** The `from_default` flag: true only for mappings the engine synthesized */
  isFromDefault(node: unknown): boolean {
    return node !== null && typeof node === 'object' && this.#fromDefault.has(node);
  }

  /** Carry the flag over when a node is replaced by an equivalent copy */
  transfer(from: object, to: object): void {
    if (this.#fromDefault.has(from)) {
      this.#fromDefault.add(to);
    }
  }
}
