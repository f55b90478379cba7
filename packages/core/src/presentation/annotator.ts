import { Scalar, YAMLMap, YAMLSeq, isMap, isScalar, isSeq } from 'yaml';

import {
  isMapping,
  isSequence,
  mappingEntries,
  sequenceItems,
} from '../schema/type-compat.js';

/**
 * Builds the presentation-aware containers of an annotated emission: YAML
 * collection nodes that carry comments and flow flags, plus the column at
 * which each container's keys will be printed.
 *
 * One annotator serves one emission; `indentStep` must match the indent the
 * tree is later serialized with.
 */
export class PresentationAnnotator {
  readonly #keyIndent = new WeakMap<object, number>();

  constructor(readonly indentStep: number) {}

  root(): YAMLMap {
    const map = new YAMLMap();
    this.#keyIndent.set(map, 0);
    return map;
  }

  createMap(parent: object): YAMLMap {
    const map = new YAMLMap();
    this.#keyIndent.set(map, this.#childIndent(parent));
    return map;
  }

  createSeq(parent: object): YAMLSeq {
    const seq = new YAMLSeq();
    this.#keyIndent.set(seq, this.#childIndent(parent));
    return seq;
  }

  /** Column of this container's keys, if the annotator created it */
  keyIndent(node: object): number | undefined {
    return this.#keyIndent.get(node);
  }

  /**
   * Deep-convert a freshly copied value into presentation containers placed
   * under `parent`. Flow marks on the source are kept.
   */
  adopt(value: unknown, parent: object): unknown {
    if (isScalar(value)) return value.value;

    if (isMapping(value)) {
      const map = this.createMap(parent);
      if (isMap(value) && value.flow) map.flow = true;
      for (const [key, item] of mappingEntries(value)) {
        map.set(key, this.adopt(item, map));
      }
      return map;
    }

    if (isSequence(value)) {
      const seq = this.createSeq(parent);
      if (isSeq(value) && value.flow) seq.flow = true;
      for (const item of sequenceItems(value)) {
        seq.add(this.adopt(item, seq));
      }
      return seq;
    }

    return value;
  }

  /**
   * Put `description` as a comment block directly above `key`, preceded by a
   * blank line unless `key` opens a nested container. A trailing newline in
   * the description is dropped.
   */
  attachComment(map: YAMLMap, key: string, description: string): void {
    const index = map.items.findIndex((item) =>
      isScalar(item.key) ? String(item.key.value) === key : String(item.key) === key
    );
    const pair = map.items[index];
    if (!pair) return;

    const keyNode = isScalar(pair.key) ? pair.key : new Scalar(pair.key);
    pair.key = keyNode;

    const text = description.endsWith('\n')
      ? description.slice(0, -1)
      : description;
    // A blank line right after `key:` or `- ` prints as trailing whitespace
    keyNode.spaceBefore = index > 0 || this.keyIndent(map) === 0;
    keyNode.commentBefore = text
      .split('\n')
      .map((line) => (line ? ` ${line}` : ''))
      .join('\n');
  }

  #childIndent(parent: object): number {
    return (this.#keyIndent.get(parent) ?? 0) + this.indentStep;
  }
}
