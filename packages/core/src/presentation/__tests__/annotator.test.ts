import { describe, expect, it } from 'vitest';
import { Document, isMap, isScalar, isSeq } from 'yaml';

import { markFlow } from '../flow-style';
import { PresentationAnnotator } from '../annotator';

describe('PresentationAnnotator', () => {
  it('indents each level by the indent step', () => {
    const annotator = new PresentationAnnotator(4);
    const root = annotator.root();
    const child = annotator.createMap(root);
    const list = annotator.createSeq(child);

    expect(annotator.keyIndent(root)).toBe(0);
    expect(annotator.keyIndent(child)).toBe(4);
    expect(annotator.keyIndent(list)).toBe(8);
    expect(annotator.keyIndent({})).toBeUndefined();
  });

  it('adopts nested values as YAML collections', () => {
    const annotator = new PresentationAnnotator(2);
    const root = annotator.root();

    const adopted = annotator.adopt({ server: { ports: [80, 443] } }, root);

    expect(isMap(adopted)).toBe(true);
    if (!isMap(adopted)) return;
    const server = adopted.get('server');
    expect(isMap(server)).toBe(true);
    expect(annotator.keyIndent(adopted)).toBe(2);
    if (isMap(server)) {
      expect(annotator.keyIndent(server)).toBe(4);
      const ports = server.get('ports');
      expect(isSeq(ports)).toBe(true);
      if (isSeq(ports)) expect(ports.toJSON()).toEqual([80, 443]);
    }
  });

  it('keeps flow marks while adopting', () => {
    const annotator = new PresentationAnnotator(2);
    const adopted = annotator.adopt(markFlow([1, 2]), annotator.root());

    expect(isSeq(adopted) && adopted.flow).toBe(true);
  });

  it('puts a description above its key after a blank line', () => {
    const annotator = new PresentationAnnotator(2);
    const root = annotator.root();
    root.set('port', 8080);

    annotator.attachComment(root, 'port', 'Line one\n\nLine three\n');

    const pair = root.items[0];
    expect(pair && isScalar(pair.key)).toBe(true);
    if (pair && isScalar(pair.key)) {
      expect(pair.key.commentBefore).toBe(' Line one\n\n Line three');
      expect(pair.key.spaceBefore).toBe(true);
    }
    expect(new Document(root).toString()).toContain('# Line one\n');
  });

  it('leaves no blank line before the first key of a nested map', () => {
    const annotator = new PresentationAnnotator(2);
    const root = annotator.root();
    const server = annotator.createMap(root);
    server.set('port', 8080);
    server.set('host', 'localhost');
    root.set('server', server);

    annotator.attachComment(server, 'port', 'Port');
    annotator.attachComment(server, 'host', 'Host');

    expect(new Document(root).toString()).toBe(
      'server:\n  # Port\n  port: 8080\n\n  # Host\n  host: localhost\n'
    );
  });

  it('leaves no trailing whitespace inside list items', () => {
    const annotator = new PresentationAnnotator(2);
    const root = annotator.root();
    const jobs = annotator.createSeq(root);
    const job = annotator.createMap(jobs);
    job.set('n', 1);
    jobs.add(job);
    root.set('jobs', jobs);

    annotator.attachComment(job, 'n', 'count');

    const pair = job.items[0];
    if (pair && isScalar(pair.key)) expect(pair.key.spaceBefore).toBe(false);
    const lines = new Document(root).toString().split('\n').slice(0, -1);
    expect(lines.filter((line) => line !== line.trimEnd())).toEqual([]);
  });

  it('ignores keys the map does not hold', () => {
    const annotator = new PresentationAnnotator(2);
    const root = annotator.root();
    root.set('a', 1);

    annotator.attachComment(root, 'b', 'Nothing');

    expect(root.items).toHaveLength(1);
    expect(new Document(root).toString()).toBe('a: 1\n');
  });
});
