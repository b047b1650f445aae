import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { KnowledgeStoreError } from '../src/errors';
import { KnowledgeCatalog, loadCatalog, parseKnowledgeStore } from '../src/store/catalog';

const record = (id: string, title = `Title ${id}`) => ({
  namespace_id: id,
  title,
  description: `About ${id}`,
});

describe('parseKnowledgeStore', () => {
  test('builds descriptors and content in store order', () => {
    const catalog = parseKnowledgeStore({
      namespaces: [
        { ...record('namespace_002', 'History'), topics: ['Rome'] },
        record('namespace_001', 'Math'),
      ],
    });

    expect(catalog.size).toBe(2);
    expect(catalog.ids()).toEqual(['namespace_002', 'namespace_001']);
    expect(catalog.descriptors()).toEqual([
      { id: 'namespace_002', label: 'History', summary: 'About namespace_002' },
      { id: 'namespace_001', label: 'Math', summary: 'About namespace_001' },
    ]);
    expect(catalog.getContent('namespace_002')).toEqual({
      id: 'namespace_002',
      body: {
        namespace_id: 'namespace_002',
        title: 'History',
        description: 'About namespace_002',
        topics: ['Rome'],
      },
    });
  });

  test('accepts the "dataset" key', () => {
    const catalog = parseKnowledgeStore({ dataset: [record('a'), record('b')] });

    expect(catalog.ids()).toEqual(['a', 'b']);
  });

  test('prefers "namespaces" when both keys are present', () => {
    const catalog = parseKnowledgeStore({ namespaces: [record('a')], dataset: [record('b')] });

    expect(catalog.ids()).toEqual(['a']);
  });

  test('fills in a missing title and description', () => {
    const catalog = parseKnowledgeStore({ namespaces: [{ namespace_id: 'bare', notes: 'text' }] });

    expect(catalog.getDescriptor('bare')).toEqual({ id: 'bare', label: 'N/A', summary: 'N/A' });
  });

  test('trims namespace ids', () => {
    const catalog = parseKnowledgeStore({ namespaces: [record('  spaced  ')] });

    expect(catalog.has('spaced')).toBe(true);
  });

  test('freezes loaded content', () => {
    const catalog = parseKnowledgeStore({
      namespaces: [{ ...record('a'), topics: [{ name: 'nested' }] }],
    });
    const content = catalog.getContent('a');
    const body = content?.body;

    expect(Object.isFrozen(content)).toBe(true);
    expect(Object.isFrozen(body)).toBe(true);
    expect(typeof body === 'object' && Object.isFrozen(body.topics)).toBe(true);
  });

  test('rejects duplicate ids', () => {
    expect(() => parseKnowledgeStore({ namespaces: [record('a'), record('a')] })).toThrow(
      new KnowledgeStoreError('Duplicate namespace id "a".'),
    );
  });

  test('rejects a store without namespaces', () => {
    expect(() => parseKnowledgeStore({ namespaces: [] })).toThrow(
      'Knowledge store does not define any namespaces.',
    );
  });

  test('rejects a document without a namespace list', () => {
    expect(() => parseKnowledgeStore({ topics: [] })).toThrow(
      'Invalid knowledge store. Knowledge store must contain a "namespaces" (or "dataset") array.',
    );
  });

  test('rejects records without an id', () => {
    expect(() => parseKnowledgeStore({ namespaces: [{ title: 'No id' }] })).toThrow(KnowledgeStoreError);
  });

  test.each(['world history', 'a,b', 'a\tb'])('rejects the multi-token id %j', (id) => {
    expect(() => parseKnowledgeStore({ namespaces: [record(id)] })).toThrow(KnowledgeStoreError);
    expect(() => parseKnowledgeStore({ namespaces: [record(id)] })).toThrow(
      /namespace_id must be a single token without spaces or commas/,
    );
  });

  test('returns undefined for unknown ids', () => {
    const catalog = parseKnowledgeStore({ namespaces: [record('a')] });

    expect(catalog.getContent('b')).toBeUndefined();
    expect(catalog.getDescriptor('b')).toBeUndefined();
    expect(catalog.has('b')).toBe(false);
  });
});

describe('KnowledgeCatalog', () => {
  test('rejects content filed under another id', () => {
    expect(
      () =>
        new KnowledgeCatalog([
          { descriptor: { id: 'a', label: 'A', summary: 'a' }, content: { id: 'b', body: 'text' } },
        ]),
    ).toThrow('Content id "b" does not match namespace "a".');
  });
});

describe('loadCatalog', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'knowledge-router-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('loads a store from disk', () => {
    const file = path.join(dir, 'store.json');
    fs.writeFileSync(file, JSON.stringify({ namespaces: [record('namespace_001', 'Math')] }));

    expect(loadCatalog(file).getDescriptor('namespace_001')?.label).toBe('Math');
  });

  test('reports a missing file', () => {
    const file = path.join(dir, 'missing.json');

    expect(() => loadCatalog(file)).toThrow(`Could not read knowledge store at ${file}`);
  });

  test('reports invalid JSON', () => {
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{ "namespaces": [');

    expect(() => loadCatalog(file)).toThrow(`Knowledge store at ${file} is not valid JSON`);
  });

  test('loads the bundled knowledge store', () => {
    const catalog = loadCatalog(path.join(__dirname, '..', 'data', 'knowledge.json'));

    expect(catalog.descriptors().map((descriptor) => descriptor.label)).toEqual([
      'Mathematics',
      'History',
      'Biology',
      'Computer Science',
    ]);
  });
});
