import fs from 'node:fs';
import path from 'node:path';

import { KnowledgeStoreError, describeError } from '../errors';
import { NamespaceContent, NamespaceDescriptor } from '../types';
import { knowledgeStoreSchema, NamespaceRecord } from './schema';

export type CatalogEntry = {
  descriptor: NamespaceDescriptor;
  content: NamespaceContent;
};

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    Object.values(value).forEach((child) => deepFreeze(child));
  }

  return value;
};

/**
 * Read-only, insertion-ordered view of every namespace known to the process.
 */
export class KnowledgeCatalog {
  private readonly entriesById: ReadonlyMap<string, CatalogEntry>;

  constructor(entries: readonly CatalogEntry[]) {
    const byId = new Map<string, CatalogEntry>();

    entries.forEach((entry) => {
      if (byId.has(entry.descriptor.id)) {
        throw new KnowledgeStoreError(`Duplicate namespace id "${entry.descriptor.id}".`, {
          details: { namespaceId: entry.descriptor.id },
        });
      }

      if (entry.content.id !== entry.descriptor.id) {
        throw new KnowledgeStoreError(
          `Content id "${entry.content.id}" does not match namespace "${entry.descriptor.id}".`,
        );
      }

      byId.set(entry.descriptor.id, deepFreeze({ ...entry }));
    });

    this.entriesById = byId;
  }

  get size(): number {
    return this.entriesById.size;
  }

  has(id: string): boolean {
    return this.entriesById.has(id);
  }

  ids(): string[] {
    return Array.from(this.entriesById.keys());
  }

  descriptors(): NamespaceDescriptor[] {
    return Array.from(this.entriesById.values(), (entry) => entry.descriptor);
  }

  getDescriptor(id: string): NamespaceDescriptor | undefined {
    return this.entriesById.get(id)?.descriptor;
  }

  getContent(id: string): NamespaceContent | undefined {
    return this.entriesById.get(id)?.content;
  }
}

const toEntry = (record: NamespaceRecord): CatalogEntry => {
  const id = record.namespace_id;

  return {
    descriptor: { id, label: record.title, summary: record.description },
    content: { id, body: record },
  };
};

export const parseKnowledgeStore = (raw: unknown): KnowledgeCatalog => {
  const validation = knowledgeStoreSchema.safeParse(raw);

  if (!validation.success) {
    const issues = validation.error.issues.map((issue) =>
      issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message);

    throw new KnowledgeStoreError(`Invalid knowledge store. ${issues.join('; ')}`, {
      details: { issues },
    });
  }

  // "namespaces" wins when both keys are present.
  const records = validation.data.namespaces ?? validation.data.dataset ?? [];

  if (!records.length) {
    throw new KnowledgeStoreError('Knowledge store does not define any namespaces.');
  }

  return new KnowledgeCatalog(records.map(toEntry));
};

export const loadCatalog = (filePath: string): KnowledgeCatalog => {
  const resolved = path.resolve(filePath);
  let raw: string;

  try {
    raw = fs.readFileSync(resolved, 'utf-8');
  } catch (error) {
    throw new KnowledgeStoreError(`Could not read knowledge store at ${resolved}: ${describeError(error)}`, {
      details: { path: resolved },
      cause: error,
    });
  }

  let parsed: unknown;

  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new KnowledgeStoreError(`Knowledge store at ${resolved} is not valid JSON: ${describeError(error)}`, {
      details: { path: resolved },
      cause: error,
    });
  }

  return parseKnowledgeStore(parsed);
};
