import { CollectionName, DocumentFilter, DocumentStore, StoredDocument } from '../database';

// In-process stand-in for PgDocumentStore
export class MemoryDocumentStore implements DocumentStore {
  private readonly collections = new Map<CollectionName, StoredDocument[]>();
  private nextId = 1;

  async listDocuments(
    collection: CollectionName,
    filter: DocumentFilter,
    limit: number
  ): Promise<StoredDocument[]> {
    const matches = (this.collections.get(collection) ?? []).filter((doc) =>
      Object.entries(filter).every(([field, value]) => doc[field] === value)
    );
    const limited = limit > 0 ? matches.slice(0, limit) : matches;
    return limited.map((doc) => ({ ...doc }));
  }

  async createDocument(collection: CollectionName, record: object): Promise<string> {
    const _id = `doc-${this.nextId++}`;
    const copy: Record<string, unknown> = JSON.parse(JSON.stringify(record));
    const docs = this.collections.get(collection) ?? [];
    docs.push({ ...copy, _id });
    this.collections.set(collection, docs);
    return _id;
  }

  async listCollectionNames(): Promise<string[]> {
    return [...this.collections.keys()];
  }
}
