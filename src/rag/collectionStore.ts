/**
 * Persistent collection storage: one JSON file per collection, holding the
 * chunk text, metadata and embedding of every stored record.
 */
import fs from 'fs';
import path from 'path';
import { validateCollectionName } from '../config.js';
import { CollectionNotFoundError } from '../errors.js';

export type RecordMetadata = Record<string, string | number | boolean>;

export interface StoredRecord {
  id: string;
  content: string;
  metadata: RecordMetadata;
  embedding: number[];
}

export interface CollectionInfo {
  name: string;
  count: number;
  embeddingModel: string;
  dimensions: number;
  createdAt: string;
  updatedAt: string;
}

interface CollectionFile extends CollectionInfo {
  records: StoredRecord[];
}

const COLLECTION_FILE_SUFFIX = '.json';

function isRecordMetadata(value: unknown): value is RecordMetadata {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(
    (v) => typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean'
  );
}

function isStoredRecord(value: unknown): value is StoredRecord {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'id' in value && typeof value.id === 'string' &&
    'content' in value && typeof value.content === 'string' &&
    'metadata' in value && isRecordMetadata(value.metadata) &&
    'embedding' in value && Array.isArray(value.embedding) &&
    value.embedding.every((n: unknown) => typeof n === 'number')
  );
}

function parseCollectionFile(raw: string, filePath: string): CollectionFile {
  const data: unknown = JSON.parse(raw);
  if (
    typeof data === 'object' && data !== null &&
    'name' in data && typeof data.name === 'string' &&
    'embeddingModel' in data && typeof data.embeddingModel === 'string' &&
    'createdAt' in data && typeof data.createdAt === 'string' &&
    'updatedAt' in data && typeof data.updatedAt === 'string' &&
    'records' in data && Array.isArray(data.records) &&
    data.records.every(isStoredRecord)
  ) {
    const records: StoredRecord[] = data.records;
    return {
      name: data.name,
      embeddingModel: data.embeddingModel,
      createdAt: data.createdAt,
      updatedAt: data.updatedAt,
      count: records.length,
      dimensions: records[0]?.embedding.length ?? 0,
      records,
    };
  }
  throw new Error(`Malformed collection file: ${filePath}`);
}

/**
 * File-backed store of named collections.
 */
export class CollectionStore {
  readonly persistDirectory: string;

  constructor(persistDirectory: string) {
    this.persistDirectory = persistDirectory;
  }

  private filePath(name: string): string {
    return path.join(this.persistDirectory, `${validateCollectionName(name)}${COLLECTION_FILE_SUFFIX}`);
  }

  private read(name: string): CollectionFile | null {
    const filePath = this.filePath(name);
    if (!fs.existsSync(filePath)) {
      return null;
    }
    return parseCollectionFile(fs.readFileSync(filePath, 'utf-8'), filePath);
  }

  private write(collection: CollectionFile): void {
    fs.mkdirSync(this.persistDirectory, { recursive: true });

    const filePath = this.filePath(collection.name);
    const { count: _count, dimensions: _dimensions, ...persisted } = collection;
    // Write then rename so readers never see a half-written file
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(persisted));
    fs.renameSync(tmpPath, filePath);
  }

  exists(name: string): boolean {
    return fs.existsSync(this.filePath(name));
  }

  /**
   * Number of stored records; 0 when the collection does not exist.
   */
  count(name: string): number {
    return this.read(name)?.records.length ?? 0;
  }

  getInfo(name: string): CollectionInfo | null {
    const collection = this.read(name);
    if (collection === null) {
      return null;
    }
    const { records: _records, ...info } = collection;
    return info;
  }

  listCollections(): CollectionInfo[] {
    if (!fs.existsSync(this.persistDirectory)) {
      return [];
    }

    const infos: CollectionInfo[] = [];
    for (const file of fs.readdirSync(this.persistDirectory).sort()) {
      if (!file.endsWith(COLLECTION_FILE_SUFFIX)) continue;
      try {
        const info = this.getInfo(file.slice(0, -COLLECTION_FILE_SUFFIX.length));
        if (info !== null) {
          infos.push(info);
        }
      } catch (error) {
        // Foreign or damaged files in the store directory are not collections
        console.warn(`Skipping ${file}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    return infos;
  }

  getRecords(name: string): StoredRecord[] {
    return this.read(name)?.records ?? [];
  }

  peek(name: string, limit: number = 5): StoredRecord[] {
    const collection = this.read(name);
    if (collection === null) {
      throw new CollectionNotFoundError(name);
    }
    return collection.records.slice(0, Math.max(0, limit));
  }

  /**
   * Create the collection if missing; no-op otherwise.
   */
  ensure(name: string, embeddingModel: string): void {
    if (!this.exists(name)) {
      const now = new Date().toISOString();
      this.write({ name, embeddingModel, createdAt: now, updatedAt: now, count: 0, dimensions: 0, records: [] });
    }
  }

  /**
   * Insert records, replacing any stored record with the same id.
   * Each call is persisted before it returns.
   */
  upsert(name: string, records: StoredRecord[], embeddingModel: string): void {
    const now = new Date().toISOString();
    const existing = this.read(name) ?? {
      name,
      embeddingModel,
      createdAt: now,
      updatedAt: now,
      count: 0,
      dimensions: 0,
      records: [],
    };

    const byId = new Map(existing.records.map((record) => [record.id, record]));
    for (const record of records) {
      byId.set(record.id, record);
    }

    const merged = Array.from(byId.values());
    this.write({
      ...existing,
      updatedAt: now,
      count: merged.length,
      dimensions: merged[0]?.embedding.length ?? 0,
      records: merged,
    });
  }

  deleteCollection(name: string): void {
    const filePath = this.filePath(name);
    if (!fs.existsSync(filePath)) {
      throw new CollectionNotFoundError(name);
    }
    fs.unlinkSync(filePath);
  }

  /**
   * Delete every collection. Returns the names removed.
   */
  deleteAll(): string[] {
    const names = this.listCollections().map((info) => info.name);
    for (const name of names) {
      this.deleteCollection(name);
    }
    return names;
  }
}
