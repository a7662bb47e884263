import type { Db, Document, Filter } from 'mongodb';

/** The subset of a document database the catalog talks to. */
export interface StoreHandle {
  readonly databaseName: string;
  find(collection: string, filter: Filter<Document>): Promise<Document[]>;
  distinct(collection: string, field: string): Promise<unknown[]>;
  count(collection: string, filter: Filter<Document>): Promise<number>;
  insertOne(collection: string, doc: Document): Promise<string>;
  insertMany(collection: string, docs: Document[]): Promise<string[]>;
  listCollections(): Promise<string[]>;
}

export type Store =
  | { status: 'ready'; handle: StoreHandle }
  | { status: 'unavailable'; reason: string };

export const readyStore = (handle: StoreHandle): Store => ({ status: 'ready', handle });
export const unavailableStore = (reason: string): Store => ({ status: 'unavailable', reason });

export class MongoStore implements StoreHandle {
  constructor(
    private readonly db: Db,
    private readonly maxTimeMS: number,
  ) {}

  get databaseName(): string {
    return this.db.databaseName;
  }

  find(collection: string, filter: Filter<Document>) {
    return this.db.collection(collection).find(filter, { maxTimeMS: this.maxTimeMS }).toArray();
  }

  distinct(collection: string, field: string) {
    return this.db.collection(collection).distinct(field, {}, { maxTimeMS: this.maxTimeMS });
  }

  count(collection: string, filter: Filter<Document>) {
    return this.db.collection(collection).countDocuments(filter, { maxTimeMS: this.maxTimeMS });
  }

  async insertOne(collection: string, doc: Document) {
    // The driver writes _id back onto the object it is given
    const res = await this.db.collection(collection).insertOne({ ...doc });
    return res.insertedId.toString();
  }

  async insertMany(collection: string, docs: Document[]) {
    const res = await this.db.collection(collection).insertMany(docs.map((d) => ({ ...d })));
    return Object.keys(res.insertedIds)
      .map(Number)
      .sort((a, b) => a - b)
      .map((i) => res.insertedIds[i].toString());
  }

  async listCollections() {
    const infos = await this.db.listCollections({}, { nameOnly: true }).toArray();
    return infos.map((c) => c.name);
  }
}
