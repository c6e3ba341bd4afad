/**
 * Path-keyed Firestore stand-in for repository tests. Covers the calls the
 * repositories make: doc/collection navigation, add/set/update/delete,
 * equality filters, ordering, limit, startAfter, batches and
 * listCollections.
 */

type Data = Record<string, unknown>;

type Filter = { field: string; value: unknown };
type Order = { field: string; direction: 'asc' | 'desc' };

function comparable(value: unknown): number | string {
  if (value instanceof Date) return value.getTime();
  if (typeof value === 'number' || typeof value === 'string') return value;
  return '';
}

export class InMemoryFirestore {
  readonly store = new Map<string, Data>();
  private autoId = 0;

  collection(name: string): FakeCollection {
    return new FakeCollection(this, name);
  }

  batch() {
    const deletes: FakeDocRef[] = [];
    return {
      delete: (ref: FakeDocRef) => {
        deletes.push(ref);
      },
      commit: async () => {
        deletes.forEach((ref) => this.store.delete(ref.path));
      },
    };
  }

  nextId(collectionName: string): string {
    this.autoId += 1;
    return `${collectionName}-${this.autoId}`;
  }

  seed(path: string, data: Data): void {
    this.store.set(path, { ...data });
  }

  read(path: string): Data | undefined {
    return this.store.get(path);
  }

  asFirestore(): FirebaseFirestore.Firestore {
    return this as unknown as FirebaseFirestore.Firestore;
  }
}

class FakeSnapshot {
  constructor(
    readonly ref: FakeDocRef,
    private readonly value: Data | undefined,
  ) {}

  get id(): string {
    return this.ref.id;
  }

  get exists(): boolean {
    return this.value !== undefined;
  }

  data(): Data | undefined {
    return this.value ? { ...this.value } : undefined;
  }
}

class FakeDocRef {
  constructor(
    private readonly db: InMemoryFirestore,
    readonly path: string,
  ) {}

  get id(): string {
    return this.path.slice(this.path.lastIndexOf('/') + 1);
  }

  collection(name: string): FakeCollection {
    return new FakeCollection(this.db, `${this.path}/${name}`);
  }

  async get(): Promise<FakeSnapshot> {
    return new FakeSnapshot(this, this.db.read(this.path));
  }

  async set(data: Data, options?: { merge?: boolean }): Promise<void> {
    const existing = options?.merge ? this.db.read(this.path) ?? {} : {};
    this.db.seed(this.path, { ...existing, ...data });
  }

  async update(data: Data): Promise<void> {
    const existing = this.db.read(this.path);
    if (!existing) {
      throw new Error(`No document to update: ${this.path}`);
    }
    this.db.seed(this.path, { ...existing, ...data });
  }

  async delete(): Promise<void> {
    this.db.store.delete(this.path);
  }

  async listCollections(): Promise<FakeCollection[]> {
    const prefix = `${this.path}/`;
    const names = new Set<string>();
    for (const key of this.db.store.keys()) {
      if (key.startsWith(prefix)) {
        names.add(key.slice(prefix.length).split('/')[0]);
      }
    }
    return Array.from(names).map((name) => this.collection(name));
  }
}

class FakeQuery {
  constructor(
    protected readonly db: InMemoryFirestore,
    readonly path: string,
    private readonly filters: Filter[] = [],
    private readonly orders: Order[] = [],
    private readonly max: number | null = null,
    private readonly afterId: string | null = null,
  ) {}

  where(field: string, _op: '==', value: unknown): FakeQuery {
    return new FakeQuery(this.db, this.path, [...this.filters, { field, value }], this.orders, this.max, this.afterId);
  }

  orderBy(field: string, direction: 'asc' | 'desc' = 'asc'): FakeQuery {
    return new FakeQuery(this.db, this.path, this.filters, [...this.orders, { field, direction }], this.max, this.afterId);
  }

  limit(max: number): FakeQuery {
    return new FakeQuery(this.db, this.path, this.filters, this.orders, max, this.afterId);
  }

  startAfter(snapshot: FakeSnapshot): FakeQuery {
    return new FakeQuery(this.db, this.path, this.filters, this.orders, this.max, snapshot.id);
  }

  async get(): Promise<{ docs: FakeSnapshot[]; empty: boolean; size: number }> {
    const prefix = `${this.path}/`;
    let docs = Array.from(this.db.store.entries())
      .filter(([key]) => key.startsWith(prefix) && !key.slice(prefix.length).includes('/'))
      .map(([key, value]) => new FakeSnapshot(new FakeDocRef(this.db, key), value))
      .filter((snapshot) => this.filters.every((filter) => snapshot.data()?.[filter.field] === filter.value));

    docs.sort((left, right) => {
      for (const order of this.orders) {
        const a = comparable(left.data()?.[order.field]);
        const b = comparable(right.data()?.[order.field]);
        if (a !== b) {
          const result = a < b ? -1 : 1;
          return order.direction === 'desc' ? -result : result;
        }
      }
      return 0;
    });

    if (this.afterId !== null) {
      const index = docs.findIndex((snapshot) => snapshot.id === this.afterId);
      docs = docs.slice(index + 1);
    }
    if (this.max !== null) {
      docs = docs.slice(0, this.max);
    }

    return { docs, empty: docs.length === 0, size: docs.length };
  }
}

class FakeCollection extends FakeQuery {
  doc(id?: string): FakeDocRef {
    const name = this.path.slice(this.path.lastIndexOf('/') + 1);
    return new FakeDocRef(this.db, `${this.path}/${id ?? this.db.nextId(name)}`);
  }

  async add(data: Data): Promise<FakeDocRef> {
    const ref = this.doc();
    await ref.set(data);
    return ref;
  }
}
