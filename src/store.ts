import type {
  CatalogProduct,
  InventorySession,
  NamedRef,
  NewCatalogProduct,
  NewPriceHistoryRecord,
  PriceHistoryRecord,
} from "./types.js";

/**
 * Module: Catalog Store Contract
 * Purpose: The record-oriented persistence the engine talks to. Calls are
 * synchronous; `transaction` is the single unit-of-work boundary used by the
 * applier and the inventory count sync.
 */

export type RefKind = "supplier" | "category";

export interface CatalogStore {
  listProducts(): CatalogProduct[];
  findProductByBarcode(barcode: string): CatalogProduct | undefined;
  insertProduct(product: NewCatalogProduct): CatalogProduct;
  /** Persist every column of an existing product (matched by id). */
  updateProduct(product: CatalogProduct): void;

  findRef(kind: RefKind, name: string): NamedRef | undefined;
  insertRef(kind: RefKind, name: string): NamedRef;

  insertPriceHistory(record: NewPriceHistoryRecord): PriceHistoryRecord;
  listPriceHistory(productId: number): PriceHistoryRecord[];

  getSession(id: string): InventorySession | undefined;
  saveSession(session: InventorySession): void;

  /** Run `fn` atomically: commit when it returns, roll back when it throws. */
  transaction<T>(fn: () => T): T;
}

/**
 * Find a supplier/category by exact trimmed name, inserting it on a miss.
 * An empty name yields a transient, unsaved reference instead of throwing;
 * callers are expected to filter blank names out beforehand.
 */
export function findOrCreateRef(store: CatalogStore, kind: RefKind, name: string): NamedRef {
  const trimmed = name.trim();
  if (!trimmed) return { id: null, name: "" };
  return store.findRef(kind, trimmed) ?? store.insertRef(kind, trimmed);
}

/** Resolve an optional draft name to a reference; blank or absent clears it. */
export function resolveRef(store: CatalogStore, kind: RefKind, name: string | undefined): NamedRef | null {
  const trimmed = (name ?? "").trim();
  return trimmed ? findOrCreateRef(store, kind, trimmed) : null;
}
