import Database from "better-sqlite3";
import { z } from "zod";
import type {
  CatalogProduct,
  InventorySession,
  NamedRef,
  NewCatalogProduct,
  NewPriceHistoryRecord,
  PriceHistoryRecord,
  PriceKind,
} from "./types.js";
import type { CatalogStore, RefKind } from "./store.js";

interface ProductRow {
  id: number;
  barcode: string;
  item_number: string | null;
  product_name: string | null;
  second_product_name: string | null;
  purchase_price: number | null;
  retail_price: number | null;
  stock_quantity: number | null;
  supplier_id: number | null;
  supplier_name: string | null;
  category_id: number | null;
  category_name: string | null;
}

interface RefRow {
  id: number;
  name: string;
}

interface PriceHistoryRow {
  id: number;
  product_id: number;
  kind: PriceKind;
  price: number;
  effective_at: string;
  source: string;
  note: string | null;
  created_at: string;
}

interface SessionRow {
  id: string;
  title: string;
  supplier_name: string;
  category_name: string;
  created_at: string;
  grid_json: string;
  sync_status: string;
}

const gridSchema = z.array(z.array(z.string()));
const syncStatusSchema = z.enum(["notAttempted", "syncedSuccessfully", "attemptedWithErrors"]);

const REF_TABLE: Record<RefKind, "suppliers" | "categories"> = {
  supplier: "suppliers",
  category: "categories",
};

const PRODUCT_SELECT = `
  SELECT p.id, p.barcode, p.item_number, p.product_name, p.second_product_name,
         p.purchase_price, p.retail_price, p.stock_quantity,
         p.supplier_id, s.name AS supplier_name,
         p.category_id, c.name AS category_name
  FROM products p
  LEFT JOIN suppliers s ON s.id = p.supplier_id
  LEFT JOIN categories c ON c.id = p.category_id
`;

const toRef = (id: number | null, name: string | null): NamedRef | null =>
  id !== null && name !== null ? { id, name } : null;

function toProduct(row: ProductRow): CatalogProduct {
  return {
    id: row.id,
    barcode: row.barcode,
    itemNumber: row.item_number,
    productName: row.product_name,
    secondProductName: row.second_product_name,
    purchasePrice: row.purchase_price,
    retailPrice: row.retail_price,
    stockQuantity: row.stock_quantity,
    supplier: toRef(row.supplier_id, row.supplier_name),
    category: toRef(row.category_id, row.category_name),
  };
}

/**
 * better-sqlite3 backed catalog. Pass a file path, or ":memory:" for an
 * in-process database (tests).
 */
export class SqliteCatalogStore implements CatalogStore {
  private readonly db: Database.Database;

  constructor(filename: string) {
    this.db = new Database(filename);
    if (filename !== ":memory:") this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.ensureSchema();
  }

  private ensureSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS suppliers (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE
      );

      CREATE TABLE IF NOT EXISTS categories (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE
      );

      CREATE TABLE IF NOT EXISTS products (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        barcode TEXT NOT NULL UNIQUE,
        item_number TEXT,
        product_name TEXT,
        second_product_name TEXT,
        purchase_price REAL,
        retail_price REAL,
        stock_quantity REAL,
        supplier_id INTEGER REFERENCES suppliers(id),
        category_id INTEGER REFERENCES categories(id)
      );

      CREATE TABLE IF NOT EXISTS price_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        product_id INTEGER NOT NULL REFERENCES products(id) ON DELETE CASCADE,
        kind TEXT NOT NULL CHECK (kind IN ('purchase', 'retail')),
        price REAL NOT NULL,
        effective_at TEXT NOT NULL,
        source TEXT NOT NULL,
        note TEXT,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_price_history_product
      ON price_history(product_id);

      CREATE TABLE IF NOT EXISTS inventory_sessions (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL DEFAULT '',
        supplier_name TEXT NOT NULL DEFAULT '',
        category_name TEXT NOT NULL DEFAULT '',
        created_at TEXT NOT NULL,
        grid_json TEXT NOT NULL,
        sync_status TEXT NOT NULL DEFAULT 'notAttempted'
      );
    `);
  }

  listProducts(): CatalogProduct[] {
    const rows = this.db.prepare(`${PRODUCT_SELECT} ORDER BY p.barcode ASC`).all() as ProductRow[];
    return rows.map(toProduct);
  }

  findProductByBarcode(barcode: string): CatalogProduct | undefined {
    const row = this.db.prepare(`${PRODUCT_SELECT} WHERE p.barcode = ? LIMIT 1`).get(barcode) as
      | ProductRow
      | undefined;
    return row ? toProduct(row) : undefined;
  }

  insertProduct(product: NewCatalogProduct): CatalogProduct {
    const info = this.db
      .prepare(
        `
        INSERT INTO products (
          barcode, item_number, product_name, second_product_name,
          purchase_price, retail_price, stock_quantity, supplier_id, category_id
        ) VALUES (
          @barcode, @item_number, @product_name, @second_product_name,
          @purchase_price, @retail_price, @stock_quantity, @supplier_id, @category_id
        )
      `,
      )
      .run({
        barcode: product.barcode,
        item_number: product.itemNumber,
        product_name: product.productName,
        second_product_name: product.secondProductName,
        purchase_price: product.purchasePrice,
        retail_price: product.retailPrice,
        stock_quantity: product.stockQuantity,
        supplier_id: product.supplier?.id ?? null,
        category_id: product.category?.id ?? null,
      });
    return { ...product, id: Number(info.lastInsertRowid) };
  }

  updateProduct(product: CatalogProduct): void {
    this.db
      .prepare(
        `
        UPDATE products SET
          barcode = @barcode,
          item_number = @item_number,
          product_name = @product_name,
          second_product_name = @second_product_name,
          purchase_price = @purchase_price,
          retail_price = @retail_price,
          stock_quantity = @stock_quantity,
          supplier_id = @supplier_id,
          category_id = @category_id
        WHERE id = @id
      `,
      )
      .run({
        id: product.id,
        barcode: product.barcode,
        item_number: product.itemNumber,
        product_name: product.productName,
        second_product_name: product.secondProductName,
        purchase_price: product.purchasePrice,
        retail_price: product.retailPrice,
        stock_quantity: product.stockQuantity,
        supplier_id: product.supplier?.id ?? null,
        category_id: product.category?.id ?? null,
      });
  }

  findRef(kind: RefKind, name: string): NamedRef | undefined {
    const row = this.db.prepare(`SELECT id, name FROM ${REF_TABLE[kind]} WHERE name = ? LIMIT 1`).get(name) as
      | RefRow
      | undefined;
    return row ? { id: row.id, name: row.name } : undefined;
  }

  insertRef(kind: RefKind, name: string): NamedRef {
    const info = this.db.prepare(`INSERT INTO ${REF_TABLE[kind]} (name) VALUES (?)`).run(name);
    return { id: Number(info.lastInsertRowid), name };
  }

  listRefs(kind: RefKind): NamedRef[] {
    const rows = this.db.prepare(`SELECT id, name FROM ${REF_TABLE[kind]} ORDER BY name ASC`).all() as RefRow[];
    return rows.map((row) => ({ id: row.id, name: row.name }));
  }

  insertPriceHistory(record: NewPriceHistoryRecord): PriceHistoryRecord {
    const createdAt = new Date().toISOString();
    const info = this.db
      .prepare(
        `
        INSERT INTO price_history (product_id, kind, price, effective_at, source, note, created_at)
        VALUES (@product_id, @kind, @price, @effective_at, @source, @note, @created_at)
      `,
      )
      .run({
        product_id: record.productId,
        kind: record.kind,
        price: record.price,
        effective_at: record.effectiveAt,
        source: record.source,
        note: record.note,
        created_at: createdAt,
      });
    return { ...record, id: Number(info.lastInsertRowid), createdAt };
  }

  listPriceHistory(productId: number): PriceHistoryRecord[] {
    const rows = this.db
      .prepare(
        `
        SELECT id, product_id, kind, price, effective_at, source, note, created_at
        FROM price_history
        WHERE product_id = ?
        ORDER BY effective_at DESC, id DESC
      `,
      )
      .all(productId) as PriceHistoryRow[];
    return rows.map((row) => ({
      id: row.id,
      productId: row.product_id,
      kind: row.kind,
      price: row.price,
      effectiveAt: row.effective_at,
      source: row.source,
      note: row.note,
      createdAt: row.created_at,
    }));
  }

  getSession(id: string): InventorySession | undefined {
    const row = this.db
      .prepare(
        `
        SELECT id, title, supplier_name, category_name, created_at, grid_json, sync_status
        FROM inventory_sessions
        WHERE id = ?
        LIMIT 1
      `,
      )
      .get(id) as SessionRow | undefined;
    if (!row) return undefined;
    return {
      id: row.id,
      title: row.title,
      supplierName: row.supplier_name,
      categoryName: row.category_name,
      createdAt: row.created_at,
      grid: gridSchema.parse(JSON.parse(row.grid_json)),
      syncStatus: syncStatusSchema.parse(row.sync_status),
    };
  }

  saveSession(session: InventorySession): void {
    this.db
      .prepare(
        `
        INSERT INTO inventory_sessions (id, title, supplier_name, category_name, created_at, grid_json, sync_status)
        VALUES (@id, @title, @supplier_name, @category_name, @created_at, @grid_json, @sync_status)
        ON CONFLICT(id) DO UPDATE SET
          title = excluded.title,
          supplier_name = excluded.supplier_name,
          category_name = excluded.category_name,
          grid_json = excluded.grid_json,
          sync_status = excluded.sync_status
      `,
      )
      .run({
        id: session.id,
        title: session.title,
        supplier_name: session.supplierName,
        category_name: session.categoryName,
        created_at: session.createdAt,
        grid_json: JSON.stringify(session.grid),
        sync_status: session.syncStatus,
      });
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    this.db.close();
  }
}
