import type {
  ApplyResult,
  CatalogProduct,
  PriceKind,
  PriceSource,
  ProductDraft,
  ReconciliationResult,
  UpdateDraft,
} from "./types.js";
import type { CatalogStore } from "./store.js";
import { resolveRef } from "./store.js";
import { PersistenceError } from "./errors.js";
import { decimalsEqual } from "./sanitize.js";
import { createLogger } from "./logger.js";

/**
 * Module: Change-Set Applier
 * Purpose: Write a reviewed reconciliation result into the catalog as one
 * transaction and append price-history records for prices that actually moved.
 * Design:
 * - Updates re-read the live product by barcode; the diff-time snapshot is never reused.
 * - Only fields listed in `changedFields` are written.
 * - Price history compares the price stored before mutation with the one
 *   written, so a supplier-only change never logs a price.
 */

export const IMPORT_PRICE_SOURCE: PriceSource = "IMPORT_EXCEL";

const log = createLogger("apply");

export interface ApplyOptions {
  now?: () => Date;
  source?: PriceSource;
}

interface PriceChange {
  kind: PriceKind;
  oldPrice: number | null | undefined;
  newPrice: number | undefined;
}

/**
 * Append one history record per price that is present and differs from its
 * previous value (absent → present counts as a change). Uses the same tolerance
 * as the diff, so a logged price is always a written price. Returns the count written.
 */
export function recordPriceChanges(
  store: CatalogStore,
  product: CatalogProduct,
  changes: readonly PriceChange[],
  source: PriceSource,
  at: Date
): number {
  let written = 0;
  for (const change of changes) {
    if (change.newPrice === undefined) continue;
    if (decimalsEqual(change.oldPrice, change.newPrice)) continue;
    store.insertPriceHistory({
      productId: product.id,
      kind: change.kind,
      price: change.newPrice,
      effectiveAt: at.toISOString(),
      source,
      note: null,
    });
    written++;
  }
  return written;
}

function insertNewProduct(store: CatalogStore, draft: ProductDraft): CatalogProduct {
  return store.insertProduct({
    barcode: draft.barcode,
    itemNumber: draft.itemNumber ?? null,
    productName: draft.productName ?? null,
    secondProductName: draft.secondProductName ?? null,
    purchasePrice: draft.purchasePrice ?? null,
    retailPrice: draft.retailPrice ?? null,
    stockQuantity: draft.stockQuantity ?? null,
    supplier: resolveRef(store, "supplier", draft.supplierName),
    category: resolveRef(store, "category", draft.categoryName),
  });
}

/** Copy the listed fields of `update.new` onto a live product, in place. */
export function applyChangedFields(store: CatalogStore, product: CatalogProduct, update: UpdateDraft): void {
  const next = update.new;
  for (const field of update.changedFields) {
    switch (field) {
      case "itemNumber":
        product.itemNumber = next.itemNumber ?? null;
        break;
      case "productName":
        product.productName = next.productName ?? null;
        break;
      case "secondProductName":
        product.secondProductName = next.secondProductName ?? null;
        break;
      case "purchasePrice":
        product.purchasePrice = next.purchasePrice ?? null;
        break;
      case "retailPrice":
        product.retailPrice = next.retailPrice ?? null;
        break;
      case "stockQuantity":
        product.stockQuantity = next.stockQuantity ?? null;
        break;
      case "supplierName":
        product.supplier = resolveRef(store, "supplier", next.supplierName);
        break;
      case "categoryName":
        product.category = resolveRef(store, "category", next.categoryName);
        break;
    }
  }
}

export function applyChangeSet(
  store: CatalogStore,
  result: Pick<ReconciliationResult, "newProducts" | "updatedProducts">,
  options: ApplyOptions = {}
): ApplyResult {
  const now = options.now ?? (() => new Date());
  const source = options.source ?? IMPORT_PRICE_SOURCE;

  const run = (): ApplyResult => {
    const at = now();
    const outcome: ApplyResult = { inserted: 0, updated: 0, skipped: 0, priceHistoryRecords: 0 };

    for (const draft of result.newProducts) {
      const product = insertNewProduct(store, draft);
      outcome.inserted++;
      outcome.priceHistoryRecords += recordPriceChanges(
        store,
        product,
        [
          { kind: "purchase", oldPrice: undefined, newPrice: draft.purchasePrice },
          { kind: "retail", oldPrice: undefined, newPrice: draft.retailPrice },
        ],
        source,
        at
      );
    }

    for (const update of result.updatedProducts) {
      const product = store.findProductByBarcode(update.barcode);
      if (!product) {
        log.warn("product vanished before apply; update skipped", { barcode: update.barcode });
        outcome.skipped++;
        continue;
      }
      const oldPurchase = product.purchasePrice;
      const oldRetail = product.retailPrice;
      applyChangedFields(store, product, update);
      store.updateProduct(product);
      outcome.updated++;
      // Compare against what was written, not the draft
      outcome.priceHistoryRecords += recordPriceChanges(
        store,
        product,
        [
          { kind: "purchase", oldPrice: oldPurchase, newPrice: product.purchasePrice ?? undefined },
          { kind: "retail", oldPrice: oldRetail, newPrice: product.retailPrice ?? undefined },
        ],
        source,
        at
      );
    }
    return outcome;
  };

  let outcome: ApplyResult;
  try {
    outcome = store.transaction(run);
  } catch (error) {
    log.error("import rolled back", error);
    throw new PersistenceError("applying the import", error);
  }
  log.info("import committed", { ...outcome });
  return outcome;
}
