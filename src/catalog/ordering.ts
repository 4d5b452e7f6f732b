/**
 * Code-unit comparison. Independent of the host locale, so the same
 * input always sorts the same way; matches PostgreSQL's "C" collation
 * for ASCII model numbers.
 */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

interface ModelIdentity {
  modelId: string;
  modelNumber: string;
  brand: string;
  category: string;
}

/**
 * model_number ascending, then brand, category and model id, so models
 * that share a model_number under different brands keep a stable order.
 */
export function compareModels(a: ModelIdentity, b: ModelIdentity): number {
  return (
    compareText(a.modelNumber, b.modelNumber) ||
    compareText(a.brand, b.brand) ||
    compareText(a.category, b.category) ||
    compareIds(a.modelId, b.modelId)
  );
}

/**
 * BIGSERIAL ids arrive from pg as decimal strings; compare them numerically.
 */
export function compareIds(a: string, b: string): number {
  return a.length - b.length || compareText(a, b);
}
