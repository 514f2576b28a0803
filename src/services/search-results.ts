import { SearchResult } from '../domain/models';

// a product without a price sorts after every priced one
const UNPRICED = Number.MAX_SAFE_INTEGER;

function sortKey(result: SearchResult): number {
    return result.price ? result.price : UNPRICED;
}

export function rankByPrice(results: readonly SearchResult[]): SearchResult[] {
    return [...results].sort((a, b) => sortKey(a) - sortKey(b));
}

/**
 * Combines the results of two quotes, keeping one entry per shipping product
 * (the most expensive offer wins), cheapest first.
 */
export function mergeSearchResults(
    first: readonly SearchResult[],
    second: readonly SearchResult[],
): SearchResult[] {
    const byProduct = new Map<number, SearchResult>();
    for (const result of [...first, ...second]) {
        const current = byProduct.get(result.id);
        if (!current || current.price < result.price) {
            byProduct.set(result.id, result);
        }
    }
    return rankByPrice(Array.from(byProduct.values()));
}
