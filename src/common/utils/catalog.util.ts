export type AvailabilityStatus = 'in_stock' | 'low_stock' | 'out_of_stock';

export const LOW_STOCK_THRESHOLD = 5;

export function roundTo2(value: number): number {
    return Math.round((value + Number.EPSILON) * 100) / 100;
}

export function computeFinalPrice(price: number, discountPercentage: number): number {
    return roundTo2(price * (1 - discountPercentage / 100));
}

export function slugify(name: string): string {
    return name
        .trim()
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');
}

export function deriveAvailability(stock: number): AvailabilityStatus {
    if (stock <= 0) return 'out_of_stock';
    if (stock <= LOW_STOCK_THRESHOLD) return 'low_stock';
    return 'in_stock';
}

export const MAX_PER_PAGE = 100;

export interface PageWindow {
    page: number;
    perPage: number;
    offset: number;
}

/** Clamps `perPage` to [1, 100] and `page` to >= 1. */
export function resolvePage(page?: number, perPage?: number): PageWindow {
    const safePage = Math.max(1, Math.floor(page ?? 1) || 1);
    const safePerPage = Math.min(
        MAX_PER_PAGE,
        Math.max(1, Math.floor(perPage ?? 20) || 1),
    );
    return {
        page: safePage,
        perPage: safePerPage,
        offset: (safePage - 1) * safePerPage,
    };
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
    const chunks: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        chunks.push(items.slice(i, i + size));
    }
    return chunks;
}
