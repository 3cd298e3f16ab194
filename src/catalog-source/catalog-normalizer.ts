import { SourceRecord } from './catalog-source.types';

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toCamelCase(key: string): string {
    return key.replace(/[_-]+([a-zA-Z0-9])/g, (_, next: string) =>
        next.toUpperCase(),
    );
}

export function camelizeKeys(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(camelizeKeys);
    }
    if (isRecord(value)) {
        return Object.fromEntries(
            Object.entries(value).map(([key, inner]) => [
                toCamelCase(key),
                camelizeKeys(inner),
            ]),
        );
    }
    return value;
}

function categoryNames(record: Record<string, unknown>): unknown {
    const { categories, category } = record;
    if (Array.isArray(categories)) {
        return categories.map((entry) =>
            isRecord(entry) && typeof entry.name === 'string' ? entry.name : entry,
        );
    }
    if (typeof category === 'string') {
        return [category];
    }
    if (isRecord(category) && typeof category.name === 'string') {
        return [category.name];
    }
    return categories;
}

function imageUrls(images: unknown): unknown {
    if (!Array.isArray(images)) return images;
    return images.map((image) => {
        if (!isRecord(image)) return image;
        return image.url ?? image.imageUrl ?? image;
    });
}

function reviews(entries: unknown): unknown {
    if (!Array.isArray(entries)) return entries;
    return entries.map((entry) => {
        if (!isRecord(entry)) return entry;
        const { date, reviewDate, ...rest } = entry;
        return { ...rest, reviewedAt: rest.reviewedAt ?? reviewDate ?? date };
    });
}

/**
 * Maps one raw catalog product onto canonical keys. Field values are left as
 * the source sent them; validation happens at persistence time.
 */
export function normalizeSourceProduct(raw: unknown): SourceRecord {
    const camel = camelizeKeys(raw);
    if (!isRecord(camel)) {
        return {};
    }

    const {
        id,
        externalId,
        category,
        stockQuantity,
        meta,
        ...rest
    } = camel;
    const record: SourceRecord = {
        ...rest,
        externalId: externalId ?? id,
        stock: rest.stock ?? stockQuantity,
        categories: categoryNames({ categories: rest.categories, category }),
        images: imageUrls(rest.images),
        reviews: reviews(rest.reviews),
    };

    if (isRecord(meta)) {
        record.barcode ??= meta.barcode;
        record.qrCode ??= meta.qrCode;
    }

    return record;
}
