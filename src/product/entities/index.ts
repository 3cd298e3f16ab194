import { Category } from './category.entity';
import { Product } from './product.entity';
import { ProductDimensions } from './product-dimensions.entity';
import { ProductImage } from './product-image.entity';
import { ProductReview } from './product-review.entity';
import { ProductTag } from './product-tag.entity';

export {
    Category,
    Product,
    ProductDimensions,
    ProductImage,
    ProductReview,
    ProductTag,
};

export const CATALOG_ENTITIES = [
    Product,
    Category,
    ProductImage,
    ProductTag,
    ProductReview,
    ProductDimensions,
];
