import {
    Column,
    CreateDateColumn,
    Entity,
    JoinTable,
    ManyToMany,
    OneToMany,
    OneToOne,
    PrimaryGeneratedColumn,
    UpdateDateColumn,
} from 'typeorm';
import { AvailabilityStatus } from '../../common/utils/catalog.util';
import { Category } from './category.entity';
import { decimalTransformer } from './decimal.transformer';
import { ProductDimensions } from './product-dimensions.entity';
import { ProductImage } from './product-image.entity';
import { ProductReview } from './product-review.entity';
import { ProductTag } from './product-tag.entity';

@Entity('products')
export class Product {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ name: 'external_id', type: 'int', unique: true })
    externalId!: number;

    @Column({ type: 'varchar', length: 255 })
    title!: string;

    @Column({ type: 'text', nullable: true })
    description!: string | null;

    @Column({ type: 'decimal', precision: 10, scale: 2, transformer: decimalTransformer })
    price!: number;

    @Column({
        name: 'discount_percentage',
        type: 'decimal',
        precision: 5,
        scale: 2,
        default: 0,
        transformer: decimalTransformer,
    })
    discountPercentage!: number;

    @Column({
        name: 'final_price',
        type: 'decimal',
        precision: 10,
        scale: 2,
        transformer: decimalTransformer,
    })
    finalPrice!: number;

    @Column({ type: 'real', default: 0 })
    rating!: number;

    @Column({ type: 'int', default: 0 })
    stock!: number;

    @Column({ type: 'varchar', length: 100, nullable: true })
    brand!: string | null;

    @Column({ type: 'varchar', length: 64, nullable: true, unique: true })
    sku!: string | null;

    @Column({ name: 'availability_status', type: 'varchar', length: 20 })
    availabilityStatus!: AvailabilityStatus;

    @Column({ type: 'real', nullable: true })
    weight!: number | null;

    @Column({ name: 'warranty_information', type: 'varchar', length: 255, nullable: true })
    warrantyInformation!: string | null;

    @Column({ name: 'shipping_information', type: 'varchar', length: 255, nullable: true })
    shippingInformation!: string | null;

    @Column({ name: 'return_policy', type: 'varchar', length: 100, nullable: true })
    returnPolicy!: string | null;

    @Column({ name: 'minimum_order_quantity', type: 'int', default: 1 })
    minimumOrderQuantity!: number;

    @Column({ type: 'varchar', length: 500, nullable: true })
    thumbnail!: string | null;

    @Column({ type: 'varchar', length: 50, nullable: true })
    barcode!: string | null;

    @Column({ name: 'qr_code', type: 'varchar', length: 500, nullable: true })
    qrCode!: string | null;

    @ManyToMany(() => Category, (category) => category.products)
    @JoinTable({
        name: 'product_categories',
        joinColumn: { name: 'product_id', referencedColumnName: 'id' },
        inverseJoinColumn: { name: 'category_id', referencedColumnName: 'id' },
    })
    categories!: Category[];

    @OneToMany(() => ProductImage, (image) => image.product)
    images!: ProductImage[];

    @OneToMany(() => ProductTag, (tag) => tag.product)
    tags!: ProductTag[];

    @OneToMany(() => ProductReview, (review) => review.product)
    reviews!: ProductReview[];

    @OneToOne(() => ProductDimensions, (dimensions) => dimensions.product)
    dimensions!: ProductDimensions | null;

    @CreateDateColumn({ name: 'created_at' })
    createdAt!: Date;

    @UpdateDateColumn({ name: 'updated_at' })
    updatedAt!: Date;
}
