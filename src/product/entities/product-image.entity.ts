import { Column, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { Product } from './product.entity';

@Entity('product_images')
export class ProductImage {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ name: 'product_id', type: 'int' })
    productId!: number;

    @ManyToOne(() => Product, (product) => product.images, { onDelete: 'CASCADE' })
    @JoinColumn({ name: 'product_id' })
    product!: Product;

    @Column({ type: 'varchar', length: 500 })
    url!: string;

    @Column({ type: 'int', default: 0 })
    position!: number;

    @Column({ name: 'is_thumbnail', type: 'boolean', default: false })
    isThumbnail!: boolean;
}
