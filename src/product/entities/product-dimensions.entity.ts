import { Column, Entity, JoinColumn, OneToOne, PrimaryGeneratedColumn } from 'typeorm';
import { Product } from './product.entity';

@Entity('product_dimensions')
export class ProductDimensions {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ name: 'product_id', type: 'int', unique: true })
    productId!: number;

    @OneToOne(() => Product, (product) => product.dimensions, { onDelete: 'CASCADE' })
    @JoinColumn({ name: 'product_id' })
    product!: Product;

    @Column({ type: 'real' })
    width!: number;

    @Column({ type: 'real' })
    height!: number;

    @Column({ type: 'real' })
    depth!: number;
}
