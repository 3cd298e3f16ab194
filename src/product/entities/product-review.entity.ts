import {
    Column,
    Entity,
    Index,
    JoinColumn,
    ManyToOne,
    PrimaryGeneratedColumn,
} from 'typeorm';
import { Product } from './product.entity';

@Entity('product_reviews')
@Index(['productId', 'rating'])
export class ProductReview {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ name: 'product_id', type: 'int' })
    productId!: number;

    @ManyToOne(() => Product, (product) => product.reviews, { onDelete: 'CASCADE' })
    @JoinColumn({ name: 'product_id' })
    product!: Product;

    @Column({ type: 'int' })
    rating!: number;

    @Column({ type: 'text', nullable: true })
    comment!: string | null;

    @Column({ name: 'reviewer_name', type: 'varchar', length: 100, nullable: true })
    reviewerName!: string | null;

    @Column({ name: 'reviewer_email', type: 'varchar', length: 255, nullable: true })
    reviewerEmail!: string | null;

    @Column({ name: 'reviewed_at', type: Date, nullable: true })
    reviewedAt!: Date | null;
}
