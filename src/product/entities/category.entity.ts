import {
    Column,
    CreateDateColumn,
    Entity,
    ManyToMany,
    PrimaryGeneratedColumn,
} from 'typeorm';
import { Product } from './product.entity';

@Entity('categories')
export class Category {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ type: 'varchar', length: 100, unique: true })
    name!: string;

    @Column({ type: 'varchar', length: 100, unique: true })
    slug!: string;

    @ManyToMany(() => Product, (product) => product.categories)
    products!: Product[];

    @CreateDateColumn({ name: 'created_at' })
    createdAt!: Date;
}
