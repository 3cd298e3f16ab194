import { Type } from 'class-transformer';
import {
    IsArray,
    IsDateString,
    IsInt,
    IsNotEmpty,
    IsNumber,
    IsOptional,
    IsString,
    Max,
    MaxLength,
    Min,
    ValidateNested,
} from 'class-validator';

export class SourceDimensionsDto {
    @IsNumber()
    @Min(0)
    width!: number;

    @IsNumber()
    @Min(0)
    height!: number;

    @IsNumber()
    @Min(0)
    depth!: number;
}

export class SourceReviewDto {
    @IsInt()
    @Min(0)
    @Max(5)
    rating!: number;

    @IsOptional()
    @IsString()
    comment?: string;

    @IsOptional()
    @IsString()
    @MaxLength(100)
    reviewerName?: string;

    @IsOptional()
    @IsString()
    @MaxLength(255)
    reviewerEmail?: string;

    @IsOptional()
    @IsDateString()
    reviewedAt?: string;
}

export class SourceProductDto {
    @IsInt()
    @Min(1)
    externalId!: number;

    @IsString()
    @IsNotEmpty()
    @MaxLength(255)
    title!: string;

    @IsOptional()
    @IsString()
    description?: string;

    @IsNumber()
    @Min(0)
    price!: number;

    @IsOptional()
    @IsNumber()
    @Min(0)
    @Max(100)
    discountPercentage?: number;

    @IsOptional()
    @IsNumber()
    @Min(0)
    @Max(5)
    rating?: number;

    @IsInt()
    @Min(0)
    stock!: number;

    @IsOptional()
    @IsString()
    @MaxLength(100)
    brand?: string;

    @IsOptional()
    @IsString()
    @IsNotEmpty()
    @MaxLength(64)
    sku?: string;

    @IsOptional()
    @IsArray()
    @IsString({ each: true })
    @IsNotEmpty({ each: true })
    @MaxLength(100, { each: true })
    categories?: string[];

    @IsOptional()
    @IsArray()
    @IsString({ each: true })
    @MaxLength(50, { each: true })
    tags?: string[];

    @IsOptional()
    @IsArray()
    @IsString({ each: true })
    images?: string[];

    @IsOptional()
    @IsString()
    thumbnail?: string;

    @IsOptional()
    @IsNumber()
    @Min(0)
    weight?: number;

    @IsOptional()
    @IsString()
    @MaxLength(255)
    warrantyInformation?: string;

    @IsOptional()
    @IsString()
    @MaxLength(255)
    shippingInformation?: string;

    @IsOptional()
    @IsString()
    @MaxLength(100)
    returnPolicy?: string;

    @IsOptional()
    @IsInt()
    @Min(1)
    minimumOrderQuantity?: number;

    @IsOptional()
    @IsString()
    @MaxLength(50)
    barcode?: string;

    @IsOptional()
    @IsString()
    @MaxLength(500)
    qrCode?: string;

    @IsOptional()
    @ValidateNested()
    @Type(() => SourceDimensionsDto)
    dimensions?: SourceDimensionsDto;

    @IsOptional()
    @IsArray()
    @ValidateNested({ each: true })
    @Type(() => SourceReviewDto)
    reviews?: SourceReviewDto[];
}
