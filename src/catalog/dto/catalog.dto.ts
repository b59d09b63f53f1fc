import { Transform } from 'class-transformer';
import { IsBoolean, IsInt, IsNotEmpty, IsOptional, IsString, IsUUID, Length, Matches, Max, Min } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class RegisterVariantDto {
  @ApiPropertyOptional({ format: 'uuid', description: 'Generated when omitted' })
  @IsOptional()
  @IsUUID()
  id?: string;

  @ApiPropertyOptional({ format: 'uuid', description: 'Defaults to the variant id' })
  @IsOptional()
  @IsUUID()
  productId?: string;

  @ApiProperty({ example: 'TEA-250G', maxLength: 50 })
  @IsString()
  @Length(1, 50)
  @Matches(/^[A-Z0-9\-_]*$/, { message: 'SKU must contain only uppercase letters, numbers, hyphens, and underscores' })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim().toUpperCase() : value))
  sku!: string;

  @ApiProperty({ example: 'Green tea 250g' })
  @IsString()
  @IsNotEmpty()
  @Length(2, 200)
  name!: string;

  @ApiProperty({ example: 10000, description: 'Minor units' })
  @IsInt()
  @Min(0)
  unitPrice!: number;

  @ApiProperty({ example: 1000, description: 'Basis points; 1000 = 10%' })
  @IsInt()
  @Min(0)
  @Max(100_000)
  taxRateBps!: number;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  isSet?: boolean;
}

export class ChangePriceDto {
  @ApiProperty({ example: 11000 })
  @IsInt()
  @Min(0)
  unitPrice!: number;

  @ApiPropertyOptional({ example: 1000 })
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(100_000)
  taxRateBps?: number;
}

export class RegisterPartyDto {
  @ApiPropertyOptional({ format: 'uuid', description: 'Generated when omitted' })
  @IsOptional()
  @IsUUID()
  id?: string;

  @ApiProperty({ example: 'Northwind Traders' })
  @IsString()
  @IsNotEmpty()
  @Length(2, 200)
  name!: string;
}
