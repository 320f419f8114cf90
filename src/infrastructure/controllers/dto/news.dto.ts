import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
} from 'class-validator';

/** Categories NewsAPI accepts for top headlines. */
export const HEADLINE_CATEGORIES = [
  'business',
  'entertainment',
  'general',
  'health',
  'science',
  'sports',
  'technology',
] as const;

export class NewsSearchRequestDto {
  @ApiProperty({ example: 'renewable energy' })
  @IsString()
  @IsNotEmpty()
  query!: string;

  @ApiPropertyOptional({ minimum: 1, maximum: 100, default: 10 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  limit?: number;
}

export class NewsArticleDto {
  @ApiProperty() title!: string;
  @ApiProperty() url!: string;
  @ApiProperty() summary!: string;
  @ApiProperty() published_at!: string;
}

export class NewsSearchResponseDto {
  @ApiProperty({ type: [NewsArticleDto] })
  results!: NewsArticleDto[];
}

export class HeadlinesQueryDto {
  @ApiPropertyOptional({ default: 'us', description: 'ISO 3166-1 alpha-2 country code' })
  @IsOptional()
  @IsString()
  @Matches(/^[a-zA-Z]{2}$/, { message: 'country must be a two-letter code' })
  country?: string;

  @ApiPropertyOptional({ enum: HEADLINE_CATEGORIES, example: 'technology' })
  @IsOptional()
  @Transform(({ value }: { value: unknown }) =>
    typeof value === 'string' ? value.toLowerCase() : value,
  )
  @IsString()
  @IsIn(HEADLINE_CATEGORIES, {
    message: `category must be one of: ${HEADLINE_CATEGORIES.join(', ')}`,
  })
  category?: string;
}

export class HeadlineDto {
  @ApiProperty() id!: string;
  @ApiProperty() title!: string;
  @ApiProperty() url!: string;
  @ApiProperty() summary!: string;
  @ApiProperty() published_at!: string;
  @ApiProperty() source_name!: string;
  @ApiProperty() author!: string;
  @ApiPropertyOptional() image_url?: string;
}

export class HeadlinesResponseDto {
  @ApiProperty() country!: string;
  @ApiProperty({ nullable: true, type: String }) category!: string | null;
  @ApiProperty() date!: string;
  @ApiProperty() cached!: boolean;
  @ApiProperty({ type: [HeadlineDto] }) headlines!: HeadlineDto[];
}
