import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';

export const MAX_PER_PAGE = 100;

export class ListPlayersQueryDto {
  @ApiPropertyOptional({ description: 'Substring (case-insensitive) del nombre' })
  @IsOptional() @IsString() @MaxLength(100) name?: string;

  @ApiPropertyOptional({ example: 'Liverpool' })
  @IsOptional() @IsString() @MaxLength(100) team?: string;

  @ApiPropertyOptional({ example: 'Forward' })
  @IsOptional() @IsString() @MaxLength(50) position?: string;

  @ApiPropertyOptional({ default: 20, minimum: 1, maximum: MAX_PER_PAGE })
  @IsOptional() @Type(() => Number) @IsInt() @Min(1) @Max(MAX_PER_PAGE) limit?: number;

  @ApiPropertyOptional({ default: 0, minimum: 0 })
  @IsOptional() @Type(() => Number) @IsInt() @Min(0) offset?: number;
}

export class PaginatedPlayersQueryDto {
  @ApiPropertyOptional({ default: 1, minimum: 1 })
  @IsOptional() @Type(() => Number) @IsInt() @Min(1) page?: number;

  @ApiPropertyOptional({ default: 10, minimum: 1, maximum: MAX_PER_PAGE })
  @IsOptional() @Type(() => Number) @IsInt() @Min(1) @Max(MAX_PER_PAGE) per_page?: number;

  // Busca en nombre O equipo
  @ApiPropertyOptional({ example: 'Manchester' })
  @IsOptional() @IsString() @MaxLength(100) name?: string;
}

export class SearchPlayersQueryDto {
  // Trim antes de validar: "   " cuenta como vacío
  @ApiProperty({ example: 'Arsenal', description: 'Nombre o equipo' })
  @Transform(({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value))
  @IsString() @IsNotEmpty() @MaxLength(100) name!: string;
}

export interface PaginatedPlayers<P> {
  players: P[];
  total_items: number;
  total_pages: number;
  current_page: number;
  per_page: number;
}
