import { Type } from 'class-transformer';
import { IsIn, IsNumber, IsOptional, ValidateNested } from 'class-validator';
import type { ArcDirection } from '@toolpath/shared';

export class PointDto {
  @IsNumber()
  x!: number;

  @IsNumber()
  y!: number;
}

export class BoundsDto {
  @IsNumber()
  maxX!: number;

  @IsNumber()
  maxY!: number;
}

const PATH_POINT_KINDS = ['start', 'straight', 'arc'] as const;

/**
 * Common shape of line path points; `kind` selects the concrete class.
 */
export class PathPointBaseDto {
  @IsIn(PATH_POINT_KINDS, { message: `Path point kind must be one of: ${PATH_POINT_KINDS.join(', ')}` })
  kind!: (typeof PATH_POINT_KINDS)[number];

  @IsNumber()
  x!: number;

  @IsNumber()
  y!: number;
}

export class StartPointDto extends PathPointBaseDto {
  declare kind: 'start';
}

export class StraightPointDto extends PathPointBaseDto {
  declare kind: 'straight';
}

export class ArcPointDto extends PathPointBaseDto {
  declare kind: 'arc';

  @ValidateNested()
  @Type(() => PointDto)
  center!: PointDto;

  @IsOptional()
  @IsIn(['cw', 'ccw'])
  direction?: ArcDirection;
}

export type PathPointDto = StartPointDto | StraightPointDto | ArcPointDto;

export const PATH_POINT_SUBTYPES = [
  { value: StartPointDto, name: 'start' },
  { value: StraightPointDto, name: 'straight' },
  { value: ArcPointDto, name: 'arc' },
];
