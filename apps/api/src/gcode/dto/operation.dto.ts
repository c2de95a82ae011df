import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsIn,
  IsNumber,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';
import {
  OPERATION_KINDS,
  type Axis,
  type CompensationMode,
  type LeadInType,
  type OperationKind,
} from '@toolpath/shared';
import { PATH_POINT_SUBTYPES, PathPointBaseDto, PointDto, type PathPointDto } from './geometry.dto';

const AXES: readonly Axis[] = ['x', 'y'];
const COMPENSATION_MODES: readonly CompensationMode[] = ['none', 'interior', 'exterior'];
const LEAD_IN_TYPES: readonly LeadInType[] = ['helical', 'ramp', 'none'];

export class LeadInBaseDto {
  @IsIn(['auto', 'manual'], { message: 'Lead-in mode must be auto or manual' })
  mode!: 'auto' | 'manual';
}

export class AutoLeadInDto extends LeadInBaseDto {
  declare mode: 'auto';
}

export class ManualLeadInDto extends LeadInBaseDto {
  declare mode: 'manual';

  @IsIn(LEAD_IN_TYPES)
  type!: LeadInType;

  @IsNumber()
  approachAngle!: number;
}

export type LeadInDto = AutoLeadInDto | ManualLeadInDto;

/**
 * Fields every operation carries. `kind` picks the concrete DTO when the
 * payload is transformed.
 */
export class OperationBaseDto {
  @IsIn(OPERATION_KINDS, { message: `Operation kind must be one of: ${OPERATION_KINDS.join(', ')}` })
  kind!: OperationKind;

  @IsString()
  id!: string;
}

export class DrillSingleOperationDto extends OperationBaseDto {
  declare kind: 'drill-single';

  @IsNumber()
  x!: number;

  @IsNumber()
  y!: number;
}

export class DrillLinearOperationDto extends OperationBaseDto {
  declare kind: 'drill-linear';

  @ValidateNested()
  @Type(() => PointDto)
  start!: PointDto;

  @IsIn(AXES)
  axis!: Axis;

  @IsNumber()
  spacing!: number;

  @IsNumber()
  count!: number;
}

export class DrillGridOperationDto extends OperationBaseDto {
  declare kind: 'drill-grid';

  @ValidateNested()
  @Type(() => PointDto)
  start!: PointDto;

  @IsNumber()
  xSpacing!: number;

  @IsNumber()
  ySpacing!: number;

  @IsNumber()
  xCount!: number;

  @IsNumber()
  yCount!: number;
}

/** Options shared by circles, hexagons and line paths. */
export class ProfileOperationDto extends OperationBaseDto {
  @IsIn(COMPENSATION_MODES)
  compensation!: CompensationMode;

  @ValidateNested()
  @Type(() => LeadInBaseDto, {
    discriminator: {
      property: 'mode',
      subTypes: [
        { value: AutoLeadInDto, name: 'auto' },
        { value: ManualLeadInDto, name: 'manual' },
      ],
    },
    keepDiscriminatorProperty: true,
  })
  leadIn!: LeadInDto;

  @IsNumber()
  @Min(0, { message: 'Hold time must be non-negative' })
  holdTime!: number;
}

export class CircleSingleOperationDto extends ProfileOperationDto {
  declare kind: 'circle-single';

  @ValidateNested()
  @Type(() => PointDto)
  center!: PointDto;

  @IsNumber()
  diameter!: number;
}

export class CircleLinearOperationDto extends ProfileOperationDto {
  declare kind: 'circle-linear';

  @ValidateNested()
  @Type(() => PointDto)
  start!: PointDto;

  @IsIn(AXES)
  axis!: Axis;

  @IsNumber()
  spacing!: number;

  @IsNumber()
  count!: number;

  @IsNumber()
  diameter!: number;
}

export class HexagonSingleOperationDto extends ProfileOperationDto {
  declare kind: 'hexagon-single';

  @ValidateNested()
  @Type(() => PointDto)
  center!: PointDto;

  @IsNumber()
  flatToFlat!: number;
}

export class HexagonLinearOperationDto extends ProfileOperationDto {
  declare kind: 'hexagon-linear';

  @ValidateNested()
  @Type(() => PointDto)
  start!: PointDto;

  @IsIn(AXES)
  axis!: Axis;

  @IsNumber()
  spacing!: number;

  @IsNumber()
  count!: number;

  @IsNumber()
  flatToFlat!: number;
}

export class LinePathOperationDto extends ProfileOperationDto {
  declare kind: 'line-path';

  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => PathPointBaseDto, {
    discriminator: { property: 'kind', subTypes: PATH_POINT_SUBTYPES },
    keepDiscriminatorProperty: true,
  })
  points!: PathPointDto[];
}

export type OperationDto =
  | DrillSingleOperationDto
  | DrillLinearOperationDto
  | DrillGridOperationDto
  | CircleSingleOperationDto
  | CircleLinearOperationDto
  | HexagonSingleOperationDto
  | HexagonLinearOperationDto
  | LinePathOperationDto;

/** Decorator options for a list of operations keyed by `kind`. */
export const OPERATION_TYPE_OPTIONS = {
  discriminator: {
    property: 'kind',
    subTypes: [
      { value: DrillSingleOperationDto, name: 'drill-single' },
      { value: DrillLinearOperationDto, name: 'drill-linear' },
      { value: DrillGridOperationDto, name: 'drill-grid' },
      { value: CircleSingleOperationDto, name: 'circle-single' },
      { value: CircleLinearOperationDto, name: 'circle-linear' },
      { value: HexagonSingleOperationDto, name: 'hexagon-single' },
      { value: HexagonLinearOperationDto, name: 'hexagon-linear' },
      { value: LinePathOperationDto, name: 'line-path' },
    ],
  },
  keepDiscriminatorProperty: true,
};
