import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsIn,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { PREVIEW_MODES, type PreviewMode } from '@toolpath/preview';
import type { LeadInType } from '@toolpath/shared';
import { BoundsDto } from './geometry.dto';
import { OPERATION_TYPE_OPTIONS, OperationBaseDto, type OperationDto } from './operation.dto';

const LEAD_IN_TYPES: readonly LeadInType[] = ['helical', 'ramp', 'none'];

export class MaterialBaseDto {
  @IsIn(['sheet', 'tube'], { message: 'Material form must be sheet or tube' })
  form!: 'sheet' | 'tube';
}

export class SheetMaterialDto extends MaterialBaseDto {
  declare form: 'sheet';

  @IsNumber()
  @Min(0, { message: 'Thickness must be non-negative' })
  thickness!: number;
}

export class TubeMaterialDto extends MaterialBaseDto {
  declare form: 'tube';

  @IsNumber()
  outerWidth!: number;

  @IsNumber()
  outerHeight!: number;

  @IsNumber()
  @Min(0, { message: 'Wall thickness must be non-negative' })
  wallThickness!: number;
}

export type MaterialDto = SheetMaterialDto | TubeMaterialDto;

export class DrillToolDto {
  @IsNumber()
  spindleSpeed!: number;

  @IsNumber()
  feedRate!: number;

  @IsNumber()
  plungeRate!: number;

  @IsNumber()
  peckingDepth!: number;

  @IsNumber()
  toolDiameter!: number;

  @IsOptional()
  @IsNumber()
  tipCompensation?: number;
}

export class CutToolDto {
  @IsNumber()
  spindleSpeed!: number;

  @IsNumber()
  feedRate!: number;

  @IsNumber()
  plungeRate!: number;

  @IsNumber()
  passDepth!: number;

  @IsNumber()
  toolDiameter!: number;
}

export class LeadInDefaultsDto {
  @IsIn(LEAD_IN_TYPES)
  circle!: LeadInType;

  @IsIn(LEAD_IN_TYPES)
  hexagon!: LeadInType;

  @IsIn(LEAD_IN_TYPES)
  line!: LeadInType;
}

/**
 * Per-request overrides of the machine and general settings. The base path
 * for subroutine calls is server configuration and cannot be overridden.
 */
export class GenerationSettingsDto {
  @IsOptional()
  @IsNumber()
  safetyHeight?: number;

  @IsOptional()
  @IsNumber()
  travelHeight?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  spindleWarmupSeconds?: number;

  @IsOptional()
  @IsNumber()
  leadInDistance?: number;

  @IsOptional()
  @IsNumber()
  rampAngle?: number;

  @IsOptional()
  @IsNumber()
  helixPitch?: number;

  @IsOptional()
  @IsNumber()
  maxStepdownFactor?: number;

  @IsOptional()
  @IsNumber()
  firstPassFeedFactor?: number;

  @IsOptional()
  @IsNumber()
  cornerFeedFactor?: number;

  @IsOptional()
  @IsNumber()
  arcFeedFactor?: number;

  @IsOptional()
  @IsBoolean()
  cornerSlowdownEnabled?: boolean;

  @IsOptional()
  @IsBoolean()
  arcSlowdownEnabled?: boolean;

  @IsOptional()
  @IsBoolean()
  supportsSubroutines?: boolean;

  @IsOptional()
  @ValidateNested()
  @Type(() => BoundsDto)
  bounds?: BoundsDto;

  @IsOptional()
  @IsBoolean()
  allowNegativeCoordinates?: boolean;

  @IsOptional()
  @IsNumber()
  @Min(0)
  cutThroughBuffer?: number;

  @IsOptional()
  @ValidateNested()
  @Type(() => LeadInDefaultsDto)
  leadInDefaults?: LeadInDefaultsDto;
}

/**
 * Payload for generate, export and preview.
 */
export class GenerateRequestDto {
  @IsString()
  @IsNotEmpty({ message: 'Project name is required' })
  @MaxLength(200)
  projectName!: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => OperationBaseDto, OPERATION_TYPE_OPTIONS)
  operations!: OperationDto[];

  @ValidateNested()
  @Type(() => MaterialBaseDto, {
    discriminator: {
      property: 'form',
      subTypes: [
        { value: SheetMaterialDto, name: 'sheet' },
        { value: TubeMaterialDto, name: 'tube' },
      ],
    },
    keepDiscriminatorProperty: true,
  })
  material!: MaterialDto;

  @IsOptional()
  @ValidateNested()
  @Type(() => DrillToolDto)
  drillTool?: DrillToolDto;

  @IsOptional()
  @ValidateNested()
  @Type(() => CutToolDto)
  cutTool?: CutToolDto;

  @IsOptional()
  @IsBoolean()
  skipTubeVoid?: boolean;

  @IsOptional()
  @ValidateNested()
  @Type(() => GenerationSettingsDto)
  settings?: GenerationSettingsDto;
}

/**
 * Payload for the standalone bounds and geometry check.
 */
export class ValidateRequestDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => OperationBaseDto, OPERATION_TYPE_OPTIONS)
  operations!: OperationDto[];

  @IsOptional()
  @ValidateNested()
  @Type(() => BoundsDto)
  bounds?: BoundsDto;

  @IsOptional()
  @IsBoolean()
  allowNegativeCoordinates?: boolean;

  @IsOptional()
  @IsNumber()
  toolDiameter?: number;
}

export class PreviewQueryDto {
  @IsOptional()
  @IsIn(PREVIEW_MODES, { message: `Preview mode must be one of: ${PREVIEW_MODES.join(', ')}` })
  mode?: PreviewMode;
}
