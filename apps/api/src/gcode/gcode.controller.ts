import { Body, Controller, Header, HttpCode, HttpStatus, Logger, Post, Query } from '@nestjs/common';
import { GenerateRequestDto, PreviewQueryDto, ValidateRequestDto } from './dto/request.dto';
import type { ExportResultDto, GenerationResponseDto, ValidationResultDto } from './dto/response.dto';
import { GcodeService } from './gcode.service';

/**
 * HTTP endpoints for checking operations and producing G-code packages.
 */
@Controller('gcode')
export class GcodeController {
  private readonly logger = new Logger(GcodeController.name);

  constructor(private readonly gcodeService: GcodeService) {}

  /**
   * POST /gcode/validate
   * Reports blocking problems and warnings without generating anything.
   */
  @Post('validate')
  @HttpCode(HttpStatus.OK)
  validate(@Body() body: ValidateRequestDto): ValidationResultDto {
    return this.gcodeService.validate(body);
  }

  /**
   * POST /gcode/generate
   * Returns the main program and subroutine texts.
   */
  @Post('generate')
  @HttpCode(HttpStatus.OK)
  generate(@Body() body: GenerateRequestDto): GenerationResponseDto {
    this.logger.log(`Received generate request for ${body.projectName} with ${body.operations.length} operations`);
    return this.gcodeService.generate(body);
  }

  /**
   * POST /gcode/export
   * Writes the package to the output directory.
   */
  @Post('export')
  @HttpCode(HttpStatus.OK)
  async exportPackage(@Body() body: GenerateRequestDto): Promise<ExportResultDto> {
    this.logger.log(`Received export request for ${body.projectName}`);
    const result = await this.gcodeService.exportPackage(body);
    this.logger.log(`Export completed: ${result.files.length} file(s) in ${result.directory}`);
    return result;
  }

  @Post('preview')
  @HttpCode(HttpStatus.OK)
  @Header('Content-Type', 'image/svg+xml; charset=utf-8')
  preview(@Body() body: GenerateRequestDto, @Query() query: PreviewQueryDto): string {
    return this.gcodeService.preview(body, query.mode);
  }
}
