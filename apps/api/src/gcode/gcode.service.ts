import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'node:path';
import { materialDepth, planPasses } from '@toolpath/geometry';
import { renderPreview, sceneToSvg, type LeadInMarker, type PreviewMode } from '@toolpath/preview';
import { errorsOf, operationIssues } from '@toolpath/rules';
import { formatConfig, generateProgram, sanitizeProjectName } from '@toolpath/serializer';
import {
  ValidationError,
  createGenerationSettings,
  isToolpathError,
  type GenerationResult,
  type GenerationSettings,
  type MachineBounds,
} from '@toolpath/shared';
import { buildCutPaths, prepareGeometry, resolveLeadInDistance } from '@toolpath/toolpath';
import type { GenerateRequestDto, GenerationSettingsDto, ValidateRequestDto } from './dto/request.dto';
import type { ExportResultDto, GenerationResponseDto, ValidationResultDto } from './dto/response.dto';
import { OutputWriter } from './output.writer';

/**
 * Runs the toolpath engine for HTTP callers and maps engine failures to 400s.
 */
@Injectable()
export class GcodeService {
  private readonly logger = new Logger(GcodeService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly outputWriter: OutputWriter,
  ) {}

  machineBounds(): MachineBounds {
    return {
      maxX: this.configService.get<number>('machineMaxX', 15),
      maxY: this.configService.get<number>('machineMaxY', 15),
    };
  }

  /**
   * Server defaults first, then whatever the request overrides.
   */
  resolveSettings(overrides: GenerationSettingsDto = {}): GenerationSettings {
    return createGenerationSettings({
      bounds: this.machineBounds(),
      supportsSubroutines: this.configService.get<boolean>('supportsSubroutines', true),
      basePath: this.configService.get<string>('gcodeBasePath', 'C:\\Mach3\\GCode'),
      ...overrides,
    });
  }

  validate(request: ValidateRequestDto): ValidationResultDto {
    const issues = operationIssues(request.operations, request.bounds ?? this.machineBounds(), {
      allowNegativeCoordinates: request.allowNegativeCoordinates,
      toolDiameter: request.toolDiameter,
    });
    const errors = errorsOf(issues);
    this.logger.debug(`Validated ${request.operations.length} operation(s): ${errors.length} error(s)`);
    return { valid: errors.length === 0, errors, issues };
  }

  generate(request: GenerateRequestDto): GenerationResponseDto {
    const projectName = this.projectDirectory(request.projectName);
    const result = this.generateWith(request, this.resolveSettings(request.settings));
    return { projectName, ...result };
  }

  /**
   * Generates the package and writes `main.tap`, one `{number}.nc` per
   * subroutine and `config.txt` under the configured output directory.
   */
  async exportPackage(request: GenerateRequestDto): Promise<ExportResultDto> {
    const projectName = this.projectDirectory(request.projectName);
    const settings = this.resolveSettings(request.settings);
    const result = this.generateWith(request, settings);
    const directory = path.resolve(this.configService.get<string>('gcodeOutputDir', 'output'), projectName);

    const files = await this.outputWriter.write(directory, [
      { name: 'main.tap', content: result.mainProgram },
      ...result.subroutines.map((sub) => ({ name: `${sub.number}.nc`, content: sub.content })),
      { name: 'config.txt', content: formatConfig(request, settings, projectName, new Date()) },
    ]);
    return { directory, files, warnings: result.warnings };
  }

  /**
   * SVG preview of the expanded, compensated geometry. Lead-in markers are
   * drawn when cut tool parameters are present.
   */
  preview(request: GenerateRequestDto, mode: PreviewMode = 'feature'): string {
    const settings = this.resolveSettings(request.settings);
    const { cutTool, drillTool, material } = request;

    return this.engine(() => {
      const geometry = prepareGeometry(request.operations, material, {
        cutToolDiameter: cutTool?.toolDiameter ?? 0,
        drillToolDiameter: drillTool?.toolDiameter ?? 0,
        skipTubeVoid: request.skipTubeVoid ?? false,
      });

      const leadIns: LeadInMarker[] = [];
      if (cutTool && cutTool.passDepth > 0) {
        const [firstPass] = planPasses(materialDepth(material) + settings.cutThroughBuffer, cutTool.passDepth);
        const context = { settings, tool: cutTool, leadInDistance: resolveLeadInDistance(settings, firstPass.step) };
        for (const { path: cut } of buildCutPaths(geometry, context)) {
          if (cut.entry.kind !== 'plunge') {
            leadIns.push({ entryPoint: cut.entryPoint, profileStart: cut.profileStart });
          }
        }
      }

      const scene = renderPreview(geometry, mode, { bounds: settings.bounds, material, leadIns });
      return sceneToSvg(scene);
    });
  }

  private generateWith(request: GenerateRequestDto, settings: GenerationSettings): GenerationResult {
    const result = this.engine(() => generateProgram(request, settings));
    this.logger.log(
      `Generated ${request.projectName}: ${result.subroutines.length} subroutine(s), ${result.warnings.length} warning(s)`,
    );
    return result;
  }

  private projectDirectory(projectName: string): string {
    const sanitized = sanitizeProjectName(projectName);
    if (sanitized === '') {
      throw new BadRequestException('Project name has no usable characters');
    }
    return sanitized;
  }

  private engine<T>(run: () => T): T {
    try {
      return run();
    } catch (error) {
      if (isToolpathError(error)) {
        this.logger.warn(`Rejected request: ${error.message}`);
        throw new BadRequestException({
          message: error.message,
          code: error.code,
          errors: error instanceof ValidationError ? error.messages : [error.message],
        });
      }
      throw error;
    }
  }
}
