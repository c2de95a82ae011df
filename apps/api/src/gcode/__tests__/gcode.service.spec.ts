import { BadRequestException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { GenerateRequestDto } from '../dto/request.dto';
import { GcodeService } from '../gcode.service';
import { OutputWriter } from '../output.writer';

const drillTool = { spindleSpeed: 1200, feedRate: 10, plungeRate: 5, peckingDepth: 0.05, toolDiameter: 0.125 };
const cutTool = { spindleSpeed: 18000, feedRate: 40, plungeRate: 10, passDepth: 0.05, toolDiameter: 0.25 };

const drillJob = (): GenerateRequestDto => ({
  projectName: 'Bracket Plate',
  operations: [{ kind: 'drill-linear', id: 'row', start: { x: 1, y: 1 }, axis: 'x', spacing: 1, count: 3 }],
  material: { form: 'sheet', thickness: 0.125 },
  drillTool,
});

const circleJob = (): GenerateRequestDto => ({
  projectName: 'Ring',
  operations: [
    {
      kind: 'circle-single',
      id: 'hole',
      center: { x: 5, y: 5 },
      diameter: 2,
      compensation: 'interior',
      leadIn: { mode: 'auto' },
      holdTime: 0,
    },
  ],
  material: { form: 'sheet', thickness: 0.125 },
  cutTool,
});

describe('GcodeService', () => {
  let service: GcodeService;
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await mkdtemp(path.join(os.tmpdir(), 'gcode-export-'));
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        GcodeService,
        OutputWriter,
        {
          provide: ConfigService,
          useValue: new ConfigService({
            machineMaxX: 10,
            machineMaxY: 10,
            supportsSubroutines: true,
            gcodeBasePath: 'C:\\CNC',
            gcodeOutputDir: outputDir,
          }),
        },
      ],
    }).compile();

    service = module.get(GcodeService);
  });

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('resolveSettings', () => {
    it('starts from the configured machine', () => {
      const settings = service.resolveSettings();
      expect(settings.bounds).toEqual({ maxX: 10, maxY: 10 });
      expect(settings.basePath).toBe('C:\\CNC');
      expect(settings.supportsSubroutines).toBe(true);
    });

    it('applies request overrides on top', () => {
      const settings = service.resolveSettings({ cornerFeedFactor: 0.3, bounds: { maxX: 20, maxY: 12 } });
      expect(settings.cornerFeedFactor).toBe(0.3);
      expect(settings.bounds).toEqual({ maxX: 20, maxY: 12 });
      expect(settings.safetyHeight).toBe(0.5);
    });
  });

  describe('validate', () => {
    it('reports points beyond the machine', () => {
      const result = service.validate({ operations: [{ kind: 'drill-single', id: 'd1', x: 12, y: 1 }] });
      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(['operations[0]: Drill point (12, 1) exceeds machine bounds']);
      expect(result.issues[0]).toMatchObject({ code: 'OUT_OF_BOUNDS', severity: 'error', operationId: 'd1' });
    });

    it('accepts bounds from the request', () => {
      const result = service.validate({
        operations: [{ kind: 'drill-single', id: 'd1', x: 12, y: 1 }],
        bounds: { maxX: 24, maxY: 24 },
      });
      expect(result).toEqual({ valid: true, errors: [], issues: [] });
    });
  });

  describe('generate', () => {
    it('returns the sanitized project name with the programs', () => {
      const result = service.generate(drillJob());
      expect(result.projectName).toBe('Bracket_Plate');
      expect(result.mainProgram.split('\n')).toContain('M98 (-C:\\CNC\\Bracket_Plate\\1000.nc) L3');
      expect(result.subroutines.map((sub) => sub.number)).toEqual([1000]);
      expect(result.warnings).toEqual([]);
    });

    it('turns engine rejections into bad requests', () => {
      const job = drillJob();
      job.operations = [{ kind: 'drill-single', id: 'd1', x: 12, y: 1 }];
      try {
        service.generate(job);
        throw new Error('expected a rejection');
      } catch (error) {
        expect(error).toBeInstanceOf(BadRequestException);
        if (error instanceof BadRequestException) {
          expect(error.getResponse()).toEqual({
            message: 'operations[0]: Drill point (12, 1) exceeds machine bounds',
            code: 'VALIDATION_ERROR',
            errors: ['operations[0]: Drill point (12, 1) exceeds machine bounds'],
          });
        }
      }
    });

    it('rejects project names with nothing usable', () => {
      const job = drillJob();
      job.projectName = '***';
      expect(() => service.generate(job)).toThrow('Project name has no usable characters');
    });
  });

  describe('exportPackage', () => {
    it('writes the main program, subroutines and config', async () => {
      const result = await service.exportPackage(drillJob());
      const directory = path.join(outputDir, 'Bracket_Plate');

      expect(result.directory).toBe(directory);
      expect(result.files).toEqual(['main.tap', '1000.nc', 'config.txt']);
      expect((await readdir(directory)).sort()).toEqual(['1000.nc', 'config.txt', 'main.tap']);

      const generated = service.generate(drillJob());
      expect(await readFile(path.join(directory, 'main.tap'), 'utf8')).toBe(generated.mainProgram);
      expect(await readFile(path.join(directory, '1000.nc'), 'utf8')).toBe(generated.subroutines[0].content);
      const config = await readFile(path.join(directory, 'config.txt'), 'utf8');
      expect(config.split('\n')).toContain('Name: Bracket_Plate');
    });
  });

  describe('preview', () => {
    it('renders nominal labels by default', () => {
      const svg = service.preview(circleJob());
      const lines = svg.split('\n');
      expect(lines[0]).toBe(
        '<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 540 540" width="540" height="540" style="background: #f8f9fa">',
      );
      expect(svg).toContain('>(5.000, 5.000) d=2.000</text>');
    });

    it('labels the compensated radius in toolpath mode', () => {
      expect(service.preview(circleJob(), 'toolpath')).toContain('>(5.000, 5.000) r=0.875</text>');
    });

    it('marks lead-ins when a cut tool is given', () => {
      expect(service.preview(circleJob(), 'off')).toContain('stroke="#ff8c00"');
      const job = circleJob();
      delete job.cutTool;
      expect(service.preview(job, 'off')).not.toContain('stroke="#ff8c00"');
    });
  });
});
