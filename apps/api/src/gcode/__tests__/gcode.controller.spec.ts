import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import type { GenerateRequestDto } from '../dto/request.dto';
import { GcodeController } from '../gcode.controller';
import { GcodeService } from '../gcode.service';
import { OutputWriter } from '../output.writer';

describe('GcodeController', () => {
  let controller: GcodeController;
  let service: GcodeService;

  const job: GenerateRequestDto = {
    projectName: 'Panel',
    operations: [{ kind: 'drill-single', id: 'd1', x: 1, y: 1 }],
    material: { form: 'sheet', thickness: 0.125 },
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [GcodeController],
      providers: [GcodeService, OutputWriter, { provide: ConfigService, useValue: new ConfigService({}) }],
    }).compile();

    controller = module.get(GcodeController);
    service = module.get(GcodeService);
  });

  it('should be defined', () => {
    expect(controller).toBeDefined();
  });

  it('delegates validation to the service', () => {
    const verdict = { valid: true, errors: [], issues: [] };
    jest.spyOn(service, 'validate').mockReturnValue(verdict);

    expect(controller.validate({ operations: job.operations })).toBe(verdict);
    expect(service.validate).toHaveBeenCalledWith({ operations: job.operations });
  });

  it('returns generated programs', () => {
    const generated = { projectName: 'Panel', mainProgram: 'G20 G90', subroutines: [], warnings: [] };
    jest.spyOn(service, 'generate').mockReturnValue(generated);

    expect(controller.generate(job)).toBe(generated);
    expect(service.generate).toHaveBeenCalledWith(job);
  });

  it('awaits the export', async () => {
    const exported = { directory: '/tmp/Panel', files: ['main.tap', 'config.txt'], warnings: [] };
    jest.spyOn(service, 'exportPackage').mockResolvedValue(exported);

    await expect(controller.exportPackage(job)).resolves.toBe(exported);
  });

  it('passes the preview mode through', () => {
    jest.spyOn(service, 'preview').mockReturnValue('<svg/>');

    expect(controller.preview(job, { mode: 'toolpath' })).toBe('<svg/>');
    expect(service.preview).toHaveBeenCalledWith(job, 'toolpath');
  });
});
