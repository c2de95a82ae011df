import { INestApplication } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { HttpExceptionFilter } from '../src/common/filters/http-exception.filter';
import { ValidationPipe } from '../src/common/pipes/validation.pipe';

const drillTool = { spindleSpeed: 1200, feedRate: 10, plungeRate: 5, peckingDepth: 0.05, toolDiameter: 0.125 };

describe('G-code (e2e)', () => {
  let app: INestApplication;

  beforeEach(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    app = moduleFixture.createNestApplication({ logger: false });
    app.useGlobalPipes(new ValidationPipe());
    app.useGlobalFilters(new HttpExceptionFilter());

    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('/gcode/validate (POST)', () => {
    it('reports bounds errors with a 200', async () => {
      const response = await request(app.getHttpServer())
        .post('/gcode/validate')
        .send({ operations: [{ kind: 'drill-single', id: 'd1', x: 1, y: 1 }], bounds: { maxX: 0.5, maxY: 10 } })
        .expect(200);

      expect(response.body.valid).toBe(false);
      expect(response.body.errors).toEqual(['operations[0]: Drill point (1, 1) exceeds machine bounds']);
    });

    it('rejects unknown operation kinds', async () => {
      const response = await request(app.getHttpServer())
        .post('/gcode/validate')
        .send({ operations: [{ kind: 'slot', id: 's1' }] })
        .expect(400);

      expect(response.body.message).toBe('Validation failed');
      expect(response.body.errors).toContain(
        'operations.0.kind: Operation kind must be one of: drill-single, drill-linear, drill-grid, circle-single, circle-linear, hexagon-single, hexagon-linear, line-path',
      );
    });
  });

  describe('/gcode/generate (POST)', () => {
    it('generates a drill program', async () => {
      const response = await request(app.getHttpServer())
        .post('/gcode/generate')
        .send({
          projectName: 'Test Job',
          operations: [{ kind: 'drill-single', id: 'd1', x: 1, y: 2 }],
          material: { form: 'sheet', thickness: 0.125 },
          drillTool,
          settings: { supportsSubroutines: false },
        })
        .expect(200);

      expect(response.body.projectName).toBe('Test_Job');
      expect(response.body.subroutines).toEqual([]);
      const lines: string[] = response.body.mainProgram.split('\n');
      expect(lines[0]).toBe('G20 G90');
      expect(lines).toContain('G00 X1.0000 Y2.0000 Z0.2500');
      expect(lines[lines.length - 1]).toBe('M30');
    });

    it('rejects drills without tool parameters', async () => {
      const response = await request(app.getHttpServer())
        .post('/gcode/generate')
        .send({
          projectName: 'Test Job',
          operations: [{ kind: 'drill-single', id: 'd1', x: 1, y: 2 }],
          material: { form: 'sheet', thickness: 0.125 },
        })
        .expect(400);

      expect(response.body.code).toBe('VALIDATION_ERROR');
      expect(response.body.errors).toEqual(['Drill operations need drill tool parameters']);
    });

    it('rejects empty body', async () => {
      await request(app.getHttpServer()).post('/gcode/generate').send().expect(400);
    });
  });

  describe('/gcode/preview (POST)', () => {
    it('returns svg', async () => {
      const response = await request(app.getHttpServer())
        .post('/gcode/preview?mode=off')
        .send({
          projectName: 'Test Job',
          operations: [{ kind: 'drill-single', id: 'd1', x: 1, y: 2 }],
          material: { form: 'sheet', thickness: 0.125 },
        })
        .expect(200)
        .expect('Content-Type', /image\/svg\+xml/);

      expect(response.text.startsWith('<svg xmlns="http://www.w3.org/2000/svg"')).toBe(true);
      expect(response.text).not.toContain('(1.000, 2.000)');
    });

    it('rejects unknown modes', async () => {
      await request(app.getHttpServer())
        .post('/gcode/preview?mode=xray')
        .send({
          projectName: 'Test Job',
          operations: [],
          material: { form: 'sheet', thickness: 0.125 },
        })
        .expect(400);
    });
  });
});
