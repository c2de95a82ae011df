import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { GcodeController } from './gcode.controller';
import { GcodeService } from './gcode.service';
import { OutputWriter } from './output.writer';

/**
 * Nest module encapsulating validation, generation, export and preview.
 */
@Module({
  imports: [ConfigModule],
  controllers: [GcodeController],
  providers: [GcodeService, OutputWriter],
  exports: [GcodeService],
})
export class GcodeModule {}
