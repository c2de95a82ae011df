import {
  ArgumentMetadata,
  BadRequestException,
  Injectable,
  PipeTransform,
} from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';

const PRIMITIVES: unknown[] = [String, Boolean, Number, Array, Object];

/**
 * Validates incoming payloads using class-validator decorators applied to DTOs.
 * Messages name the failing property by its path, e.g. `operations.0.kind: …`.
 */
@Injectable()
export class ValidationPipe implements PipeTransform {
  async transform(value: unknown, { metatype, type }: ArgumentMetadata): Promise<unknown> {
    if (type === 'custom' || !metatype || PRIMITIVES.includes(metatype)) {
      return value;
    }

    const object: object = plainToInstance(metatype, value ?? {});
    const errors = await validate(object, {
      whitelist: true,
      forbidNonWhitelisted: true,
    });

    if (errors.length > 0) {
      throw new BadRequestException({
        message: 'Validation failed',
        errors: this.formatErrors(errors),
      });
    }

    return object;
  }

  private formatErrors(errors: ValidationError[], parent = ''): string[] {
    return errors.flatMap((error) => {
      const path = parent ? `${parent}.${error.property}` : error.property;
      const own = Object.values(error.constraints ?? {}).map((message) => `${path}: ${message}`);
      return [...own, ...this.formatErrors(error.children ?? [], path)];
    });
  }
}
