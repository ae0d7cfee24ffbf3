import { ArgumentMetadata, Injectable, ValidationPipe } from '@nestjs/common';
import type { ValidationError as ClassValidatorError } from 'class-validator';
import { ValidationError } from '../errors';

/**
 * `ValidationPipe` that reports failures as a domain `ValidationError` and
 * only accepts a JSON object as a request body.
 */
@Injectable()
export class DomainValidationPipe extends ValidationPipe {
  constructor() {
    super({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      exceptionFactory: (errors: ClassValidatorError[]) =>
        new ValidationError(
          errors.map((error) => error.property),
          errors.flatMap((error) => Object.values(error.constraints ?? {}))
        )
    });
  }

  async transform(value: unknown, metadata: ArgumentMetadata): Promise<unknown> {
    // Arrays would otherwise be validated element by element and reported by index.
    if (metadata.type === 'body' && !isJsonObject(value)) {
      throw new ValidationError(['body'], ['request body must be a JSON object']);
    }
    return super.transform(value, metadata);
  }
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
