import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { InputValidationError } from '../errors/assistant.errors';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function collectMessages(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((error) => {
    const path = prefix ? `${prefix}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) =>
      prefix ? `${prefix}.${message}` : message,
    );
    return [...own, ...collectMessages(error.children ?? [], path)];
  });
}

/**
 * Validates raw tool arguments (e.g. parsed JSON from a model) against a
 * class-validator DTO, the same way the ValidationPipe treats HTTP bodies.
 *
 * @throws InputValidationError listing every failed constraint
 */
export function validateArgs<T extends object>(cls: ClassConstructor<T>, raw: unknown): T {
  const plain = raw === undefined || raw === null ? {} : raw;
  if (!isRecord(plain)) {
    throw new InputValidationError('Tool arguments must be a JSON object');
  }

  const instance = plainToInstance(cls, plain);
  const errors = validateSync(instance, { whitelist: true, forbidNonWhitelisted: true });
  if (errors.length > 0) {
    throw new InputValidationError(collectMessages(errors).join('; '));
  }
  return instance;
}
