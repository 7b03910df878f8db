import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validate } from 'class-validator';
import { Result, fail, ok } from '../result';

function collectMessages(errors: ValidationError[]): string[] {
  return errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}),
    ...collectMessages(error.children ?? []),
  ]);
}

/**
 * Same transform + validate pass the HTTP ValidationPipe performs, returned as
 * a Result so services can validate plain input themselves.
 */
export async function validateDto<T extends object>(
  dtoClass: ClassConstructor<T>,
  input: object,
): Promise<Result<T>> {
  const dto = plainToInstance(dtoClass, input, {
    enableImplicitConversion: true,
  });
  const errors = await validate(dto, {
    whitelist: true,
    validationError: { target: false },
  });

  if (errors.length > 0) {
    return fail('ValidationError', collectMessages(errors).join('; '));
  }
  return ok(dto);
}
