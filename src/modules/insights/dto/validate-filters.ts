import { BadRequestException } from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';

/** Same contract as a global ValidationPipe with `transform`, `whitelist` and `forbidNonWhitelisted`. */
export function validateFilters<T extends object>(dto: ClassConstructor<T>, input: object = {}): T {
  const instance = plainToInstance(dto, input);
  const errors = validateSync(instance, { whitelist: true, forbidNonWhitelisted: true });
  if (errors.length) {
    throw new BadRequestException(errors.flatMap((error) => Object.values(error.constraints ?? {})));
  }
  return instance;
}
