import {
  BadRequestException,
  HttpStatus,
  ValidationError,
  ValidationPipeOptions,
} from '@nestjs/common';

type ValidationErrorTree = { [property: string]: string | ValidationErrorTree };

function generateErrors(errors: ValidationError[]): ValidationErrorTree {
  return errors.reduce<ValidationErrorTree>(
    (accumulator, currentValue) => ({
      ...accumulator,
      [currentValue.property]:
        (currentValue.children?.length ?? 0) > 0
          ? generateErrors(currentValue.children ?? [])
          : Object.values(currentValue.constraints ?? {}).join(', '),
    }),
    {},
  );
}

const validationOptions: ValidationPipeOptions = {
  transform: true,
  whitelist: true,
  errorHttpStatusCode: HttpStatus.BAD_REQUEST,
  exceptionFactory: (errors: ValidationError[]) => {
    return new BadRequestException({
      error: 'InvalidInputError',
      kind: 'InvalidInput',
      message: 'Request validation failed',
      errors: generateErrors(errors),
    });
  },
};

export default validationOptions;
