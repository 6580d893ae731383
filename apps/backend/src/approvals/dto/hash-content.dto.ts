import {
  IsDefined,
  isObject,
  isString,
  Validate,
  ValidatorConstraint,
  type ValidatorConstraintInterface,
} from 'class-validator';

@ValidatorConstraint({ name: 'isStringOrObject' })
class IsStringOrObject implements ValidatorConstraintInterface {
  validate(value: unknown): boolean {
    return isString(value) || isObject(value);
  }

  defaultMessage(): string {
    return '$property must be a string or a JSON object';
  }
}

export class HashContentDto {
  @IsDefined()
  @Validate(IsStringOrObject)
  content!: string | Record<string, unknown>;
}
