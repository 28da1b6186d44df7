import {
  ValidatorConstraint,
  ValidatorConstraintInterface,
  ValidationArguments,
} from 'class-validator';

/**
 * Accepts a finite number or a numeric string such as "-3.5"
 */
@ValidatorConstraint({ name: 'isTemperature', async: false })
export class IsTemperatureConstraint implements ValidatorConstraintInterface {
  validate(value: unknown): boolean {
    if (typeof value === 'number') {
      return Number.isFinite(value);
    }
    return typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value));
  }

  defaultMessage(args: ValidationArguments): string {
    return `${args.property} must be a finite number or numeric string`;
  }
}
