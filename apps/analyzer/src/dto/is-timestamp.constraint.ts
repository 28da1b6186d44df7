import {
  ValidatorConstraint,
  ValidatorConstraintInterface,
  ValidationArguments,
} from 'class-validator';

/**
 * Accepts a date string or epoch milliseconds that parse to a valid date
 */
@ValidatorConstraint({ name: 'isTimestamp', async: false })
export class IsTimestampConstraint implements ValidatorConstraintInterface {
  validate(value: unknown): boolean {
    if (typeof value !== 'string' && typeof value !== 'number') {
      return false;
    }
    return !isNaN(new Date(value).getTime());
  }

  defaultMessage(args: ValidationArguments): string {
    return `${args.property} must be a date string or epoch milliseconds`;
  }
}
