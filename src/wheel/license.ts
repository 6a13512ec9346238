import parseSpdxExpression from 'spdx-expression-parse';
import { WheelError } from '../errors.js';

/** Decides whether a license expression may be written to METADATA. */
export type LicenseExpressionValidator = {
  validate(expression: string): boolean;
};

/** Accepts SPDX license expressions such as `MIT OR Apache-2.0`. */
export const spdxLicenseValidator: LicenseExpressionValidator = {
  validate(expression) {
    try {
      parseSpdxExpression(expression);
      return true;
    } catch {
      return false;
    }
  }
};

/** @throws WheelError `WHEEL_INVALID_LICENSE` */
export function assertLicenseExpression(
  expression: string,
  validator: LicenseExpressionValidator = spdxLicenseValidator
): string {
  const trimmed = expression.trim();
  if (trimmed.length === 0 || !validator.validate(trimmed)) {
    throw new WheelError('WHEEL_INVALID_LICENSE', `Invalid license expression ${JSON.stringify(expression)}`, {
      context: { expression }
    });
  }
  return trimmed;
}
