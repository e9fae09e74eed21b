/**
 * Rule-based validation of operation inputs
 */

import { LedgerErrorCode } from '../utils/ErrorHandler';

export interface ValidationRule {
  field: string;
  type: 'string' | 'integer';
  min?: number;
  max?: number;
  pattern?: RegExp;
  /** Code reported when this field is rejected */
  errorCode: LedgerErrorCode;
}

export interface ValidationError {
  field: string;
  message: string;
  code: LedgerErrorCode;
}

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
}

export class InputValidator {
  static readonly PATTERNS = {
    ACCOUNT_ID: /^[A-Za-z0-9_.:-]{1,128}$/
  };

  static accountRule(field: string): ValidationRule {
    return { field, type: 'string', pattern: InputValidator.PATTERNS.ACCOUNT_ID, errorCode: 'INVALID_ACCOUNT' };
  }

  static unitsRule(field: string): ValidationRule {
    return { field, type: 'integer', min: 1, errorCode: 'INVALID_AMOUNT' };
  }

  static priceRule(field: string): ValidationRule {
    return { field, type: 'integer', min: 0, errorCode: 'INVALID_AMOUNT' };
  }

  /**
   * Validates input data against the given rules, reporting every failing field
   */
  validate(data: Record<string, unknown>, rules: ValidationRule[]): ValidationResult {
    const errors: ValidationError[] = [];

    for (const rule of rules) {
      const message = this.validateField(data[rule.field], rule);
      if (message) {
        errors.push({ field: rule.field, message, code: rule.errorCode });
      }
    }

    return {
      isValid: errors.length === 0,
      errors
    };
  }

  private validateField(value: unknown, rule: ValidationRule): string | null {
    switch (rule.type) {
      case 'string':
        if (typeof value !== 'string') {
          return `${rule.field} must be a string`;
        }
        if (rule.pattern && !rule.pattern.test(value)) {
          return `${rule.field} has an invalid format`;
        }
        return null;

      case 'integer':
        if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
          return `${rule.field} must be a safe integer`;
        }
        if (rule.min !== undefined && value < rule.min) {
          return `${rule.field} must be at least ${rule.min}`;
        }
        if (rule.max !== undefined && value > rule.max) {
          return `${rule.field} must be at most ${rule.max}`;
        }
        return null;
    }
  }
}
