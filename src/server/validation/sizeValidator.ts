import { InvalidParamsError } from '../../types/index.js';
import { describeValue } from '../utils/errorConverter.js';

export interface SizeLimits {
  maxParameterBytes: number;
  maxResultBytes: number;
}

/**
 * UTF-8 byte length of the JSON encoding of `value`
 */
export function jsonByteLength(value: unknown): number {
  const json = JSON.stringify(value);
  return json === undefined ? 0 : Buffer.byteLength(json, 'utf8');
}

/**
 * Bounds the JSON size of call parameters and handler results
 */
export class SizeValidator {
  constructor(private readonly limits: SizeLimits) {}

  validateValueSize(value: unknown, limit: number, name: string): void {
    let size: number;
    try {
      size = jsonByteLength(value);
    } catch (error) {
      throw new InvalidParamsError(
        `Failed to validate ${name} size: ${error instanceof Error ? error.message : describeValue(error)}`,
        { invalidFields: [name] }
      );
    }

    if (size > limit) {
      throw new InvalidParamsError(
        `${name} exceeds maximum size: ${size} bytes > ${limit} bytes`,
        { invalidFields: [name] }
      );
    }
  }

  validateParameters(params: unknown): void {
    this.validateValueSize(params, this.limits.maxParameterBytes, 'parameters');
  }

  validateResult(result: unknown): void {
    this.validateValueSize(result, this.limits.maxResultBytes, 'result');
  }
}
