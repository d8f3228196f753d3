import { HttpException, HttpStatus, PipeTransform } from '@nestjs/common';
import type { ZodIssue, ZodType, ZodTypeDef } from 'zod';

export interface ValidationIssue {
  loc: (string | number)[];
  msg: string;
  type: string;
}

export function toValidationIssues(issues: ZodIssue[], root: (string | number)[] = ['body']): ValidationIssue[] {
  return issues.map((issue) => ({
    loc: [...root, ...issue.path],
    msg: issue.message,
    type: issue.code,
  }));
}

/** Parses a request part against a zod schema; mismatches become 422. */
export class ZodValidationPipe<T> implements PipeTransform<unknown, T> {
  constructor(private readonly schema: ZodType<T, ZodTypeDef, unknown>) {}

  transform(value: unknown): T {
    const parsed = this.schema.safeParse(value);
    if (!parsed.success) {
      throw new HttpException(
        { detail: toValidationIssues(parsed.error.issues) },
        HttpStatus.UNPROCESSABLE_ENTITY,
      );
    }
    return parsed.data;
  }
}
