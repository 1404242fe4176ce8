import { z } from 'zod';

function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  return JSON.stringify(value) ?? String(value);
}

function missing(field: string): string {
  return `${field} argument missing in arguments`;
}

export function requiredString(field: string) {
  return z.string({
    required_error: missing(field),
    invalid_type_error: `Invalid ${field}: expected a string`
  });
}

export function requiredStringArray(field: string) {
  return z.array(
    z.string({
      invalid_type_error: `Invalid ${field}: every entry must be a string`
    }),
    {
      required_error: missing(field),
      invalid_type_error: `Invalid ${field}: expected an array of strings`
    }
  );
}

export function requiredObject(field: string) {
  return z.record(z.string(), z.unknown(), {
    required_error: missing(field),
    invalid_type_error: `Invalid ${field}: expected an object`
  });
}

/**
 * Params for `z.enum` reporting a missing field or the valid choices.
 */
export function enumParams(field: string, values: readonly string[]) {
  return {
    errorMap: (_issue: z.ZodIssueOptionalMessage, ctx: z.ErrorMapCtx) => ({
      message:
        ctx.data === undefined
          ? missing(field)
          : `Invalid ${field}: ${formatValue(ctx.data)}. Must be one of: ${values.join(', ')}`
    })
  };
}

/**
 * A whole number >= 1, optionally capped. No coercion from strings.
 */
export function positiveInteger(field: string, max?: number) {
  const schema = z
    .number({
      errorMap: (issue, ctx) => ({
        message:
          issue.code === z.ZodIssueCode.too_big
            ? `Invalid ${field}: ${formatValue(ctx.data)}. Must be at most ${max}`
            : `Invalid ${field}: ${formatValue(ctx.data)}. Must be a positive integer`
      })
    })
    .int()
    .min(1);
  return max === undefined ? schema : schema.max(max);
}

export function strictBoolean(field: string) {
  return z.boolean({
    errorMap: (_issue, ctx) => ({
      message: `Invalid ${field}: ${formatValue(ctx.data)}. Must be a boolean`
    })
  });
}
