import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'EnvConfigError';
  }
}

function formatIssue(path: (string | number)[], message: string): string {
  const location = path.length > 0 ? path.join('.') : '<root>';
  return `${location}: ${message}`;
}

export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'aquifer';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => formatIssue(issue.path, issue.message));
    const details = issues.map((issue) => `  - ${issue}`).join('\n');
    throw new EnvConfigError(`[${context}] Invalid environment configuration\n${details}`, issues);
  }

  return result.data;
}

type CommonOptions<T> = {
  required?: boolean;
  defaultValue?: T;
  description?: string;
};

function describeVariable(ctx: z.RefinementCtx, description?: string): string {
  if (description) {
    return description;
  }
  const name = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
  return name === undefined ? 'value' : String(name);
}

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

/**
 * Applies the default / required rules for an absent variable.
 * Returns `z.NEVER` after registering an issue when a required value is missing.
 */
function resolveMissing<T>(ctx: z.RefinementCtx, options: CommonOptions<T> | undefined, description: string): T | undefined {
  if (options?.defaultValue !== undefined) {
    return options.defaultValue;
  }
  if (options?.required) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
    return z.NEVER;
  }
  return undefined;
}

function checkBounds(
  ctx: z.RefinementCtx,
  value: number,
  description: string,
  bounds: { min?: number; max?: number } | undefined
): boolean {
  if (bounds?.min !== undefined && value < bounds.min) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be >= ${bounds.min}` });
    return false;
  }
  if (bounds?.max !== undefined && value > bounds.max) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be <= ${bounds.max}` });
    return false;
  }
  return true;
}

export type BooleanVarOptions = CommonOptions<boolean>;

export function booleanVar(options?: BooleanVarOptions) {
  return z.union([z.string(), z.boolean()]).nullable().optional().transform((value, ctx) => {
    const description = describeVariable(ctx, options?.description);
    if (value === null || value === undefined || isBlank(value)) {
      return resolveMissing(ctx, options, description);
    }
    if (typeof value === 'boolean') {
      return value;
    }

    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (FALSE_VALUES.has(normalized)) {
      return false;
    }

    const accepted = [...TRUE_VALUES, ...FALSE_VALUES].map((entry) => `'${entry}'`).join(', ');
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid ${description}. Accepted boolean values: ${accepted}`
    });
    return z.NEVER;
  });
}

export type NumericVarOptions = CommonOptions<number> & {
  min?: number;
  max?: number;
};

export function integerVar(options?: NumericVarOptions) {
  return z.union([z.string(), z.number()]).nullable().optional().transform((value, ctx) => {
    const description = describeVariable(ctx, options?.description);
    if (value === null || value === undefined || isBlank(value)) {
      return resolveMissing(ctx, options, description);
    }

    const parsed = typeof value === 'number' ? Math.trunc(value) : Number(value.trim());
    if (!Number.isInteger(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected ${description} to be an integer` });
      return z.NEVER;
    }
    return checkBounds(ctx, parsed, description, options) ? parsed : z.NEVER;
  });
}

export function numberVar(options?: NumericVarOptions) {
  return z.union([z.string(), z.number()]).nullable().optional().transform((value, ctx) => {
    const description = describeVariable(ctx, options?.description);
    if (value === null || value === undefined || isBlank(value)) {
      return resolveMissing(ctx, options, description);
    }

    const parsed = typeof value === 'number' ? value : Number(value.trim());
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected ${description} to be a number` });
      return z.NEVER;
    }
    return checkBounds(ctx, parsed, description, options) ? parsed : z.NEVER;
  });
}

export type StringVarOptions = CommonOptions<string> & {
  lowercase?: boolean;
  oneOf?: readonly string[];
};

export function stringVar(options?: StringVarOptions) {
  return z.string().optional().transform((value, ctx) => {
    const description = describeVariable(ctx, options?.description);
    if (value === undefined || value.trim().length === 0) {
      return resolveMissing(ctx, options, description);
    }

    const trimmed = value.trim();
    const normalized = options?.lowercase ? trimmed.toLowerCase() : trimmed;
    if (options?.oneOf && !options.oneOf.includes(normalized)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description} must be one of: ${options.oneOf.join(', ')}`
      });
      return z.NEVER;
    }
    return normalized;
  });
}

export type StringListVarOptions = CommonOptions<string[]> & {
  separator?: RegExp | string;
  unique?: boolean;
};

const DEFAULT_LIST_SEPARATOR = /[,\s]+/;

export function stringListVar(options?: StringListVarOptions) {
  return z.union([z.string(), z.array(z.string())]).nullable().optional().transform((value, ctx) => {
    const description = describeVariable(ctx, options?.description);
    if (value === null || value === undefined || isBlank(value)) {
      return resolveMissing(ctx, options, description) ?? [];
    }

    const list = (Array.isArray(value) ? value : value.split(options?.separator ?? DEFAULT_LIST_SEPARATOR))
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);

    return options?.unique ? Array.from(new Set(list)) : list;
  });
}
