import { z } from 'zod';

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EnvConfigError';
  }
}

type EnvIssueTarget = {
  path: (string | number)[];
  message: string;
};

function formatIssue({ path, message }: EnvIssueTarget): string {
  const location = path.length > 0 ? path.join('.') : '<root>';
  return `${location}: ${message}`;
}

function formatErrorMessage(context: string, issues: EnvIssueTarget[]): string {
  const header = `[${context}] Invalid environment configuration`;
  const details = issues.map((issue) => `  - ${formatIssue(issue)}`).join('\n');
  return `${header}\n${details}`;
}

export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'airwise';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message
    }));
    throw new EnvConfigError(formatErrorMessage(context, issues));
  }

  return result.data;
}

function describe(name: string | number | undefined, description?: string): string {
  if (description) {
    return description;
  }
  if (typeof name === 'string' && name.length > 0) {
    return name;
  }
  if (typeof name === 'number') {
    return name.toString();
  }
  return 'value';
}

type RequiredOption = {
  required?: boolean;
};

type DefaultOption<T> = {
  defaultValue?: T;
};

type DescriptionOption = {
  description?: string;
};

export type IntegerVarOptions = RequiredOption &
  DefaultOption<number> &
  DescriptionOption & {
    min?: number;
    max?: number;
  };

export function integerVar(options?: IntegerVarOptions) {
  return z.union([z.string(), z.number()]).nullable().optional().transform((value, ctx) => {
    const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
    const description = describe(pathName, options?.description);

    if (value === null || value === undefined || (typeof value === 'string' && value.trim() === '')) {
      if (options?.defaultValue !== undefined) {
        return options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    const parsed = typeof value === 'number' ? Math.trunc(value) : Number(value.trim());
    if (!Number.isInteger(parsed)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected ${description} to be an integer`
      });
      return z.NEVER;
    }

    if (options?.min !== undefined && parsed < options.min) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description} must be >= ${options.min}`
      });
      return z.NEVER;
    }

    if (options?.max !== undefined && parsed > options.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description} must be <= ${options.max}`
      });
      return z.NEVER;
    }

    return parsed;
  });
}

export type StringVarOptions = RequiredOption &
  DefaultOption<string> &
  DescriptionOption & {
    trim?: boolean;
    allowEmpty?: boolean;
    pattern?: RegExp;
    lowercase?: boolean;
  };

export function stringVar(options?: StringVarOptions) {
  return z.string().optional().transform((value, ctx) => {
    const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
    const description = describe(pathName, options?.description);

    if (value === undefined) {
      if (options?.defaultValue !== undefined) {
        return options.lowercase ? options.defaultValue.toLowerCase() : options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
        return z.NEVER;
      }
      return undefined;
    }

    const raw = options?.trim === false ? value : value.trim();
    const normalized = options?.lowercase ? raw.toLowerCase() : raw;

    if (!options?.allowEmpty && normalized.length === 0) {
      if (options?.defaultValue !== undefined) {
        return options.lowercase ? options.defaultValue.toLowerCase() : options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must not be empty` });
        return z.NEVER;
      }
      return undefined;
    }

    if (options?.pattern && !options.pattern.test(normalized)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description} does not match expected pattern`
      });
      return z.NEVER;
    }

    return normalized;
  });
}

export function enumVar<T extends string>(values: readonly [T, ...T[]], options: DefaultOption<T> & DescriptionOption) {
  return z.string().optional().transform((value, ctx): T => {
    const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
    const description = describe(pathName, options.description);
    const normalized = value?.trim().toLowerCase() ?? '';

    if (normalized.length === 0 && options.defaultValue !== undefined) {
      return options.defaultValue;
    }
    const match = values.find((candidate) => candidate === normalized);
    if (match === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid ${description}. Accepted values: ${values.map((entry) => `'${entry}'`).join(', ')}`
      });
      return z.NEVER;
    }
    return match;
  });
}
