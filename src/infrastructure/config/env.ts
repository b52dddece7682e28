import { z } from 'zod';

export type Env = Readonly<Record<string, string | undefined>>;

/** Result of loading configuration: the config plus non-fatal problems to log. */
export interface LoadedConfig<T> {
  readonly config: T;
  readonly warnings: readonly string[];
}

export const portSchema = z.coerce.number().int().min(0).max(65535);

/** Parses an absolute http(s) URL; anything else is a configuration error. */
export const originUrlSchema = z.string().transform((value, ctx) => {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a valid URL` });
    return z.NEVER;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" must use http or https` });
    return z.NEVER;
  }
  return url;
});

/** Boolean flags are on only for the exact string "true". */
export const flagSchema = z.string().default('false').transform((v) => v === 'true');

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ');
}
