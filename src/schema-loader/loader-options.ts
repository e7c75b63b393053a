import { z } from 'zod';

import { InvalidLoaderOptionsError } from '../common/errors';
import { LoaderOptions } from '../common/types';

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

// 0/1, "0"/"1", "" and booleans as typed on a command line
const flag = z
  .union([z.boolean(), z.literal(0), z.literal(1), z.literal('0'), z.literal('1'), z.literal('')])
  .transform((value) => value === true || value === 1 || value === '1');

const pattern = z.union([z.string(), z.instanceof(RegExp)]).transform((value, ctx) => {
  if (typeof value !== 'string') return value;
  try {
    return new RegExp(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : `invalid regular expression ${JSON.stringify(value)}`,
    });
    return z.NEVER;
  }
});

/** `module` (default export) or `module#Export`. */
const moduleReference = z
  .string()
  .regex(/^[^#\s]+(?:#[A-Za-z_$][\w$]*)?$/, 'expected "module" or "module#Export"');

const toList = (value: string | string[]): string[] => (typeof value === 'string' ? [value] : value);

export const loaderOptionsSchema = z
  .object({
    dump_directory: z.string().min(1).default('.'),
    db_schema: z.union([z.string(), z.array(z.string()).nonempty()]).transform(toList).optional(),
    constraint: pattern.optional(),
    exclude: pattern.optional(),
    moniker_map: z.record(z.string().regex(IDENTIFIER, 'expected a class name')).default({}),
    rel_name_map: z.record(z.string().regex(IDENTIFIER, 'expected a property name')).default({}),
    skip_relationships: flag.default(false),
    use_namespaces: flag.default(true),
    result_namespace: z.string().regex(IDENTIFIER, 'expected an identifier').default('Result'),
    result_base_class: moduleReference.optional(),
    components: z.union([moduleReference, z.array(moduleReference)]).transform(toList).default([]),
    overwrite_modifications: flag.default(false),
    really_erase_my_files: flag.default(false),
    filter_generated_code: moduleReference.optional(),
    generate_docs: flag.default(true),
    quiet: flag.default(false),
    debug: flag.default(false),
  })
  .strict();

export type ResolvedLoaderOptions = z.output<typeof loaderOptionsSchema>;

export function supportsOption(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(loaderOptionsSchema.shape, name);
}

export function parseLoaderOptions(options: LoaderOptions): ResolvedLoaderOptions {
  const result = loaderOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new InvalidLoaderOptionsError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      ),
    );
  }
  return result.data;
}
