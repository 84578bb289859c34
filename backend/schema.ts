import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { FieldError, ValidationError } from './errors';

const TRUE_STRINGS = new Set(['true', '1', 'yes', 'on', 't', 'y']);
const FALSE_STRINGS = new Set(['false', '0', 'no', 'off', 'f', 'n']);

/*
  Boolean that also accepts 1/0 and the usual form/query spellings ("yes", "off", ...).
  Anything else is left untouched so z.boolean() reports it.
*/
export const coercedBoolean = z.preprocess((value) => {
  if (typeof value === 'number') {
    if (value === 1) return true;
    if (value === 0) return false;
    return value;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (TRUE_STRINGS.has(normalized)) return true;
    if (FALSE_STRINGS.has(normalized)) return false;
  }
  return value;
}, z.boolean());

/*
  Number that also accepts numeric strings such as "9.99".
  Other strings are left untouched so z.number() reports them.
*/
export const coercedNumber = z.preprocess((value) => {
  if (typeof value === 'string' && /^\s*-?(\d+\.?\d*|\.\d+)\s*$/.test(value)) {
    return Number(value);
  }
  return value;
}, z.number());

// ===== ENTITY SCHEMAS =====

export const userSchema = z.object({
  name: z.string(),
  email: z.string().email(),
  address: z.string(),
  age: z.number().int().min(0).max(120).optional(),
  is_active: coercedBoolean.default(true)
});

// Optional fields default to null so every stored product carries the full field set
export const productSchema = z.object({
  title: z.string(),
  description: z.string().nullable().default(null),
  price: coercedNumber,
  category: z.string(),
  in_stock: coercedBoolean.default(true),
  image_url: z.string().nullable().default(null),
  buy_url: z.string().nullable().default(null),
  featured: coercedBoolean.default(false),
  tags: z.array(z.string()).nullable().default(null)
});

export const leadSchema = z.object({
  name: z.string(),
  email: z.string(),
  message: z.string().nullable().default(null),
  source: z.string().nullable().default('website')
});

export type User = z.infer<typeof userSchema>;
export type Product = z.infer<typeof productSchema>;
export type Lead = z.infer<typeof leadSchema>;

// ===== QUERY SCHEMAS =====

export const listProductsQuerySchema = z.object({
  category: z.string().optional(),
  featured: coercedBoolean.optional(),
  limit: z
    .string()
    .regex(/^\d+$/, 'Expected a non-negative integer')
    .default('50')
    .transform(Number)
});

export type ListProductsQuery = z.infer<typeof listProductsQuerySchema>;

// ===== VALIDATION =====

export type CheckResult<T> =
  | { success: true; data: T }
  | { success: false; errors: FieldError[] };

export function toFieldErrors(error: z.ZodError): FieldError[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'body',
    message: issue.message
  }));
}

export function checkPayload<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown
): CheckResult<z.output<S>> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: toFieldErrors(result.error) };
}

export function parsePayload<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = checkPayload(schema, input);
  if (!result.success) {
    throw new ValidationError(result.errors);
  }
  return result.data;
}

// ===== JSON SCHEMA =====

type EntitySchema = typeof userSchema | typeof productSchema | typeof leadSchema;

function toEntityJsonSchema(title: string, schema: EntitySchema) {
  return { title, ...zodToJsonSchema(schema, { $refStrategy: 'none' }) };
}

export function describeSchemas() {
  return {
    user: toEntityJsonSchema('User', userSchema),
    product: toEntityJsonSchema('Product', productSchema),
    lead: toEntityJsonSchema('Lead', leadSchema)
  };
}
