import { z } from 'zod';

import { UNDEFINED_CODE, UNDEFINED_KEY } from '../constants.js';

const identifierPattern = /^[a-z][A-Za-z0-9]*$/;

const CodeSchema = z
  .string()
  .regex(/^[A-Z]$/, 'must be a single uppercase letter')
  .refine((code) => code !== UNDEFINED_CODE, `'${UNDEFINED_CODE}' is reserved for undefined`);

const KeySchema = z
  .string()
  .regex(identifierPattern, 'must be a camelCase identifier')
  .refine((key) => key !== UNDEFINED_KEY, `'${UNDEFINED_KEY}' is reserved`);

const NameSchema = z.string().min(1);

export const AttributeValueSchema = z.object({
  code: CodeSchema,
  key: KeySchema,
  name: NameSchema,
  description: NameSchema.optional(),
});

function addDuplicateIssues(
  ctx: z.RefinementCtx,
  items: readonly { code: string; key: string }[],
  path: (string | number)[]
): void {
  const codes = new Set<string>();
  const keys = new Set<string>();
  items.forEach((item, index) => {
    if (codes.has(item.code)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate code '${item.code}'`, path: [...path, index, 'code'] });
    }
    if (keys.has(item.key)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate key '${item.key}'`, path: [...path, index, 'key'] });
    }
    codes.add(item.code);
    keys.add(item.key);
  });
}

export const EnumerationSchema = z
  .object({
    name: NameSchema,
    values: z.array(AttributeValueSchema),
  })
  .superRefine((enumeration, ctx) => addDuplicateIssues(ctx, enumeration.values, ['values']));

export const SlotSchema = z.object({
  field: z.string().regex(identifierPattern, 'must be a camelCase identifier'),
  /** Local enumeration id, or `shared:<id>`. */
  attribute: z.string().min(1),
});

export const GroupSchema = z
  .object({
    code: CodeSchema,
    key: KeySchema,
    name: NameSchema,
    description: NameSchema.optional(),
    attributes: z.tuple([SlotSchema, SlotSchema, SlotSchema, SlotSchema]),
  })
  .superRefine((group, ctx) => {
    const seen = new Set<string>();
    group.attributes.forEach((slot, index) => {
      if (seen.has(slot.field)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate field '${slot.field}'`,
          path: ['attributes', index, 'field'],
        });
      }
      seen.add(slot.field);
    });
  });

export const SharedFileSchema = z.object({
  attributes: z.record(EnumerationSchema),
});

export const CategoryFileSchema = z
  .object({
    groups: z.array(GroupSchema).min(1),
    attributes: z.record(EnumerationSchema).default({}),
  })
  .superRefine((file, ctx) => addDuplicateIssues(ctx, file.groups, ['groups']));

export type AttributeValueData = z.infer<typeof AttributeValueSchema>;
export type EnumerationData = z.infer<typeof EnumerationSchema>;
export type GroupData = z.infer<typeof GroupSchema>;
export type SharedFile = z.infer<typeof SharedFileSchema>;
export type CategoryFile = z.infer<typeof CategoryFileSchema>;
