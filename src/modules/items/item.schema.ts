import { z } from 'zod';

export const ITEM_NAME_MAX_LENGTH = 100;
export const ITEM_DESCRIPTION_MAX_LENGTH = 500;

// Lengths count characters (code points), not UTF-16 code units.
function textSchema(min: number, max: number) {
  return z.string().superRefine((value, ctx) => {
    const length = [...value].length;
    if (length < min) {
      ctx.addIssue({
        code: z.ZodIssueCode.too_small,
        minimum: min,
        inclusive: true,
        type: 'string',
        message: `String must contain at least ${min} character(s)`,
      });
    } else if (length > max) {
      ctx.addIssue({
        code: z.ZodIssueCode.too_big,
        maximum: max,
        inclusive: true,
        type: 'string',
        message: `String must contain at most ${max} character(s)`,
      });
    }
  });
}

const nameSchema = textSchema(1, ITEM_NAME_MAX_LENGTH);
const descriptionSchema = textSchema(0, ITEM_DESCRIPTION_MAX_LENGTH).nullable();
const priceSchema = z.number().finite().positive();

export const createItemSchema = z.object({
  name: nameSchema,
  description: descriptionSchema.optional(),
  price: priceSchema,
});

// Keys left out of the body stay out of the parsed value; unknown keys are stripped.
export const updateItemSchema = z.object({
  name: nameSchema.optional(),
  description: descriptionSchema.optional(),
  price: priceSchema.optional(),
});

export const itemIdParamsSchema = z.object({
  // Fifteen digits always fit in a safe integer.
  id: z.string().regex(/^-?\d{1,15}$/, 'Item id must be an integer').transform(Number),
});

export type CreateItemInput = z.infer<typeof createItemSchema>;
export type UpdateItemInput = z.infer<typeof updateItemSchema>;

const storedItemSchema = z.object({
  id: z.number().int().safe(),
  name: z.string(),
  description: z.string().nullable().default(null),
  price: z.number(),
  created_at: z.string(),
  updated_at: z.string(),
});

export const itemCollectionSchema = z.array(storedItemSchema).superRefine((items, ctx) => {
  const seen = new Set<number>();
  for (const [index, item] of items.entries()) {
    if (seen.has(item.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, 'id'], message: `Duplicate item id ${item.id}` });
    }
    seen.add(item.id);
  }
});
