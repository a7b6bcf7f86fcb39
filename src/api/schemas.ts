import { z } from 'zod';

// IDs arrive as strings or integers depending on the MCP client; reads use the string form.
const IdString = z
  .union([z.string().trim().min(1), z.number().int().nonnegative()])
  .transform((v) => String(v));

// Positive integer IDs for writes, given as a number or a digit string; no other coercion.
const IdNumber = z
  .union([z.number(), z.string().trim().regex(/^\d+$/, 'must be a numeric ID').transform(Number)])
  .pipe(z.number().int().positive());

export const LocationSchema = z
  .object({
    item: IdNumber.optional(),
    project: IdNumber.optional()
  })
  .refine((l) => (l.item === undefined) !== (l.project === undefined), {
    message: "location must name exactly one parent: 'item' or 'project'"
  });

const FieldsSchema = z.record(z.unknown());

export const NoArgsSchema = z.object({});

export const ItemIdSchema = z.object({ item_id: IdString });
export const ProjectIdSchema = z.object({ project_id: IdString });
export const RelationshipIdSchema = z.object({ relationship_id: IdString });
export const ItemTypeIdSchema = z.object({ item_type_id: IdString });
export const PickListIdSchema = z.object({ pick_list_id: IdString });
export const PickListOptionIdSchema = z.object({ pick_list_option_id: IdString });
export const TagIdSchema = z.object({ tag_id: IdString });
export const TestCycleIdSchema = z.object({ test_cycle_id: IdString });

export const ItemCreateSchema = z.object({
  project: IdNumber,
  item_type_id: IdNumber,
  child_item_type_id: IdNumber,
  location: LocationSchema,
  fields: FieldsSchema
});

export const ItemUpdateSchema = ItemCreateSchema.extend({
  item_id: IdNumber
});

export const TagCreateSchema = z.object({
  name: z.string().trim().min(1).max(255),
  project: IdNumber
});

export const ItemTagAddSchema = z.object({
  item_id: IdNumber,
  tag_id: IdNumber
});

export const ProjectCreateSchema = z.object({
  name: z.string().trim().min(1).max(255),
  project_key: z.string().trim().min(1).max(64),
  item_type_id: IdNumber
});

export const RelationshipCreateSchema = z.object({
  from_item_id: IdNumber,
  to_item_id: IdNumber,
  relationship_type: IdNumber.optional()
});
