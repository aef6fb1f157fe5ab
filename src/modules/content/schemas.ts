import { z } from "zod";
import { ITEM_ID_REGEX } from "@/modules/items/item";
import { SETTING_KEY_REGEX } from "@/modules/items/settings";
import { NamespacedKey } from "@/modules/research/key";

export const CONTENT_SCHEMA_VERSION = 1 as const;

export const ItemIdSchema = z
  .string()
  .regex(ITEM_ID_REGEX, `Invalid item id. Expected pattern ${ITEM_ID_REGEX.source}`);

export const SettingKeySchema = z
  .string()
  .regex(SETTING_KEY_REGEX, `Invalid setting key. Expected pattern ${SETTING_KEY_REGEX.source}`);

export const ResearchKeySchema = z.string().superRefine((value, ctx) => {
  const parsed = NamespacedKey.parse(value);
  if (parsed.isErr()) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error.message });
  }
});

export const SettingDefSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("boolean"), key: SettingKeySchema, default: z.boolean() }).strict(),
  z.object({ type: z.literal("int"), key: SettingKeySchema, default: z.number().int() }).strict(),
  z
    .object({
      type: z.literal("int-range"),
      key: SettingKeySchema,
      min: z.number().int(),
      max: z.number().int(),
      default: z.number().int(),
    })
    .strict(),
  z.object({ type: z.literal("string"), key: SettingKeySchema, default: z.string() }).strict(),
  z
    .object({
      type: z.literal("string-list"),
      key: SettingKeySchema,
      default: z.array(z.string()),
    })
    .strict(),
  z
    .object({
      type: z.literal("enum"),
      key: SettingKeySchema,
      options: z.array(z.string().min(1)).min(1),
      default: z.string(),
    })
    .strict(),
]);

export type SettingDef = z.infer<typeof SettingDefSchema>;

export const ItemDefSchema = z
  .object({
    id: ItemIdSchema,
    name: z.string().min(1),
    addon: z.string().min(1).optional(),
    hidden: z.boolean().default(false),
    settings: z.array(SettingDefSchema).default([]),
  })
  .strict();

export type ItemDef = z.infer<typeof ItemDefSchema>;

export const ResearchDefSchema = z
  .object({
    key: ResearchKeySchema,
    id: z.number().int().min(0),
    name: z.string().min(1),
    cost: z.number().int().min(0),
    items: z.array(ItemIdSchema).default([]),
  })
  .strict();

export type ResearchDef = z.infer<typeof ResearchDefSchema>;

export const ItemPackSchema = z
  .object({
    schemaVersion: z.literal(CONTENT_SCHEMA_VERSION),
    addon: z.string().min(1),
    items: z.array(ItemDefSchema),
  })
  .strict();

export const ResearchPackSchema = z
  .object({
    schemaVersion: z.literal(CONTENT_SCHEMA_VERSION),
    researches: z.array(ResearchDefSchema),
  })
  .strict();

export type ItemPack = z.infer<typeof ItemPackSchema>;
export type ResearchPack = z.infer<typeof ResearchPackSchema>;
