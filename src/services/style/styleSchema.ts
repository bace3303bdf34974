import { z } from 'zod';

const hexColor = z
  .string()
  .regex(/^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/, 'expected a hex color such as #377C54');

const resourcePath = z.string().min(1, 'expected a non-empty resource path');

const boxSchema = z
  .object({
    x: z.number(),
    y: z.number(),
    width: z.number().positive(),
    height: z.number().positive(),
  })
  .strict();

export const fontRoles = ['title', 'body', 'bold', 'label'] as const;

const textBoxSchema = boxSchema
  .extend({
    font: z.enum(fontRoles),
    maxSize: z.number().int().positive(),
    minSize: z.number().int().positive(),
    align: z.enum(['start', 'center', 'end']),
    valign: z.enum(['top', 'middle']),
  })
  .strict()
  .refine((box) => box.minSize <= box.maxSize, {
    message: 'minSize must not exceed maxSize',
    path: ['minSize'],
  });

const iconBoxSchema = boxSchema.extend({ icon: resourcePath }).strict();

const statRowSchema = z
  .object({
    caption: z.string(),
    icon: iconBoxSchema,
    indicator: boxSchema,
    label: textBoxSchema,
    value: textBoxSchema,
  })
  .strict();

export const categoryEntrySchema = z
  .object({
    bgColor: hexColor,
    fgColor: hexColor,
    icon: resourcePath,
  })
  .strict();

const categoryTableSchema = z.record(z.string().min(1), categoryEntrySchema);

const generalSchema = z
  .object({
    classes: z
      .array(z.string().min(1))
      .nonempty('at least one class is required')
      .superRefine((classes, ctx) => {
        const seen = new Set<string>();
        classes.forEach((name, index) => {
          const key = name.toLowerCase();
          if (seen.has(key)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate class "${name}"`, path: [index] });
          }
          seen.add(key);
        });
      }),
    fonts: z
      .object({
        title: resourcePath,
        body: resourcePath,
        bold: resourcePath,
        label: resourcePath,
      })
      .strict(),
    continuationMarker: z.string().min(1),
    outputDirectory: z.string().min(1),
  })
  .strict();

const templateSchema = z
  .object({
    canvas: z.object({ width: z.number().int().positive(), height: z.number().int().positive() }).strict(),
    colors: z
      .object({
        background: hexColor,
        text: hexColor,
        dim: hexColor,
        disc: hexColor,
        highlight: hexColor,
      })
      .strict(),
    frame: resourcePath,
    bars: z.object({ top: boxSchema, middle: boxSchema }).strict(),
    schoolIcon: z
      .object({
        cx: z.number(),
        cy: z.number(),
        radius: z.number().positive(),
        size: z.number().positive(),
      })
      .strict(),
    title: textBoxSchema,
    level: textBoxSchema,
    schoolLine: textBoxSchema,
    stats: z
      .object({
        castingTime: statRowSchema,
        range: statRowSchema,
        duration: statRowSchema,
      })
      .strict(),
    components: z
      .object({
        x: z.number(),
        y: z.number(),
        iconSize: z.number().positive(),
        gap: z.number().nonnegative(),
        cost: textBoxSchema,
      })
      .strict(),
    classList: boxSchema
      .extend({
        font: z.enum(fontRoles),
        maxSize: z.number().int().positive(),
        minSize: z.number().int().positive(),
        marker: z
          .object({
            width: z.number().positive(),
            heightRatio: z.number().positive().max(1),
            offsetRatio: z.number().nonnegative().max(1),
          })
          .strict(),
      })
      .strict(),
    body: textBoxSchema,
    footer: z.object({ source: textBoxSchema, page: textBoxSchema }).strict(),
    continuation: textBoxSchema,
  })
  .strict();

export const styleConfigSchema = z
  .object({
    general: generalSchema,
    template: templateSchema,
    school: categoryTableSchema,
    component: categoryTableSchema,
    indicator: z.object({ ritual: categoryEntrySchema, concentration: categoryEntrySchema }).strict(),
  })
  .strict();

export type StyleDocument = z.infer<typeof styleConfigSchema>;
