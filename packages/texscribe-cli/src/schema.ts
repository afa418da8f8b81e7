import { z } from 'zod';
import { TeXValueError } from 'texscribe-core';
import { parseArrow } from 'texscribe-tikz';

// ============================================================================
// Shared values
// ============================================================================

/**
 * A style value; `{ "color": "NAME" }` refers to a declared or default color
 */
export const StyleValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.object({ color: z.string().min(1) }),
]);

export const StyleSchema = z.record(StyleValueSchema);

export type StyleValueDescription = z.infer<typeof StyleValueSchema>;
export type StyleDescription = z.infer<typeof StyleSchema>;

export const PointSchema = z.union([
  z.tuple([z.number(), z.number()]),
  z.object({
    x: z.number(),
    y: z.number(),
    unit: z.string().optional(),
    relative: z.boolean().optional(),
  }),
  z.object({
    angle: z.number(),
    radius: z.number(),
    unit: z.string().optional(),
  }),
]);

export type PointDescription = z.infer<typeof PointSchema>;

export const ColorSchema = z.object({
  name: z.string().min(1),
  value: z.array(z.number()).min(3).max(4),
  mode: z.enum(['rgb', 'RGB']).optional(),
});

export type ColorDescription = z.infer<typeof ColorSchema>;

export const ArrowSchema = z.string().refine((text) => parseArrow(text) !== undefined, {
  message: 'Unknown arrow head',
});

// ============================================================================
// TikZ items
// ============================================================================

export const TikZNodeItemSchema = z.object({
  type: z.literal('node'),
  name: z.string().optional(),
  label: z.string().optional(),
  at: PointSchema.optional(),
  /** Name of an earlier node that `at` is relative to */
  relativeTo: z.string().optional(),
  style: StyleSchema.optional(),
});

export const TikZPathItemSchema = z.object({
  type: z.literal('path'),
  /** Node names and coordinates */
  through: z.array(z.union([z.string(), PointSchema])).min(2),
  cycle: z.boolean().optional(),
  /** Makes the path directed */
  arrow: ArrowSchema.optional(),
  label: z.object({ text: z.string(), style: StyleSchema.optional() }).optional(),
  style: StyleSchema.optional(),
});

export const TikZCircleItemSchema = z.object({
  type: z.literal('circle'),
  at: PointSchema,
  radius: z.union([z.string(), z.number()]),
  style: StyleSchema.optional(),
});

export const TikZRawItemSchema = z.object({
  type: z.literal('raw'),
  text: z.string(),
});

export type TikZNodeItem = z.infer<typeof TikZNodeItemSchema>;
export type TikZPathItem = z.infer<typeof TikZPathItemSchema>;
export type TikZCircleItem = z.infer<typeof TikZCircleItemSchema>;
export type TikZRawItem = z.infer<typeof TikZRawItemSchema>;

export interface TikZScopeItem {
  type: 'scope';
  style?: StyleDescription;
  items: TikZItem[];
}

export type TikZItem = TikZNodeItem | TikZPathItem | TikZCircleItem | TikZRawItem | TikZScopeItem;

export const TikZItemSchema: z.ZodType<TikZItem> = z.lazy(() =>
  z.discriminatedUnion('type', [
    TikZNodeItemSchema,
    TikZPathItemSchema,
    TikZCircleItemSchema,
    TikZRawItemSchema,
    z.object({
      type: z.literal('scope'),
      style: StyleSchema.optional(),
      items: z.array(TikZItemSchema),
    }),
  ])
);

// ============================================================================
// Blocks
// ============================================================================

export const TextBlockSchema = z.object({ type: z.literal('text'), text: z.string() });
export const LineBlockSchema = z.object({ type: z.literal('line'), text: z.string().optional() });
export const NewlineBlockSchema = z.object({ type: z.literal('newline'), count: z.number().int().min(1).optional() });
export const PageBreakBlockSchema = z.object({ type: z.literal('pageBreak') });
export const VSpaceBlockSchema = z.object({ type: z.literal('vspace'), length: z.union([z.string(), z.number()]) });

export const MathsBlockSchema = z.object({
  type: z.literal('maths'),
  /** Environment name without the star (default `align`) */
  environment: z.string().min(1).optional(),
  star: z.boolean().optional(),
  rows: z.array(z.string()),
});

export const TikZBlockSchema = z.object({
  type: z.literal('tikz'),
  style: StyleSchema.optional(),
  onDuplicateName: z.enum(['error', 'rename']).optional(),
  items: z.array(TikZItemSchema),
});

export type TextBlock = z.infer<typeof TextBlockSchema>;
export type LineBlock = z.infer<typeof LineBlockSchema>;
export type NewlineBlock = z.infer<typeof NewlineBlockSchema>;
export type PageBreakBlock = z.infer<typeof PageBreakBlockSchema>;
export type VSpaceBlock = z.infer<typeof VSpaceBlockSchema>;
export type MathsBlock = z.infer<typeof MathsBlockSchema>;
export type TikZBlock = z.infer<typeof TikZBlockSchema>;

export interface EnvironmentBlock {
  type: 'environment';
  name: string;
  options?: string;
  packages?: string[];
  blocks: Block[];
}

export interface CenterBlock {
  type: 'center';
  blocks: Block[];
}

export interface FigureBlock {
  type: 'figure';
  caption?: string;
  label?: string;
  placement?: string;
  blocks: Block[];
}

export type Block =
  | TextBlock
  | LineBlock
  | NewlineBlock
  | PageBreakBlock
  | VSpaceBlock
  | MathsBlock
  | TikZBlock
  | EnvironmentBlock
  | CenterBlock
  | FigureBlock;

export const BlockSchema: z.ZodType<Block> = z.lazy(() =>
  z.discriminatedUnion('type', [
    TextBlockSchema,
    LineBlockSchema,
    NewlineBlockSchema,
    PageBreakBlockSchema,
    VSpaceBlockSchema,
    MathsBlockSchema,
    TikZBlockSchema,
    z.object({
      type: z.literal('environment'),
      name: z.string().min(1),
      options: z.string().optional(),
      packages: z.array(z.string()).optional(),
      blocks: z.array(BlockSchema),
    }),
    z.object({ type: z.literal('center'), blocks: z.array(BlockSchema) }),
    z.object({
      type: z.literal('figure'),
      caption: z.string().optional(),
      label: z.string().optional(),
      placement: z.string().optional(),
      blocks: z.array(BlockSchema),
    }),
  ])
);

// ============================================================================
// Document
// ============================================================================

export const PackageSchema = z.union([
  z.string().min(1),
  z.object({ name: z.string().min(1), options: z.array(z.string()) }),
]);

export const DocumentDescriptionSchema = z.object({
  documentClass: z.string().min(1).optional(),
  documentOptions: z.string().optional(),
  defaultPackages: z.array(z.string()).optional(),
  title: z.string().optional(),
  subtitle: z.string().optional(),
  author: z.string().optional(),
  showDate: z.boolean().optional(),
  showPageNumbers: z.boolean().optional(),
  lineWrapLength: z.number().int().positive().optional(),
  packages: z.array(PackageSchema).optional(),
  tikzLibraries: z.array(z.string().min(1)).optional(),
  colors: z.array(ColorSchema).optional(),
  blocks: z.array(BlockSchema),
});

export type DocumentDescription = z.infer<typeof DocumentDescriptionSchema>;

/**
 * Parse and validate a JSON document description
 *
 * @param source name of the input, used in error messages
 */
export function parseDescription(text: string, source: string = 'input'): DocumentDescription {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new TeXValueError(`${source} is not valid JSON`, undefined, { cause: error });
  }

  const result = DocumentDescriptionSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `  ${where}: ${issue.message}`;
    });
    throw new TeXValueError(`Invalid document description in ${source}:\n${issues.join('\n')}`);
  }
  return result.data;
}
