import { z } from 'zod';
import { invalidValue } from './errors.js';

export const DIRECTIONS = ['LR', 'TB', 'RL', 'BT'] as const;
export const THEMES = [
  'default',
  'mc',
  'neo',
  'neo-dark',
  'forest',
  'base',
  'dark',
  'neutral',
  'redux',
  'redux-dark',
] as const;
export const LOOKS = ['classic', 'neo', 'handDrawn'] as const;
export const LAYOUT_RENDERERS = ['dagre', 'elk'] as const;
export const CURVE_STYLES = [
  'basis',
  'bumpX',
  'bumpY',
  'cardinal',
  'catmullRom',
  'linear',
  'monotoneX',
  'monotoneY',
  'natural',
  'step',
  'stepAfter',
  'stepBefore',
] as const;

export type Direction = (typeof DIRECTIONS)[number];
export type Theme = (typeof THEMES)[number];
export type Look = (typeof LOOKS)[number];
export type LayoutRenderer = (typeof LAYOUT_RENDERERS)[number];
export type CurveStyle = (typeof CURVE_STYLES)[number];

const BaseConfigSchema = z.object({
  title: z.string().refine((t) => t.trim() !== '', 'Title cannot be empty').optional(),
  direction: z.enum(DIRECTIONS).default('LR'),
  theme: z.enum(THEMES).default('default'),
  look: z.enum(LOOKS).default('classic'),
  renderer: z.enum(LAYOUT_RENDERERS).default('dagre'),
});

export const FlowchartConfigSchema = BaseConfigSchema.extend({
  curve: z.enum(CURVE_STYLES).default('basis'),
}).strict();

export const ClassDiagramConfigSchema = BaseConfigSchema.extend({
  hideEmptyMembersBox: z.boolean().default(false),
}).strict();

export const ERDiagramConfigSchema = BaseConfigSchema.strict();

export type FlowchartConfig = z.output<typeof FlowchartConfigSchema>;
export type FlowchartConfigInput = z.input<typeof FlowchartConfigSchema>;
export type ClassDiagramConfig = z.output<typeof ClassDiagramConfigSchema>;
export type ClassDiagramConfigInput = z.input<typeof ClassDiagramConfigSchema>;
export type ERDiagramConfig = z.output<typeof ERDiagramConfigSchema>;
export type ERDiagramConfigInput = z.input<typeof ERDiagramConfigSchema>;

/**
 * Validate a configuration object and apply defaults.
 * The first schema issue is reported as an InvalidValue error naming the key.
 */
export function parseConfig<S extends z.ZodTypeAny>(schema: S, input: unknown): Readonly<z.output<S>> {
  const result = schema.safeParse(input ?? {});
  if (result.success) return Object.freeze(result.data);
  const issue = result.error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
  throw invalidValue(field, `Invalid configuration for '${field}': ${issue?.message ?? 'unknown issue'}`);
}
