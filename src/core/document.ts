import { z } from 'zod';
import { CLASS_ARROW_SHAPES, CLASS_LINE_STYLES, MULTIPLICITIES, VISIBILITIES } from '../diagrams/class/types.js';
import { CARDINALITIES, ER_ATTRIBUTE_KEYS } from '../diagrams/er/types.js';
import { FLOWCHART_ARROW_SHAPES, FLOWCHART_LINE_STYLES, FLOWCHART_SHAPES } from '../diagrams/flowchart/types.js';
import { MAX_FLOWCHART_LENGTH } from '../diagrams/flowchart/validate.js';
import { ClassDiagramConfigSchema, DIRECTIONS, ERDiagramConfigSchema, FlowchartConfigSchema } from './config.js';

// JSON documents accepted by the CLI and the MCP server.
// Nodes are named by `key`; edges refer to those keys with `from` and `to`.

const NodeKey = z.string().min(1, 'Node key cannot be empty').describe('Unique name used by edges to refer to this node');

const EdgeEnds = {
  from: NodeKey.describe('Key of the source node'),
  to: NodeKey.describe('Key of the destination node'),
  label: z.string().optional(),
};

const ClickSchema = z.object({
  url: z.string(),
  newTab: z.boolean().optional(),
  anchor: z.boolean().optional(),
  tooltip: z.string().optional(),
}).strict();

export const FlowchartDocumentSchema = z.object({
  type: z.literal('flowchart'),
  config: FlowchartConfigSchema.optional(),
  nodes: z.array(z.object({
    key: NodeKey,
    label: z.string(),
    shape: z.enum(FLOWCHART_SHAPES).optional(),
    subnodes: z.array(NodeKey).optional().describe('Keys of earlier nodes to group in a subgraph'),
    direction: z.enum(DIRECTIONS).optional(),
    click: ClickSchema.optional(),
  }).strict()),
  edges: z.array(z.object({
    ...EdgeEnds,
    arrow: z.enum(FLOWCHART_ARROW_SHAPES).optional(),
    leftArrow: z.enum(FLOWCHART_ARROW_SHAPES).optional(),
    lineStyle: z.enum(FLOWCHART_LINE_STYLES).optional(),
    length: z.number().int().min(1).max(MAX_FLOWCHART_LENGTH).optional(),
  }).strict()).default([]),
}).strict();

const VisibilityField = z.enum(VISIBILITIES).optional();

export const ClassDocumentSchema = z.object({
  type: z.literal('class'),
  config: ClassDiagramConfigSchema.optional(),
  nodes: z.array(z.object({
    key: NodeKey,
    label: z.string(),
    annotation: z.string().optional(),
    members: z.array(z.string()).optional(),
    attributes: z.array(z.object({
      name: z.string(),
      type: z.string().optional(),
      visibility: VisibilityField,
    }).strict()).optional(),
    methods: z.array(z.object({
      name: z.string(),
      parameters: z.array(z.object({ name: z.string(), type: z.string().optional() }).strict()).optional(),
      returnType: z.string().optional(),
      visibility: VisibilityField,
    }).strict()).optional(),
    click: ClickSchema.optional(),
  }).strict()),
  edges: z.array(z.object({
    ...EdgeEnds,
    arrow: z.enum(CLASS_ARROW_SHAPES).optional(),
    leftArrow: z.enum(CLASS_ARROW_SHAPES).optional(),
    lineStyle: z.enum(CLASS_LINE_STYLES).optional(),
    leftMultiplicity: z.enum(MULTIPLICITIES).optional(),
    rightMultiplicity: z.enum(MULTIPLICITIES).optional(),
  }).strict()).default([]),
}).strict();

const CardinalityField = z.enum(CARDINALITIES);

export const ERDocumentSchema = z.object({
  type: z.literal('er'),
  config: ERDiagramConfigSchema.optional(),
  nodes: z.array(z.object({
    key: NodeKey,
    label: z.string(),
    attributes: z.array(z.object({
      type: z.string(),
      name: z.string(),
      keys: z.array(z.enum(ER_ATTRIBUTE_KEYS)).optional(),
      comment: z.string().optional(),
    }).strict()).optional(),
  }).strict()),
  edges: z.array(z.object({
    ...EdgeEnds,
    cardinality: z.union([CardinalityField, z.object({ left: CardinalityField, right: CardinalityField }).strict()]).optional(),
    identifying: z.boolean().optional(),
  }).strict()).default([]),
}).strict();

export const DiagramDocumentSchema = z.discriminatedUnion('type', [
  FlowchartDocumentSchema,
  ClassDocumentSchema,
  ERDocumentSchema,
]);

export type FlowchartDocument = z.infer<typeof FlowchartDocumentSchema>;
export type ClassDocument = z.infer<typeof ClassDocumentSchema>;
export type ERDocument = z.infer<typeof ERDocumentSchema>;
export type DiagramDocument = z.infer<typeof DiagramDocumentSchema>;
export type DiagramDocumentInput = z.input<typeof DiagramDocumentSchema>;

export function parseDiagramDocument(input: unknown): DiagramDocument {
  return DiagramDocumentSchema.parse(input);
}
