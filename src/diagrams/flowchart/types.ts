import type { ClickEvent } from '../../core/click.js';
import type { Direction, FlowchartConfig } from '../../core/config.js';
import type { Diagram } from '../../core/diagram.js';
import type { NodeId } from '../../core/ids.js';
import type { EdgeAttributes, NodeAttributes, NodeDescriptor } from '../../core/types.js';

export const FLOWCHART_SHAPES = [
  'rectangle',
  'rounded',
  'stadium',
  'subprocess',
  'cylinder',
  'circle',
  'odd',
  'diamond',
  'hexagon',
  'lean-right',
  'lean-left',
  'trapezoid',
  'inverted-trapezoid',
  'double-circle',
  'notched-rectangle',
  'lined-rectangle',
  'small-circle',
  'framed-circle',
  'fork',
  'hourglass',
  'comment',
  'brace-right',
  'braces',
  'bolt',
  'document',
  'delay',
  'horizontal-cylinder',
  'lined-cylinder',
  'triangle',
  'documents',
  'processes',
  'flag',
  'text',
] as const;

export type FlowchartShape = (typeof FLOWCHART_SHAPES)[number];

// Short names understood by the `@{ shape: ... }` node syntax
export const FLOWCHART_SHAPE_TOKENS: Record<FlowchartShape, string> = {
  'rectangle': 'rect',
  'rounded': 'rounded',
  'stadium': 'stadium',
  'subprocess': 'subproc',
  'cylinder': 'cyl',
  'circle': 'circle',
  'odd': 'odd',
  'diamond': 'diamond',
  'hexagon': 'hex',
  'lean-right': 'lean-r',
  'lean-left': 'lean-l',
  'trapezoid': 'trap-b',
  'inverted-trapezoid': 'trap-t',
  'double-circle': 'dbl-circ',
  'notched-rectangle': 'notch-rect',
  'lined-rectangle': 'lin-rect',
  'small-circle': 'sm-circ',
  'framed-circle': 'framed-circle',
  'fork': 'fork',
  'hourglass': 'hourglass',
  'comment': 'comment',
  'brace-right': 'brace-r',
  'braces': 'braces',
  'bolt': 'bolt',
  'document': 'doc',
  'delay': 'delay',
  'horizontal-cylinder': 'das',
  'lined-cylinder': 'lin-cyl',
  'triangle': 'tri',
  'documents': 'docs',
  'processes': 'processes',
  'flag': 'flag',
  'text': 'text',
};

export const FLOWCHART_ARROW_SHAPES = ['normal', 'circle', 'cross', 'open'] as const;
export type FlowchartArrowShape = (typeof FLOWCHART_ARROW_SHAPES)[number];

export interface ArrowHeads {
  left: string;
  right: string;
}

export const FLOWCHART_ARROW_HEADS: Record<FlowchartArrowShape, ArrowHeads> = {
  normal: { left: '<', right: '>' },
  circle: { left: 'o', right: 'o' },
  cross: { left: 'x', right: 'x' },
  open: { left: '', right: '' },
};

export const FLOWCHART_LINE_STYLES = ['solid', 'thick', 'dashed'] as const;
export type FlowchartLineStyle = (typeof FLOWCHART_LINE_STYLES)[number];

/**
 * A node with subnodes renders as a `subgraph` block around them; its shape is
 * not drawn and `direction` only applies there.
 */
export interface FlowchartNodeAttributes extends NodeAttributes {
  shape: FlowchartShape;
  subnodes: readonly NodeId[];
  direction?: Direction;
  click?: Readonly<ClickEvent>;
}

export interface FlowchartEdge extends EdgeAttributes {
  arrow: FlowchartArrowShape;
  leftArrow?: FlowchartArrowShape;
  lineStyle: FlowchartLineStyle;
  length: number;
}

export type FlowchartNode = NodeDescriptor<FlowchartNodeAttributes>;
export type FlowchartDiagram = Diagram<'flowchart', FlowchartNodeAttributes, FlowchartEdge, FlowchartConfig>;
