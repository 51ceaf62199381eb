import type { ClickEvent } from '../../core/click.js';
import type { Direction } from '../../core/config.js';
import { invalidValue, requireField } from '../../core/errors.js';
import type { NodeId } from '../../core/ids.js';
import type { FlowchartArrowShape, FlowchartEdge, FlowchartLineStyle, FlowchartNodeAttributes, FlowchartShape } from './types.js';

export interface FlowchartNodeDraft {
  label?: string;
  shape: FlowchartShape;
  subnodes: NodeId[];
  direction?: Direction;
  click?: Readonly<ClickEvent>;
}

export interface FlowchartEdgeDraft {
  source?: NodeId;
  destination?: NodeId;
  arrow?: FlowchartArrowShape;
  leftArrow?: FlowchartArrowShape;
  lineStyle: FlowchartLineStyle;
  length: number;
  label?: string;
}

export const MAX_FLOWCHART_LENGTH = 255;

export function validateFlowchartLength(length: number): number {
  if (!Number.isInteger(length) || length < 1 || length > MAX_FLOWCHART_LENGTH) {
    throw invalidValue(
      'length',
      `Edge length must be an integer from 1 to ${MAX_FLOWCHART_LENGTH}, got ${length}.`,
      'Use 1 for the shortest link.',
    );
  }
  return length;
}

export function validateFlowchartNode(draft: FlowchartNodeDraft): FlowchartNodeAttributes {
  const node: FlowchartNodeAttributes = {
    label: requireField('label', draft.label, 'Call setLabel() before adding the node.'),
    shape: draft.shape,
    subnodes: Object.freeze([...draft.subnodes].sort((a, b) => a.index - b.index)),
  };
  const subgraph = draft.subnodes.length > 0;
  if (draft.direction !== undefined) {
    if (!subgraph) throw invalidValue('direction', 'Only a node with subnodes can set a direction.', 'Call addSubnode() first.');
    node.direction = draft.direction;
  }
  if (subgraph && draft.shape !== 'rectangle') {
    throw invalidValue('shape', `A subgraph has no shape, got '${draft.shape}'.`);
  }
  if (draft.click !== undefined) {
    if (subgraph) throw invalidValue('click', 'A subgraph cannot carry a click event.');
    node.click = draft.click;
  }
  return node;
}

export function validateFlowchartEdge(draft: FlowchartEdgeDraft): FlowchartEdge {
  const edge: FlowchartEdge = {
    source: requireField('source', draft.source, 'Call setSource() with an id returned by addNode().'),
    destination: requireField('destination', draft.destination, 'Call setDestination() with an id returned by addNode().'),
    arrow: requireField('relationship', draft.arrow, 'Call setArrowShape() before adding the edge.'),
    lineStyle: draft.lineStyle,
    length: validateFlowchartLength(draft.length),
  };
  if (draft.leftArrow !== undefined) edge.leftArrow = draft.leftArrow;
  if (draft.label !== undefined) edge.label = draft.label;
  return edge;
}
