import { validateClick, type ClickEvent } from '../../core/click.js';
import {
  FlowchartConfigSchema,
  parseConfig,
  type Direction,
  type FlowchartConfig,
  type FlowchartConfigInput,
} from '../../core/config.js';
import type { DialectDefinition } from '../../core/diagram.js';
import { invalidValue, requireText } from '../../core/errors.js';
import { GraphBuilder } from '../../core/graph-builder.js';
import type { NodeId } from '../../core/ids.js';
import type { EdgeBuilder, NodeBuilder } from '../../core/types.js';
import { FlowchartRenderer } from '../../renderer/flowchart-renderer.js';
import type { FlowchartArrowShape, FlowchartEdge, FlowchartLineStyle, FlowchartNodeAttributes, FlowchartShape } from './types.js';
import {
  validateFlowchartEdge,
  validateFlowchartLength,
  validateFlowchartNode,
  type FlowchartEdgeDraft,
  type FlowchartNodeDraft,
} from './validate.js';

export class FlowchartNodeBuilder implements NodeBuilder<FlowchartNodeAttributes> {
  private readonly draft: FlowchartNodeDraft = { shape: 'rectangle', subnodes: [] };

  setLabel(label: string): this {
    this.draft.label = requireText('label', label);
    return this;
  }

  setShape(shape: FlowchartShape): this {
    this.draft.shape = shape;
    return this;
  }

  /**
   * Nest an already added node inside this one, turning it into a subgraph.
   * The graph builder checks the id when this node is added.
   */
  addSubnode(id: NodeId): this {
    if (this.draft.subnodes.includes(id)) {
      throw invalidValue('subnodes', `Node '${id}' is already a subnode of this node.`);
    }
    this.draft.subnodes.push(id);
    return this;
  }

  /** Layout direction inside the subgraph */
  setDirection(direction: Direction): this {
    this.draft.direction = direction;
    return this;
  }

  setClick(click: ClickEvent): this {
    this.draft.click = validateClick(click);
    return this;
  }

  build(): FlowchartNodeAttributes {
    return validateFlowchartNode(this.draft);
  }
}

export class FlowchartEdgeBuilder implements EdgeBuilder<FlowchartEdge> {
  private readonly draft: FlowchartEdgeDraft = { lineStyle: 'solid', length: 1 };

  setSource(id: NodeId): this {
    this.draft.source = id;
    return this;
  }

  setDestination(id: NodeId): this {
    this.draft.destination = id;
    return this;
  }

  setArrowShape(shape: FlowchartArrowShape): this {
    this.draft.arrow = shape;
    return this;
  }

  /** Adds a head at the source end, making the link bidirectional */
  setLeftArrowShape(shape: FlowchartArrowShape): this {
    this.draft.leftArrow = shape;
    return this;
  }

  setLineStyle(style: FlowchartLineStyle): this {
    this.draft.lineStyle = style;
    return this;
  }

  setLength(length: number): this {
    this.draft.length = validateFlowchartLength(length);
    return this;
  }

  setLabel(label: string): this {
    this.draft.label = requireText('label', label);
    return this;
  }

  build(): FlowchartEdge {
    return validateFlowchartEdge(this.draft);
  }
}

export type FlowchartBuilder = GraphBuilder<'flowchart', FlowchartNodeAttributes, FlowchartEdge, FlowchartConfig>;

const FLOWCHART: DialectDefinition<'flowchart', FlowchartNodeAttributes, FlowchartEdge, FlowchartConfig> = {
  dialect: 'flowchart',
  renderer: new FlowchartRenderer(),
  children: (attributes) => attributes.subnodes,
};

export function createFlowchartBuilder(config: FlowchartConfigInput = {}): FlowchartBuilder {
  return new GraphBuilder(FLOWCHART, parseConfig(FlowchartConfigSchema, config));
}
