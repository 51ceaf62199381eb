import { ERDiagramConfigSchema, parseConfig, type ERDiagramConfig, type ERDiagramConfigInput } from '../../core/config.js';
import type { DialectDefinition } from '../../core/diagram.js';
import { requireText } from '../../core/errors.js';
import { GraphBuilder } from '../../core/graph-builder.js';
import type { NodeId } from '../../core/ids.js';
import type { EdgeBuilder, NodeBuilder } from '../../core/types.js';
import { ERRenderer } from '../../renderer/er-renderer.js';
import type { Cardinality, ERAttributeSpec, EREdge, ERNodeAttributes } from './types.js';
import { validateERAttribute, validateEREdge, validateERNode, type EREdgeDraft, type ERNodeDraft } from './validate.js';

export class ERNodeBuilder implements NodeBuilder<ERNodeAttributes> {
  private readonly draft: ERNodeDraft = { attributes: [] };

  setLabel(label: string): this {
    this.draft.label = requireText('label', label);
    return this;
  }

  addAttribute(attribute: ERAttributeSpec): this {
    this.draft.attributes.push(validateERAttribute(attribute));
    return this;
  }

  build(): ERNodeAttributes {
    return validateERNode(this.draft);
  }
}

export class EREdgeBuilder implements EdgeBuilder<EREdge> {
  private readonly draft: EREdgeDraft = { identifying: true };

  static exactlyOne(source?: NodeId, destination?: NodeId): EREdgeBuilder {
    return EREdgeBuilder.symmetric('exactly-one', source, destination);
  }

  static zeroOrOne(source?: NodeId, destination?: NodeId): EREdgeBuilder {
    return EREdgeBuilder.symmetric('zero-or-one', source, destination);
  }

  static oneOrMore(source?: NodeId, destination?: NodeId): EREdgeBuilder {
    return EREdgeBuilder.symmetric('one-or-more', source, destination);
  }

  static zeroOrMore(source?: NodeId, destination?: NodeId): EREdgeBuilder {
    return EREdgeBuilder.symmetric('zero-or-more', source, destination);
  }

  private static symmetric(cardinality: Cardinality, source?: NodeId, destination?: NodeId): EREdgeBuilder {
    const builder = new EREdgeBuilder().setCardinality(cardinality, cardinality);
    if (source) builder.setSource(source);
    if (destination) builder.setDestination(destination);
    return builder;
  }

  setSource(id: NodeId): this {
    this.draft.source = id;
    return this;
  }

  setDestination(id: NodeId): this {
    this.draft.destination = id;
    return this;
  }

  setCardinality(left: Cardinality, right: Cardinality): this {
    this.draft.cardinality = { left, right };
    return this;
  }

  setIdentifying(identifying: boolean): this {
    this.draft.identifying = identifying;
    return this;
  }

  setLabel(label: string): this {
    this.draft.label = requireText('label', label);
    return this;
  }

  build(): EREdge {
    return validateEREdge(this.draft);
  }
}

export type ERDiagramBuilder = GraphBuilder<'er', ERNodeAttributes, EREdge, ERDiagramConfig>;

const ER_DIAGRAM: DialectDefinition<'er', ERNodeAttributes, EREdge, ERDiagramConfig> = {
  dialect: 'er',
  renderer: new ERRenderer(),
};

export function createERDiagramBuilder(config: ERDiagramConfigInput = {}): ERDiagramBuilder {
  return new GraphBuilder(ER_DIAGRAM, parseConfig(ERDiagramConfigSchema, config));
}
