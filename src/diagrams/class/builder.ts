import { validateClick, type ClickEvent } from '../../core/click.js';
import { ClassDiagramConfigSchema, parseConfig, type ClassDiagramConfig, type ClassDiagramConfigInput } from '../../core/config.js';
import type { DialectDefinition } from '../../core/diagram.js';
import { requireText } from '../../core/errors.js';
import { GraphBuilder } from '../../core/graph-builder.js';
import type { NodeId } from '../../core/ids.js';
import type { EdgeBuilder, NodeBuilder } from '../../core/types.js';
import { ClassRenderer } from '../../renderer/class-renderer.js';
import type {
  ClassArrowShape,
  ClassAttributeSpec,
  ClassEdge,
  ClassLineStyle,
  ClassMethodSpec,
  ClassNodeAttributes,
  Multiplicity,
} from './types.js';
import {
  formatAttribute,
  formatMethod,
  requireBodyText,
  validateClassEdge,
  validateClassNode,
  type ClassEdgeDraft,
  type ClassNodeDraft,
} from './validate.js';

export class ClassNodeBuilder implements NodeBuilder<ClassNodeAttributes> {
  private readonly draft: ClassNodeDraft = { members: [] };

  setLabel(label: string): this {
    this.draft.label = requireText('label', label);
    return this;
  }

  /** Rendered as `<<annotation>>` on the first line of the class body */
  setAnnotation(annotation: string): this {
    this.draft.annotation = requireBodyText('annotation', annotation);
    return this;
  }

  /** Raw member line, kept verbatim apart from line breaks */
  addMember(member: string): this {
    this.draft.members.push(requireBodyText('member', member));
    return this;
  }

  addAttribute(attribute: ClassAttributeSpec): this {
    this.draft.members.push(formatAttribute(attribute));
    return this;
  }

  addMethod(method: ClassMethodSpec): this {
    this.draft.members.push(formatMethod(method));
    return this;
  }

  setClick(click: ClickEvent): this {
    this.draft.click = validateClick(click);
    return this;
  }

  build(): ClassNodeAttributes {
    return validateClassNode(this.draft);
  }
}

export class ClassEdgeBuilder implements EdgeBuilder<ClassEdge> {
  private readonly draft: ClassEdgeDraft = { lineStyle: 'solid' };

  setSource(id: NodeId): this {
    this.draft.source = id;
    return this;
  }

  setDestination(id: NodeId): this {
    this.draft.destination = id;
    return this;
  }

  setArrowShape(shape: ClassArrowShape): this {
    this.draft.arrow = shape;
    return this;
  }

  setLeftArrowShape(shape: ClassArrowShape): this {
    this.draft.leftArrow = shape;
    return this;
  }

  setLineStyle(style: ClassLineStyle): this {
    this.draft.lineStyle = style;
    return this;
  }

  setMultiplicities(left?: Multiplicity, right?: Multiplicity): this {
    this.draft.leftMultiplicity = left;
    this.draft.rightMultiplicity = right;
    return this;
  }

  setLabel(label: string): this {
    this.draft.label = requireText('label', label);
    return this;
  }

  build(): ClassEdge {
    return validateClassEdge(this.draft);
  }
}

export type ClassDiagramBuilder = GraphBuilder<'class', ClassNodeAttributes, ClassEdge, ClassDiagramConfig>;

const CLASS_DIAGRAM: DialectDefinition<'class', ClassNodeAttributes, ClassEdge, ClassDiagramConfig> = {
  dialect: 'class',
  renderer: new ClassRenderer(),
};

export function createClassDiagramBuilder(config: ClassDiagramConfigInput = {}): ClassDiagramBuilder {
  return new GraphBuilder(CLASS_DIAGRAM, parseConfig(ClassDiagramConfigSchema, config));
}
