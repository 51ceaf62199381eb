import { ClassEdgeBuilder, ClassNodeBuilder, createClassDiagramBuilder } from '../diagrams/class/builder.js';
import type { ClassDiagram } from '../diagrams/class/types.js';
import { createERDiagramBuilder, EREdgeBuilder, ERNodeBuilder } from '../diagrams/er/builder.js';
import type { ERDiagram } from '../diagrams/er/types.js';
import { createFlowchartBuilder, FlowchartEdgeBuilder, FlowchartNodeBuilder } from '../diagrams/flowchart/builder.js';
import type { FlowchartDiagram } from '../diagrams/flowchart/types.js';
import { renderDiagram, type AnyDiagram } from '../renderer/index.js';
import {
  parseDiagramDocument,
  type ClassDocument,
  type DiagramDocument,
  type ERDocument,
  type FlowchartDocument,
} from './document.js';
import { invalidValue, unknownNodeReference } from './errors.js';
import type { NodeId } from './ids.js';

/** Maps document keys to the ids the builder handed out */
class NodeKeys {
  private readonly ids = new Map<string, NodeId>();

  claim(key: string): void {
    if (this.ids.has(key)) {
      throw invalidValue('nodes', `Duplicate node key '${key}'.`, 'Every node needs its own key.');
    }
  }

  register(key: string, id: NodeId): void {
    this.ids.set(key, id);
  }

  resolve(key: string): NodeId {
    const id = this.ids.get(key);
    if (!id) throw unknownNodeReference(key);
    return id;
  }
}

function buildFlowchart(doc: FlowchartDocument): FlowchartDiagram {
  const graph = createFlowchartBuilder(doc.config);
  const keys = new NodeKeys();
  for (const node of doc.nodes) {
    keys.claim(node.key);
    const builder = new FlowchartNodeBuilder().setLabel(node.label);
    if (node.shape) builder.setShape(node.shape);
    for (const key of node.subnodes ?? []) builder.addSubnode(keys.resolve(key));
    if (node.direction) builder.setDirection(node.direction);
    if (node.click) builder.setClick(node.click);
    keys.register(node.key, graph.addNode(builder));
  }
  for (const edge of doc.edges) {
    const builder = new FlowchartEdgeBuilder()
      .setSource(keys.resolve(edge.from))
      .setDestination(keys.resolve(edge.to));
    if (edge.arrow) builder.setArrowShape(edge.arrow);
    if (edge.leftArrow) builder.setLeftArrowShape(edge.leftArrow);
    if (edge.lineStyle) builder.setLineStyle(edge.lineStyle);
    if (edge.length !== undefined) builder.setLength(edge.length);
    if (edge.label !== undefined) builder.setLabel(edge.label);
    graph.addEdge(builder);
  }
  return graph.finalize();
}

function buildClassDiagram(doc: ClassDocument): ClassDiagram {
  const graph = createClassDiagramBuilder(doc.config);
  const keys = new NodeKeys();
  for (const node of doc.nodes) {
    keys.claim(node.key);
    const builder = new ClassNodeBuilder().setLabel(node.label);
    if (node.annotation !== undefined) builder.setAnnotation(node.annotation);
    for (const member of node.members ?? []) builder.addMember(member);
    for (const attribute of node.attributes ?? []) builder.addAttribute(attribute);
    for (const method of node.methods ?? []) builder.addMethod(method);
    if (node.click) builder.setClick(node.click);
    keys.register(node.key, graph.addNode(builder));
  }
  for (const edge of doc.edges) {
    const builder = new ClassEdgeBuilder()
      .setSource(keys.resolve(edge.from))
      .setDestination(keys.resolve(edge.to))
      .setMultiplicities(edge.leftMultiplicity, edge.rightMultiplicity);
    if (edge.arrow) builder.setArrowShape(edge.arrow);
    if (edge.leftArrow) builder.setLeftArrowShape(edge.leftArrow);
    if (edge.lineStyle) builder.setLineStyle(edge.lineStyle);
    if (edge.label !== undefined) builder.setLabel(edge.label);
    graph.addEdge(builder);
  }
  return graph.finalize();
}

function buildERDiagram(doc: ERDocument): ERDiagram {
  const graph = createERDiagramBuilder(doc.config);
  const keys = new NodeKeys();
  for (const node of doc.nodes) {
    keys.claim(node.key);
    const builder = new ERNodeBuilder().setLabel(node.label);
    for (const attribute of node.attributes ?? []) builder.addAttribute(attribute);
    keys.register(node.key, graph.addNode(builder));
  }
  for (const edge of doc.edges) {
    const builder = new EREdgeBuilder()
      .setSource(keys.resolve(edge.from))
      .setDestination(keys.resolve(edge.to));
    if (typeof edge.cardinality === 'string') {
      builder.setCardinality(edge.cardinality, edge.cardinality);
    } else if (edge.cardinality) {
      builder.setCardinality(edge.cardinality.left, edge.cardinality.right);
    }
    if (edge.identifying !== undefined) builder.setIdentifying(edge.identifying);
    if (edge.label !== undefined) builder.setLabel(edge.label);
    graph.addEdge(builder);
  }
  return graph.finalize();
}

/**
 * Replay a parsed document through the builder of its dialect.
 * Builder errors propagate unchanged.
 */
export function buildDiagram(doc: DiagramDocument): AnyDiagram {
  switch (doc.type) {
    case 'flowchart':
      return buildFlowchart(doc);
    case 'class':
      return buildClassDiagram(doc);
    case 'er':
      return buildERDiagram(doc);
  }
}

/** Validate, build and render a JSON diagram document in one call */
export function renderDocument(input: unknown): string {
  return renderDiagram(buildDiagram(parseDiagramDocument(input)));
}
