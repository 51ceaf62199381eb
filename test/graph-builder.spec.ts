import { describe, expect, it } from 'vitest';
import type { DialectDefinition } from '../src/core/diagram.js';
import { GraphBuilder } from '../src/core/graph-builder.js';
import { NodeId } from '../src/core/ids.js';
import type { EdgeAttributes, NodeAttributes } from '../src/core/types.js';
import { createFlowchartBuilder, FlowchartEdgeBuilder, FlowchartNodeBuilder } from '../src/diagrams/flowchart/builder.js';
import { renderDiagram } from '../src/renderer/index.js';
import { catchBuildError } from './helpers.js';

const node = (label: string) => new FlowchartNodeBuilder().setLabel(label);
const link = (from: NodeId, to: NodeId) =>
  new FlowchartEdgeBuilder().setSource(from).setDestination(to).setArrowShape('normal');

describe('GraphBuilder', () => {
  it('returns ids 0..n-1 in append order', () => {
    const graph = createFlowchartBuilder();
    const ids = ['a', 'b', 'c', 'd', 'e'].map((label) => graph.addNode(node(label)));
    expect(ids.map((id) => id.index)).toEqual([0, 1, 2, 3, 4]);
    const diagram = graph.finalize();
    expect(diagram.nodes.map((n) => n.id)).toEqual(ids);
    expect(diagram.nodes.map((n) => n.label)).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('rejects a node without a label and consumes no id', () => {
    const graph = createFlowchartBuilder();
    const err = catchBuildError(() => graph.addNode(new FlowchartNodeBuilder()));
    expect(err.kind).toBe('MissingField');
    expect(err.field).toBe('label');
    expect(err.code).toBe('GEN-MISSING-FIELD');
    expect(graph.nodeCount).toBe(0);
    expect(graph.addNode(node('first')).index).toBe(0);
  });

  it('names the missing field of an incomplete edge', () => {
    const graph = createFlowchartBuilder();
    const a = graph.addNode(node('a'));
    const b = graph.addNode(node('b'));

    expect(catchBuildError(() => graph.addEdge(new FlowchartEdgeBuilder().setDestination(b).setArrowShape('normal'))).field).toBe('source');
    expect(catchBuildError(() => graph.addEdge(new FlowchartEdgeBuilder().setSource(a).setArrowShape('normal'))).field).toBe('destination');
    const noArrow = catchBuildError(() => graph.addEdge(new FlowchartEdgeBuilder().setSource(a).setDestination(b)));
    expect(noArrow.kind).toBe('MissingField');
    expect(noArrow.field).toBe('relationship');
    expect(graph.edgeCount).toBe(0);
  });

  it('rejects ids issued by another builder', () => {
    const graph = createFlowchartBuilder();
    const other = createFlowchartBuilder();
    const a = graph.addNode(node('a'));
    const foreign = other.addNode(node('x'));

    const err = catchBuildError(() => graph.addEdge(link(a, foreign)));
    expect(err.kind).toBe('UnknownNodeReference');
    expect(err.reference).toBe('v0');
    expect(err.message).toBe("Unknown node 'v0' used as edge destination.");
    expect(graph.edgeCount).toBe(0);
  });

  it('rejects fabricated ids even when the index exists', () => {
    const graph = createFlowchartBuilder();
    const a = graph.addNode(node('a'));
    graph.addNode(node('b'));

    const err = catchBuildError(() => graph.addEdge(link(new NodeId(1), a)));
    expect(err.kind).toBe('UnknownNodeReference');
    expect(err.message).toBe("Unknown node 'v1' used as edge source.");
    expect(graph.hasNode(new NodeId(0))).toBe(false);
    expect(graph.hasNode(a)).toBe(true);
  });

  it('accepts self loops', () => {
    const graph = createFlowchartBuilder();
    const a = graph.addNode(node('a'));
    graph.addEdge(link(a, a));
    expect(graph.finalize().render()).toBe('flowchart LR\n  v0@{shape: rect, label: "a"}\n  v0 ---> v0\n');
  });

  it('seals the builder on finalize', () => {
    const graph = createFlowchartBuilder();
    const a = graph.addNode(node('a'));
    const diagram = graph.finalize();

    expect(graph.finalized).toBe(true);
    expect(graph.finalize()).toBe(diagram);
    expect(catchBuildError(() => graph.addNode(node('b'))).kind).toBe('BuilderFinalized');
    expect(catchBuildError(() => graph.addEdge(link(a, a))).code).toBe('GEN-BUILDER-FINALIZED');
    expect(diagram.nodes).toHaveLength(1);
  });

  it('produces a frozen snapshot', () => {
    const graph = createFlowchartBuilder();
    const a = graph.addNode(node('a'));
    graph.addEdge(link(a, a));
    const diagram = graph.finalize();

    expect(Object.isFrozen(diagram)).toBe(true);
    expect(Object.isFrozen(diagram.nodes)).toBe(true);
    expect(Object.isFrozen(diagram.nodes[0])).toBe(true);
    expect(Object.isFrozen(diagram.edges)).toBe(true);
    expect(Object.isFrozen(diagram.edges[0])).toBe(true);
    expect(Object.isFrozen(diagram.configuration)).toBe(true);
  });

  it('renders the same text every time', () => {
    const graph = createFlowchartBuilder();
    const a = graph.addNode(node('a'));
    const b = graph.addNode(node('b'));
    graph.addEdge(link(a, b));
    const diagram = graph.finalize();

    const first = diagram.render();
    expect(diagram.render()).toBe(first);
    expect(renderDiagram(diagram)).toBe(first);
  });

  it('works with any dialect definition', () => {
    interface Tagged extends NodeAttributes {
      tag: string;
    }
    const definition: DialectDefinition<'er', Tagged, EdgeAttributes, { prefix: string }> = {
      dialect: 'er',
      renderer: {
        render: (d) => d.nodes.map((n) => `${d.configuration.prefix}${n.id}:${n.tag}`).join(','),
      },
    };
    const graph = new GraphBuilder(definition, { prefix: '#' });
    const x = graph.addNode({ build: () => ({ label: 'x', tag: 'first' }) });
    const y = graph.addNode({ build: () => ({ label: 'y', tag: 'second' }) });
    graph.addEdge({ build: () => ({ source: x, destination: y }) });

    expect(graph.dialect).toBe('er');
    expect(graph.edgeCount).toBe(1);
    expect(graph.finalize().render()).toBe('#v0:first,#v1:second');
  });
});
