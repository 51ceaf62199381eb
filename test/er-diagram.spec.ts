import { describe, expect, it } from 'vitest';
import { createERDiagramBuilder, EREdgeBuilder, ERNodeBuilder } from '../src/diagrams/er/builder.js';
import { CARDINALITIES, CARDINALITY_TOKENS } from '../src/diagrams/er/types.js';
import { erRelationToken } from '../src/renderer/er-renderer.js';
import { catchBuildError } from './helpers.js';

const HEADER =
  '---\n' +
  'config:\n' +
  '  layout: dagre\n' +
  '  theme: default\n' +
  '  look: classic\n' +
  '---\n' +
  'erDiagram\n' +
  '  direction LR\n';

describe('ER diagram rendering', () => {
  it('renders a one-or-more relationship built with the helper', () => {
    const graph = createERDiagramBuilder();
    const customer = graph.addNode(new ERNodeBuilder().setLabel('CUSTOMER'));
    const order = graph.addNode(new ERNodeBuilder().setLabel('ORDER'));
    graph.addEdge(EREdgeBuilder.oneOrMore(customer, order));

    expect(graph.finalize().render()).toBe(
      HEADER +
      '  v0["CUSTOMER"]\n' +
      '  v1["ORDER"]\n' +
      '  v0 }|--|{ v1 : ""\n',
    );
  });

  it('renders attributes with keys and comments', () => {
    const graph = createERDiagramBuilder();
    graph.addNode(
      new ERNodeBuilder()
        .setLabel('CUSTOMER')
        .addAttribute({ type: 'string', name: 'id', keys: ['PK'] })
        .addAttribute({ type: 'string', name: 'email', keys: ['UK'], comment: 'login "name"' })
        .addAttribute({ type: 'int', name: 'region_id', keys: ['FK', 'FK', 'UK'] })
        .addAttribute({ type: 'varchar(255)', name: 'notes' }),
    );

    expect(graph.finalize().render()).toBe(
      HEADER +
      '  v0["CUSTOMER"] {\n' +
      '    string id PK\n' +
      '    string email UK "login #quot;name#quot;"\n' +
      '    int region_id FK, UK\n' +
      '    varchar(255) notes\n' +
      '  }\n',
    );
  });

  it('renders labelled and non-identifying relationships', () => {
    const graph = createERDiagramBuilder({ direction: 'TB' });
    const customer = graph.addNode(new ERNodeBuilder().setLabel('CUSTOMER'));
    const order = graph.addNode(new ERNodeBuilder().setLabel('ORDER'));
    graph.addEdge(EREdgeBuilder.zeroOrMore(customer, order).setLabel('places'));
    graph.addEdge(
      new EREdgeBuilder()
        .setSource(order)
        .setDestination(customer)
        .setCardinality('exactly-one', 'zero-or-one')
        .setIdentifying(false)
        .setLabel('billed to'),
    );

    const lines = graph.finalize().render().split('\n');
    expect(lines[7]).toBe('  direction TB');
    expect(lines[10]).toBe('  v0 }o--o{ v1 : "places"');
    expect(lines[11]).toBe('  v1 ||..o| v0 : "billed to"');
  });
});

describe('ER cardinalities', () => {
  it('maps every cardinality to distinct tokens on each side', () => {
    const left = CARDINALITIES.map((c) => CARDINALITY_TOKENS[c].left);
    const right = CARDINALITIES.map((c) => CARDINALITY_TOKENS[c].right);
    expect(left).toEqual(['||', '|o', '}|', '}o']);
    expect(right).toEqual(['||', 'o|', '|{', 'o{']);
  });

  it('builds symmetric relationships from the helpers', () => {
    const graph = createERDiagramBuilder();
    const a = graph.addNode(new ERNodeBuilder().setLabel('A'));
    const b = graph.addNode(new ERNodeBuilder().setLabel('B'));
    const tokens = [
      EREdgeBuilder.exactlyOne(a, b),
      EREdgeBuilder.zeroOrOne(a, b),
      EREdgeBuilder.oneOrMore(a, b),
      EREdgeBuilder.zeroOrMore(a, b),
    ].map((builder) => erRelationToken(builder.build()));
    expect(tokens).toEqual(['||--||', '|o--o|', '}|--|{', '}o--o{']);
  });

  it('leaves endpoints open on the helpers until they are set', () => {
    const graph = createERDiagramBuilder();
    const a = graph.addNode(new ERNodeBuilder().setLabel('A'));
    const err = catchBuildError(() => graph.addEdge(EREdgeBuilder.oneOrMore().setSource(a)));
    expect(err.kind).toBe('MissingField');
    expect(err.field).toBe('destination');
  });
});

describe('ER builders', () => {
  it('requires a cardinality', () => {
    const graph = createERDiagramBuilder();
    const a = graph.addNode(new ERNodeBuilder().setLabel('A'));
    const err = catchBuildError(() => graph.addEdge(new EREdgeBuilder().setSource(a).setDestination(a)));
    expect(err.kind).toBe('MissingField');
    expect(err.field).toBe('relationship');
    expect(graph.edgeCount).toBe(0);
  });

  it('rejects attribute names with spaces', () => {
    const err = catchBuildError(() => new ERNodeBuilder().addAttribute({ type: 'string', name: 'first name' }));
    expect(err.kind).toBe('InvalidValue');
    expect(err.field).toBe('attribute.name');
  });

  it('rejects blank attribute fields', () => {
    expect(catchBuildError(() => new ERNodeBuilder().addAttribute({ type: '', name: 'id' })).field).toBe('attribute.type');
    expect(catchBuildError(() => new ERNodeBuilder().addAttribute({ type: 'int', name: 'id', comment: ' ' })).field).toBe('attribute.comment');
  });
});
