// Public SDK surface for programmatic use
// Core types
export type {
  Dialect,
  NodeAttributes,
  EdgeAttributes,
  NodeDescriptor,
  EdgeDescriptor,
  NodeBuilder,
  EdgeBuilder,
} from './core/types.js';
export { NodeId, IdAllocator, nodeRef } from './core/ids.js';
export { GraphBuilder } from './core/graph-builder.js';
export { Diagram, type DialectDefinition } from './core/diagram.js';
export type { ClickEvent } from './core/click.js';

// Errors
export { BuildError, BUILD_ERROR_CODES, isBuildError, type BuildErrorKind } from './core/errors.js';

// Configuration
export {
  DIRECTIONS,
  THEMES,
  LOOKS,
  LAYOUT_RENDERERS,
  CURVE_STYLES,
  FlowchartConfigSchema,
  ClassDiagramConfigSchema,
  ERDiagramConfigSchema,
  parseConfig,
} from './core/config.js';
export type {
  Direction,
  Theme,
  Look,
  LayoutRenderer,
  CurveStyle,
  FlowchartConfig,
  FlowchartConfigInput,
  ClassDiagramConfig,
  ClassDiagramConfigInput,
  ERDiagramConfig,
  ERDiagramConfigInput,
} from './core/config.js';
export { renderFrontmatter, type FrontmatterBlock } from './core/frontmatter.js';

// Dialects
export * from './diagrams/flowchart/types.js';
export { FlowchartNodeBuilder, FlowchartEdgeBuilder, createFlowchartBuilder, type FlowchartBuilder } from './diagrams/flowchart/builder.js';
export * from './diagrams/class/types.js';
export { ClassNodeBuilder, ClassEdgeBuilder, createClassDiagramBuilder, type ClassDiagramBuilder } from './diagrams/class/builder.js';
export * from './diagrams/er/types.js';
export { ERNodeBuilder, EREdgeBuilder, createERDiagramBuilder, type ERDiagramBuilder } from './diagrams/er/builder.js';

// Rendering
export * from './renderer/index.js';

// Documents
export {
  DiagramDocumentSchema,
  parseDiagramDocument,
  type DiagramDocument,
  type DiagramDocumentInput,
} from './core/document.js';
export { buildDiagram, renderDocument } from './core/router.js';
export { describeFailure, textReport, toJsonResult, type FileResult, type JsonFileResult, type RenderFailure } from './core/format.js';
