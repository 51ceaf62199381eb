import type { ClassDiagram } from '../diagrams/class/types.js';
import type { ERDiagram } from '../diagrams/er/types.js';
import type { FlowchartDiagram } from '../diagrams/flowchart/types.js';
import { ClassRenderer } from './class-renderer.js';
import { ERRenderer } from './er-renderer.js';
import { FlowchartRenderer } from './flowchart-renderer.js';

export type { IRenderer } from './interfaces.js';
export { FlowchartRenderer, flowchartArrowToken } from './flowchart-renderer.js';
export { ClassRenderer, classArrowToken } from './class-renderer.js';
export { ERRenderer, erRelationToken } from './er-renderer.js';
export { escapeLabel } from './utils.js';

export type AnyDiagram = FlowchartDiagram | ClassDiagram | ERDiagram;

const flowchartRenderer = new FlowchartRenderer();
const classRenderer = new ClassRenderer();
const erRenderer = new ERRenderer();

/**
 * Render any finalized diagram with the built-in renderer for its dialect
 */
export function renderDiagram(diagram: AnyDiagram): string {
  switch (diagram.dialect) {
    case 'flowchart':
      return flowchartRenderer.render(diagram);
    case 'class':
      return classRenderer.render(diagram);
    case 'er':
      return erRenderer.render(diagram);
  }
}
