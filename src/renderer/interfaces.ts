/**
 * Interface for renderers that generate Mermaid text from a finalized diagram
 */
export interface IRenderer<TDiagram> {
  /**
   * Generate the Mermaid document for a diagram
   * @param diagram The finalized diagram
   * @returns Mermaid source, every line terminated by a line feed
   */
  render(diagram: TDiagram): string;
}
