// Minimal frontmatter emitter for Mermaid-style YAML blocks.
// Covers the nested scalar maps the renderers write without pulling a full YAML library.

export type FrontmatterScalar = string | number | boolean;

export interface FrontmatterBlock {
  [key: string]: FrontmatterScalar | FrontmatterBlock | undefined;
}

const BARE_SCALAR = /^[A-Za-z0-9_.\-]+$/;

// Plain scalars a YAML 1.2 core-schema reader resolves to null, bool or float
const YAML_KEYWORD = /^(?:~|null|Null|NULL|true|True|TRUE|false|False|FALSE|[-+]?\.(?:inf|Inf|INF)|\.(?:nan|NaN|NAN))$/;
const YAML_NUMBER = /^(?:[-+]?(?:\.[0-9]+|[0-9]+(?:\.[0-9]*)?)(?:[eE][-+]?[0-9]+)?|0o[0-7]+|0x[0-9a-fA-F]+)$/;

export function yamlScalar(value: FrontmatterScalar): string {
  if (typeof value !== 'string') return String(value);
  const plain = BARE_SCALAR.test(value) && !YAML_KEYWORD.test(value) && !YAML_NUMBER.test(value);
  // JSON strings are valid double-quoted YAML scalars
  return plain ? value : JSON.stringify(value);
}

function emitBlock(block: FrontmatterBlock, depth: number, out: string[]): void {
  const indent = '  '.repeat(depth);
  for (const [key, value] of Object.entries(block)) {
    if (value === undefined) continue; // unset keys are omitted
    if (typeof value === 'object') {
      out.push(`${indent}${key}:`);
      emitBlock(value, depth + 1, out);
    } else {
      out.push(`${indent}${key}: ${yamlScalar(value)}`);
    }
  }
}

/**
 * Render a frontmatter block, delimiters included. Keys keep insertion order.
 */
export function renderFrontmatter(block: FrontmatterBlock): string[] {
  const lines = ['---'];
  emitBlock(block, 0, lines);
  lines.push('---');
  return lines;
}
