import { describe, expect, it } from 'vitest';
import { renderFrontmatter, yamlScalar } from '../src/core/frontmatter.js';
import { escapeLabel, flattenLine } from '../src/renderer/utils.js';

describe('renderFrontmatter', () => {
  it('writes nested blocks in insertion order and skips unset keys', () => {
    expect(
      renderFrontmatter({
        title: 'Sales: Q3',
        config: { theme: 'neo-dark', nested: { flag: true, size: 3 }, skipped: undefined },
      }),
    ).toEqual([
      '---',
      'title: "Sales: Q3"',
      'config:',
      '  theme: neo-dark',
      '  nested:',
      '    flag: true',
      '    size: 3',
      '---',
    ]);
  });
});

describe('yamlScalar', () => {
  it('leaves simple words bare', () => {
    expect(yamlScalar('handDrawn')).toBe('handDrawn');
    expect(yamlScalar('dagre')).toBe('dagre');
    expect(yamlScalar('v1.5')).toBe('v1.5');
    expect(yamlScalar(false)).toBe('false');
  });

  it('quotes strings a YAML reader would turn into null, bool or number', () => {
    expect(yamlScalar('null')).toBe('"null"');
    expect(yamlScalar('NULL')).toBe('"NULL"');
    expect(yamlScalar('~')).toBe('"~"');
    expect(yamlScalar('True')).toBe('"True"');
    expect(yamlScalar('false')).toBe('"false"');
    expect(yamlScalar('.inf')).toBe('".inf"');
    expect(yamlScalar('-.INF')).toBe('"-.INF"');
    expect(yamlScalar('.NaN')).toBe('".NaN"');
    expect(yamlScalar('2024')).toBe('"2024"');
    expect(yamlScalar('1.5')).toBe('"1.5"');
    expect(yamlScalar('-3')).toBe('"-3"');
    expect(yamlScalar('1e10')).toBe('"1e10"');
    expect(yamlScalar('0x1F')).toBe('"0x1F"');
    expect(yamlScalar('0o17')).toBe('"0o17"');
  });

  it('keeps a string title a string in the emitted block', () => {
    expect(renderFrontmatter({ title: 'null' })).toEqual(['---', 'title: "null"', '---']);
    expect(renderFrontmatter({ title: '2024' })).toEqual(['---', 'title: "2024"', '---']);
  });

  it('quotes everything else', () => {
    expect(yamlScalar('two words')).toBe('"two words"');
    expect(yamlScalar('say "x"')).toBe('"say \\"x\\""');
    expect(yamlScalar('')).toBe('""');
  });
});

describe('label escaping', () => {
  it('replaces quotes and every kind of line break', () => {
    expect(escapeLabel('a\r\nb\rc\nd')).toBe('a<br>b<br>c<br>d');
    expect(escapeLabel('"quoted"')).toBe('#quot;quoted#quot;');
  });

  it('flattens member lines', () => {
    expect(flattenLine('a\r\nb')).toBe('a b');
  });
});
