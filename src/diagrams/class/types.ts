import type { ClickEvent } from '../../core/click.js';
import type { ClassDiagramConfig } from '../../core/config.js';
import type { Diagram } from '../../core/diagram.js';
import type { EdgeAttributes, NodeAttributes, NodeDescriptor } from '../../core/types.js';

export const CLASS_ARROW_SHAPES = ['normal', 'triangle', 'star', 'circle', 'open'] as const;
export type ClassArrowShape = (typeof CLASS_ARROW_SHAPES)[number];

// triangle = inheritance, star = composition, circle = aggregation
export const CLASS_ARROW_HEADS: Record<ClassArrowShape, { left: string; right: string }> = {
  normal: { left: '<', right: '>' },
  triangle: { left: '<|', right: '|>' },
  star: { left: '*', right: '*' },
  circle: { left: 'o', right: 'o' },
  open: { left: '', right: '' },
};

export const CLASS_LINE_STYLES = ['solid', 'dashed'] as const;
export type ClassLineStyle = (typeof CLASS_LINE_STYLES)[number];

export const CLASS_LINE_SEGMENTS: Record<ClassLineStyle, string> = {
  solid: '--',
  dashed: '..',
};

export const MULTIPLICITIES = ['one', 'zero-or-one', 'one-or-more', 'many', 'n', 'zero-to-n', 'one-to-n'] as const;
export type Multiplicity = (typeof MULTIPLICITIES)[number];

export const MULTIPLICITY_TOKENS: Record<Multiplicity, string> = {
  'one': '1',
  'zero-or-one': '0..1',
  'one-or-more': '1..*',
  'many': '*',
  'n': 'n',
  'zero-to-n': '0..n',
  'one-to-n': '1..n',
};

export const VISIBILITIES = ['public', 'private', 'protected', 'package'] as const;
export type Visibility = (typeof VISIBILITIES)[number];

export const VISIBILITY_TOKENS: Record<Visibility, string> = {
  public: '+',
  private: '-',
  protected: '#',
  package: '~',
};

export interface ClassAttributeSpec {
  name: string;
  type?: string;
  visibility?: Visibility;
}

export interface ClassParameterSpec {
  name: string;
  type?: string;
}

export interface ClassMethodSpec {
  name: string;
  parameters?: ClassParameterSpec[];
  returnType?: string;
  visibility?: Visibility;
}

export interface ClassNodeAttributes extends NodeAttributes {
  annotation?: string;
  members: readonly string[];
  click?: Readonly<ClickEvent>;
}

export interface ClassEdge extends EdgeAttributes {
  arrow: ClassArrowShape;
  leftArrow?: ClassArrowShape;
  lineStyle: ClassLineStyle;
  leftMultiplicity?: Multiplicity;
  rightMultiplicity?: Multiplicity;
}

export type ClassNode = NodeDescriptor<ClassNodeAttributes>;
export type ClassDiagram = Diagram<'class', ClassNodeAttributes, ClassEdge, ClassDiagramConfig>;
