import type { ClickEvent } from '../../core/click.js';
import { invalidValue, requireField, requireText } from '../../core/errors.js';
import type { NodeId } from '../../core/ids.js';
import {
  VISIBILITY_TOKENS,
  type ClassArrowShape,
  type ClassAttributeSpec,
  type ClassEdge,
  type ClassLineStyle,
  type ClassMethodSpec,
  type ClassNodeAttributes,
  type Multiplicity,
} from './types.js';

export interface ClassNodeDraft {
  label?: string;
  annotation?: string;
  members: string[];
  click?: Readonly<ClickEvent>;
}

export interface ClassEdgeDraft {
  source?: NodeId;
  destination?: NodeId;
  arrow?: ClassArrowShape;
  leftArrow?: ClassArrowShape;
  lineStyle: ClassLineStyle;
  leftMultiplicity?: Multiplicity;
  rightMultiplicity?: Multiplicity;
  label?: string;
}

const BRACE = /[{}]/;

/** Non-blank text for a line of the class body; a brace would close or reopen the body */
export function requireBodyText(field: string, value: string): string {
  requireText(field, value);
  if (BRACE.test(value)) {
    throw invalidValue(field, `Class body text cannot contain '{' or '}', got '${value}'.`);
  }
  return value;
}

/** `+name: type`, or `+name` when no type is given */
export function formatAttribute(attribute: ClassAttributeSpec): string {
  const vis = attribute.visibility ? VISIBILITY_TOKENS[attribute.visibility] : '';
  const name = requireBodyText('attribute.name', attribute.name);
  const type = attribute.type !== undefined ? `: ${requireBodyText('attribute.type', attribute.type)}` : '';
  return `${vis}${name}${type}`;
}

/** `+name(a: int, b)`, followed by ` returnType` when one is given */
export function formatMethod(method: ClassMethodSpec): string {
  const vis = method.visibility ? VISIBILITY_TOKENS[method.visibility] : '';
  const name = requireBodyText('method.name', method.name);
  const params = (method.parameters ?? [])
    .map((p) => {
      const pname = requireBodyText('parameter.name', p.name);
      return p.type !== undefined ? `${pname}: ${requireBodyText('parameter.type', p.type)}` : pname;
    })
    .join(', ');
  const ret = method.returnType !== undefined ? ` ${requireBodyText('method.returnType', method.returnType)}` : '';
  return `${vis}${name}(${params})${ret}`;
}

export function validateClassNode(draft: ClassNodeDraft): ClassNodeAttributes {
  const node: ClassNodeAttributes = {
    label: requireField('label', draft.label, 'Call setLabel() before adding the class.'),
    members: Object.freeze([...draft.members]),
  };
  if (draft.annotation !== undefined) node.annotation = draft.annotation;
  if (draft.click !== undefined) node.click = draft.click;
  return node;
}

export function validateClassEdge(draft: ClassEdgeDraft): ClassEdge {
  const edge: ClassEdge = {
    source: requireField('source', draft.source, 'Call setSource() with an id returned by addNode().'),
    destination: requireField('destination', draft.destination, 'Call setDestination() with an id returned by addNode().'),
    arrow: requireField('relationship', draft.arrow, 'Call setArrowShape() before adding the relation.'),
    lineStyle: draft.lineStyle,
  };
  if (draft.leftArrow !== undefined) edge.leftArrow = draft.leftArrow;
  if (draft.leftMultiplicity !== undefined) edge.leftMultiplicity = draft.leftMultiplicity;
  if (draft.rightMultiplicity !== undefined) edge.rightMultiplicity = draft.rightMultiplicity;
  if (draft.label !== undefined) edge.label = draft.label;
  return edge;
}
