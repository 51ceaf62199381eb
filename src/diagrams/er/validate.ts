import { invalidValue, requireField, requireText } from '../../core/errors.js';
import type { NodeId } from '../../core/ids.js';
import type { Cardinality, ERAttribute, ERAttributeSpec, EREdge, ERNodeAttributes } from './types.js';

export interface ERNodeDraft {
  label?: string;
  attributes: ERAttribute[];
}

export interface EREdgeDraft {
  source?: NodeId;
  destination?: NodeId;
  cardinality?: { left: Cardinality; right: Cardinality };
  identifying: boolean;
  label?: string;
}

const ER_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_\-()[\]]*$/;

export function validateERAttribute(input: ERAttributeSpec): ERAttribute {
  const type = requireText('attribute.type', input.type);
  const name = requireText('attribute.name', input.name);
  if (!ER_IDENTIFIER.test(type)) {
    throw invalidValue('attribute.type', `Attribute type '${type}' must be a single word.`, 'Example: string, int, varchar(255)');
  }
  if (!ER_IDENTIFIER.test(name)) {
    throw invalidValue('attribute.name', `Attribute name '${name}' must be a single word.`, 'Use underscores instead of spaces.');
  }
  const keys = Object.freeze([...new Set(input.keys ?? [])]);
  const attribute: ERAttribute = input.comment !== undefined
    ? { type, name, keys, comment: requireText('attribute.comment', input.comment) }
    : { type, name, keys };
  return Object.freeze(attribute);
}

export function validateERNode(draft: ERNodeDraft): ERNodeAttributes {
  return {
    label: requireField('label', draft.label, 'Call setLabel() before adding the entity.'),
    attributes: Object.freeze([...draft.attributes]),
  };
}

export function validateEREdge(draft: EREdgeDraft): EREdge {
  const source = requireField('source', draft.source, 'Call setSource() with an id returned by addNode().');
  const destination = requireField('destination', draft.destination, 'Call setDestination() with an id returned by addNode().');
  const cardinality = requireField('relationship', draft.cardinality, 'Call setCardinality() or use a helper such as EREdgeBuilder.oneOrMore().');
  const edge: EREdge = {
    source,
    destination,
    left: cardinality.left,
    right: cardinality.right,
    identifying: draft.identifying,
  };
  if (draft.label !== undefined) edge.label = draft.label;
  return edge;
}
