import type { UiNode, UiNodeKind } from '../../src/ui-spec/ui-node.types';

type NodeOf<K extends UiNodeKind> = Extract<UiNode, { type: K }>;

function isKind<K extends UiNodeKind>(node: UiNode, kind: K): node is NodeOf<K> {
  return node.type === kind;
}

function childrenOf(node: UiNode): UiNode[] {
  switch (node.type) {
    case 'Page':
      return [...(node.actions ?? []), ...node.children];
    case 'Card':
      return [...node.children, ...(node.footer ?? [])];
    case 'Row':
    case 'Column':
    case 'Modal':
      return node.children;
    case 'DataTable':
      return node.rowActions ?? [];
    case 'Form':
      return node.fields;
    case 'Button':
      return node.onClick.type === 'openModal' ? [node.onClick.modal] : [];
    default:
      return [];
  }
}

/** Depth-first, pre-order: page actions before page children, card body before footer. */
export function findAll<K extends UiNodeKind>(root: UiNode, kind: K): NodeOf<K>[] {
  const found: NodeOf<K>[] = [];
  const visit = (node: UiNode) => {
    if (isKind(node, kind)) found.push(node);
    childrenOf(node).forEach(visit);
  };
  visit(root);
  return found;
}

export function findOne<K extends UiNodeKind>(root: UiNode, kind: K, predicate: (node: NodeOf<K>) => boolean = () => true): NodeOf<K> {
  const match = findAll(root, kind).find(predicate);
  if (!match) throw new Error(`no ${kind} node matched`);
  return match;
}
