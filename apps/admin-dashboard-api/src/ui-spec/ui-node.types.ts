/**
 * Node kinds understood by the frontend SDK renderer.
 * The set is closed: a document can only be built from these.
 */
export const UI_NODE_KINDS = [
  'Page',
  'Card',
  'Row',
  'Column',
  'StatsGrid',
  'DataTable',
  'Form',
  'TextField',
  'Checkbox',
  'Button',
  'Link',
  'Text',
  'Alert',
  'Modal'
] as const;

export type UiNodeKind = (typeof UI_NODE_KINDS)[number];

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface NavigateAction {
  type: 'navigate';
  to: string;
}

export interface ApiAction {
  type: 'api';
  method: HttpMethod;
  endpoint: string;
  /** Confirmation prompt shown before the call */
  confirm?: string;
  onSuccess?: UiAction;
}

export interface OpenModalAction {
  type: 'openModal';
  modal: ModalNode;
}

export interface RefreshAction {
  type: 'refresh';
}

export type UiAction = NavigateAction | ApiAction | OpenModalAction | RefreshAction;

interface NodeBase<K extends UiNodeKind> {
  type: K;
  className?: string;
}

export interface PageNode extends NodeBase<'Page'> {
  title: string;
  description?: string;
  actions?: ButtonNode[];
  children: UiNode[];
}

export interface CardNode extends NodeBase<'Card'> {
  title?: string;
  subtitle?: string;
  /** Record the card's `Text` children read their `field` from */
  dataEndpoint?: string;
  children: UiNode[];
  footer?: UiNode[];
}

export interface RowNode extends NodeBase<'Row'> {
  gap?: number;
  children: UiNode[];
}

export interface ColumnNode extends NodeBase<'Column'> {
  children: UiNode[];
}

export interface StatItem {
  label: string;
  /** Property of the stats payload shown as the value */
  valueKey: string;
  icon?: string;
  onClick?: UiAction;
}

export interface StatsGridNode extends NodeBase<'StatsGrid'> {
  columns: number;
  endpoint: string;
  items: StatItem[];
}

export type ColumnFormat = 'text' | 'boolean' | 'datetime';

export interface TableColumn {
  key: string;
  label: string;
  type?: ColumnFormat;
  sortable?: boolean;
}

export interface DataTableNode extends NodeBase<'DataTable'> {
  endpoint: string;
  pagination: boolean;
  pageSize?: number;
  searchable: boolean;
  sortable?: boolean;
  columns: TableColumn[];
  rowActions?: ButtonNode[];
  emptyMessage?: string;
}

export interface TextFieldNode extends NodeBase<'TextField'> {
  name: string;
  label: string;
  inputType: 'text' | 'email' | 'password';
  required?: boolean;
  readOnly?: boolean;
  placeholder?: string;
}

export interface CheckboxNode extends NodeBase<'Checkbox'> {
  name: string;
  label?: string;
  checkboxLabel: string;
}

export type FieldNode = TextFieldNode | CheckboxNode;

export interface FormNode extends NodeBase<'Form'> {
  endpoint: string;
  method: 'POST' | 'PUT';
  /** Endpoint the initial values are loaded from */
  dataEndpoint?: string;
  submitText: string;
  cancelText?: string;
  fields: FieldNode[];
  onSuccess?: UiAction;
}

export interface ButtonNode extends NodeBase<'Button'> {
  label: string;
  variant: 'primary' | 'outline' | 'ghost' | 'danger';
  size?: 'sm' | 'md';
  icon?: string;
  onClick: UiAction;
}

export interface LinkNode extends NodeBase<'Link'> {
  label: string;
  href: string;
}

export interface TextNode extends NodeBase<'Text'> {
  /** Literal text; ignored when `field` is set */
  content?: string;
  /** Property of the enclosing card's record to display */
  field?: string;
  variant: 'body' | 'small' | 'muted';
}

export interface AlertNode extends NodeBase<'Alert'> {
  variant: 'info' | 'warning' | 'error';
  message: string;
}

export interface ModalNode extends NodeBase<'Modal'> {
  title: string;
  size?: 'sm' | 'md' | 'lg';
  children: UiNode[];
}

export type UiNode =
  | PageNode
  | CardNode
  | RowNode
  | ColumnNode
  | StatsGridNode
  | DataTableNode
  | FormNode
  | TextFieldNode
  | CheckboxNode
  | ButtonNode
  | LinkNode
  | TextNode
  | AlertNode
  | ModalNode;

/** A UI Specification Document always has a page at its root. */
export type UiDocument = PageNode;
