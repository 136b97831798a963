/**
 * Automation session capability interface.
 *
 * The discoverer and workers only talk to a page through this surface; which
 * selectors find the navigation nodes is the adapter's business.
 */

export type NavLayout = 'nested' | 'flat' | 'unknown';

/** One navigation node as observed in the rendered DOM, in document order. */
export interface NavNodeInfo {
  ref: string;
  text: string;
  declaredId: string | null;
  /** Ref of the enclosing node for nested layouts; null for flat layouts and roots. */
  parentRef: string | null;
  depth: number;
  isHeader: boolean;
  hasToggle: boolean;
  expanded: boolean;
  /** The node links to its own content page, independently of any toggle. */
  hasTarget: boolean;
}

export interface ParameterRecord {
  name: string;
  location: string;
  type: string;
  required: boolean;
  description: string;
}

export interface SchemaField {
  name: string;
  type: string;
  required: boolean;
  description: string;
}

export interface ResponseRecord {
  statusCode: string;
  description: string;
  fields: SchemaField[];
}

export interface PageContent {
  title: string;
  url: string;
  description: string | null;
  parameters: ParameterRecord[];
  responses: ResponseRecord[];
  schemaFields: SchemaField[];
}

export interface AutomationSession {
  readonly id: string;
  start(): Promise<void>;
  navigate(url: string, timeoutMs: number): Promise<void>;
  /** Resolves false when the navigation container does not appear in time. */
  waitForNavigation(timeoutMs: number): Promise<boolean>;
  detectLayout(): Promise<NavLayout>;
  /** Refs of toggle-bearing nodes currently collapsed. */
  listCollapsed(): Promise<string[]>;
  /** Resolves false when the node could not be found or clicked. */
  expand(ref: string): Promise<boolean>;
  readNavNodes(): Promise<NavNodeInfo[]>;
  activate(ref: string): Promise<void>;
  waitForContent(timeoutMs: number): Promise<boolean>;
  readContent(): Promise<PageContent>;
  close(): Promise<void>;
}

export interface SessionFactory {
  create(label: string): AutomationSession;
}
