/**
 * Shared domain types for structure discovery and extraction.
 */

export interface SidebarItem {
  id: string;
  title: string;
  level: number;
  parentId: string | null;
  children: string[];
  isExpandable: boolean;
  targetRef: string;
}

export interface SidebarStructure {
  items: Record<string, SidebarItem>;
  roots: string[];
  sourceUrl: string;
  capturedAt: string;
  totalItemCount: number;
  validItemCount: number;
}

export const TASK_STATUSES = [
  'Success',
  'ExtractionError',
  'NavigationError',
  'Timeout',
  'Skipped',
] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export interface TaskResult {
  readonly itemId: string;
  readonly status: TaskStatus;
  readonly error?: string;
  readonly errorCode?: string;
  readonly outputRef?: string;
  readonly durationMs: number;
  readonly attempts: number;
}

export interface ResumeState {
  done: Set<string>;
  pending: string[];
}

export interface AncestorRef {
  id: string;
  title: string;
  targetRef: string;
  isExpandable: boolean;
}

/**
 * Everything a worker needs for one item. Workers never see the whole structure.
 */
export interface ExtractionTask {
  item: Readonly<SidebarItem>;
  ancestors: ReadonlyArray<AncestorRef>;
  sourceUrl: string;
  outputPath: string;
}

export type ExecutionMode = 'sequential' | 'parallel' | 'hybrid';

export interface RunSummary {
  mode: ExecutionMode;
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  byStatus: Record<TaskStatus, number>;
  results: TaskResult[];
  aborted: boolean;
  abortReason?: string;
  /** Error code behind the abort: CANCELLED for interrupts and deadlines, RESOURCE_ERROR for escalation. */
  abortCode?: string;
  durationMs: number;
  fromCache: boolean;
  warnings: string[];
}

export interface PendingEntry {
  title: string;
  id: string;
}

export interface ResumeReport {
  total: number;
  done: number;
  pending: number;
  completionPercent: number;
  pendingItems: PendingEntry[];
}

/** Process-lifetime expansion state, passed explicitly instead of living in a global. */
export interface ExpansionSessionState {
  expansionDone: boolean;
}

export interface ExpansionOverrides {
  force?: boolean;
  forceFullExpansion?: boolean;
  validateCache?: boolean;
}
