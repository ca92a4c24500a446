/**
 * Type definitions for the mailbox rule engine
 */

export const CONDITION_FIELDS = [
  "from",
  "to",
  "subject",
  "body_snippet",
  "label",
  "date",
] as const;

export type ConditionField = (typeof CONDITION_FIELDS)[number];

export const CONDITION_OPERATORS = [
  "contains",
  "not_contains",
  "equals",
  "not_equals",
  "starts_with",
  "ends_with",
  "before",
  "after",
] as const;

export type ConditionOperator = (typeof CONDITION_OPERATORS)[number];

export interface Condition {
  field: ConditionField;
  operator: ConditionOperator;
  value: string;
}

export type ConditionConjunction = "AND" | "OR";

export const ACTION_TYPES = [
  "add_label",
  "remove_label",
  "trash",
  "delete",
  "mark_read",
  "mark_unread",
] as const;

export type ActionType = (typeof ACTION_TYPES)[number];

export type LabelAction = {
  type: "add_label" | "remove_label";
  label_name: string;
};

export type PlainAction = {
  type: "trash" | "delete" | "mark_read" | "mark_unread";
  label_name?: null;
};

export type Action = LabelAction | PlainAction;

export interface Rule {
  id: string;
  name: string;
  description: string;
  is_enabled: boolean;
  conditions: Condition[];
  condition_conjunction: ConditionConjunction;
  actions: Action[];
}

/**
 * Normalized projection of a transport message used for client-side matching
 */
export interface MatchableMessage {
  readonly id: string;
  readonly threadId: string | null;
  readonly from: string;
  readonly to: string;
  readonly subject: string;
  readonly bodySnippet: string;
  readonly labels: ReadonlySet<string>;
  readonly receivedAt: Date | null;
}

export interface CandidateStub {
  id: string;
  threadId: string | null;
}

export interface CandidatePage {
  messages: CandidateStub[];
  nextPageToken: string | null;
}

export type DetailFormat = "metadata" | "full";

/**
 * Remote mail API the engine drives. Retry and backoff live behind it.
 */
export interface MailTransport {
  readonly maxBatchSize: number;
  readonly maxPageSize: number;
  listCandidates(
    query: string,
    maxResults: number,
    pageToken?: string
  ): Promise<CandidatePage>;
  fetchDetails(id: string, format: DetailFormat): Promise<MatchableMessage>;
  batchTrash(ids: string[]): Promise<void>;
  batchDelete(ids: string[]): Promise<void>;
  batchModifyLabels(
    ids: string[],
    addLabelNames: string[],
    removeLabelNames: string[]
  ): Promise<void>;
  batchMark(ids: string[], markAs: "read" | "unread"): Promise<void>;
}

export interface TranslationResult {
  queryFragment: string | null;
  fullyTranslatable: boolean;
}

export interface MatchPlan {
  rule: Rule;
  queryFragment: string | null;
  needsDetailFetch: boolean;
}

export interface RuleMatch {
  rule: Rule;
  messageId: string;
}

/**
 * Merged actions per message id, in execution order
 */
export type PendingActionSet = Map<string, Action[]>;

export type RunState =
  | "LOADED"
  | "PLANNED"
  | "FETCHED"
  | "AGGREGATED"
  | "EXECUTED"
  | "DRY_REPORTED"
  | "ABORTED";

export interface RunError {
  stage: "fetch" | "execute";
  action: string | null;
  messageIds: string[];
  errorKind: string;
  /** Kind of the underlying transport error, for failed batches */
  causeKind?: string;
  message: string;
}

export interface SkippedRule {
  ruleId: string | null;
  ruleName: string | null;
  errorKind: string;
  message: string;
}

export interface RunSummary {
  dryRun: boolean;
  state: RunState;
  scanned: number;
  scanLimitReached: boolean;
  matchedPerRule: Record<string, number>;
  messagesMatched: number;
  actionsPerType: Record<string, number>;
  errors: RunError[];
  skippedRules: SkippedRule[];
}

export interface DateRange {
  after?: string | Date;
  before?: string | Date;
}

export interface GmailCredentials {
  installed?: {
    client_id: string;
    client_secret: string;
    redirect_uris?: string[];
  };
  web?: {
    client_id: string;
    client_secret: string;
    redirect_uris?: string[];
  };
}

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  rulesFile: string;
  gmailCredentialsFile: string;
  gmailTokenFile: string;
  scanLimit: number;
  listPageSize: number;
  mutationBatchSize: number;
  maxRetries: number;
  logLevel: LogLevel;
}
