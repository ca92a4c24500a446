import type {
  Action,
  ActionType,
  MailTransport,
  PendingActionSet,
  RunSummary,
} from "./types.js";
import { actionKey } from "./actionAggregator.js";
import {
  BatchExecutionError,
  errorKind,
  isAuthError,
} from "./errors.js";
import { logger } from "./config.js";

const EXECUTION_ORDER: Record<ActionType, number> = {
  add_label: 0,
  remove_label: 1,
  mark_read: 2,
  mark_unread: 3,
  trash: 4,
  delete: 5,
};

interface ActionGroup {
  key: string;
  action: Action;
  messageIds: string[];
}

export interface ExecuteOptions {
  dryRun: boolean;
  /** Defaults to the transport's maximum */
  batchSize?: number;
}

export function createRunSummary(dryRun: boolean): RunSummary {
  return {
    dryRun,
    state: "LOADED",
    scanned: 0,
    scanLimitReached: false,
    matchedPerRule: {},
    messagesMatched: 0,
    actionsPerType: {},
    errors: [],
    skippedRules: [],
  };
}

/**
 * Group pending actions by action (and label), in execution order
 */
export function groupByAction(pending: PendingActionSet): ActionGroup[] {
  const groups = new Map<string, ActionGroup>();

  for (const [messageId, actions] of pending) {
    for (const action of actions) {
      const key = actionKey(action);
      let group = groups.get(key);
      if (!group) {
        group = { key, action, messageIds: [] };
        groups.set(key, group);
      }
      group.messageIds.push(messageId);
    }
  }

  return [...groups.values()].sort(
    (a, b) => EXECUTION_ORDER[a.action.type] - EXECUTION_ORDER[b.action.type]
  );
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

async function dispatch(
  transport: MailTransport,
  action: Action,
  ids: string[]
): Promise<void> {
  switch (action.type) {
    case "add_label":
      return transport.batchModifyLabels(ids, [action.label_name], []);
    case "remove_label":
      return transport.batchModifyLabels(ids, [], [action.label_name]);
    case "mark_read":
      return transport.batchMark(ids, "read");
    case "mark_unread":
      return transport.batchMark(ids, "unread");
    case "trash":
      return transport.batchTrash(ids);
    case "delete":
      return transport.batchDelete(ids);
  }
}

/**
 * Execute (or in dry-run, only count) pending actions in transport-sized
 * chunks. A failing chunk is recorded and the remaining chunks still run;
 * an authentication failure is rethrown.
 */
export async function execute(
  transport: MailTransport,
  pending: PendingActionSet,
  options: ExecuteOptions,
  summary: RunSummary = createRunSummary(options.dryRun)
): Promise<RunSummary> {
  const batchSize = Math.max(
    1,
    Math.min(options.batchSize ?? transport.maxBatchSize, transport.maxBatchSize)
  );
  const groups = groupByAction(pending);

  for (const group of groups) {
    for (const ids of chunk(group.messageIds, batchSize)) {
      if (options.dryRun) {
        logger.info(`[dry-run] Would apply ${group.key} to ${ids.length} message(s)`);
      } else {
        try {
          await dispatch(transport, group.action, ids);
          logger.info(`Applied ${group.key} to ${ids.length} message(s)`);
        } catch (error) {
          if (isAuthError(error)) {
            throw error;
          }
          const failure = new BatchExecutionError(group.key, ids, {
            cause: error,
          });
          logger.error(failure.message);
          summary.errors.push({
            stage: "execute",
            action: group.key,
            messageIds: ids,
            errorKind: failure.name,
            causeKind: errorKind(error),
            message: failure.message,
          });
          continue;
        }
      }
      summary.actionsPerType[group.key] =
        (summary.actionsPerType[group.key] ?? 0) + ids.length;
    }
  }

  summary.state = options.dryRun ? "DRY_REPORTED" : "EXECUTED";
  return summary;
}
