import type { Action, PendingActionSet, RuleMatch } from "./types.js";

type DestructiveType = "trash" | "delete";
type MarkType = "mark_read" | "mark_unread";

/**
 * Higher wins when both are pending for one message
 */
const DESTRUCTIVE_PRIORITY: Record<DestructiveType, number> = {
  trash: 1,
  delete: 2,
};

interface MergeState {
  addLabels: Map<string, string>;
  removeLabels: Map<string, string>;
  mark: MarkType | null;
  destructive: DestructiveType | null;
}

function emptyState(): MergeState {
  return {
    addLabels: new Map(),
    removeLabels: new Map(),
    mark: null,
    destructive: null,
  };
}

function labelKey(labelName: string): string {
  return labelName.toLowerCase();
}

function mergeAction(state: MergeState, action: Action): void {
  switch (action.type) {
    case "add_label": {
      const key = labelKey(action.label_name);
      // a pending removal of the same label always wins
      if (!state.removeLabels.has(key) && !state.addLabels.has(key)) {
        state.addLabels.set(key, action.label_name);
      }
      return;
    }
    case "remove_label": {
      const key = labelKey(action.label_name);
      state.addLabels.delete(key);
      if (!state.removeLabels.has(key)) {
        state.removeLabels.set(key, action.label_name);
      }
      return;
    }
    case "mark_read":
    case "mark_unread":
      state.mark = action.type;
      return;
    case "trash":
    case "delete":
      if (
        state.destructive === null ||
        DESTRUCTIVE_PRIORITY[action.type] > DESTRUCTIVE_PRIORITY[state.destructive]
      ) {
        state.destructive = action.type;
      }
      return;
  }
}

/**
 * Flatten merged state into execution order: label adds, label removals,
 * read state, then trash or delete
 */
function toActions(state: MergeState): Action[] {
  const actions: Action[] = [];
  for (const labelName of state.addLabels.values()) {
    actions.push({ type: "add_label", label_name: labelName });
  }
  for (const labelName of state.removeLabels.values()) {
    actions.push({ type: "remove_label", label_name: labelName });
  }
  if (state.mark) {
    actions.push({ type: state.mark });
  }
  if (state.destructive) {
    actions.push({ type: state.destructive });
  }
  return actions;
}

/**
 * Fold matches, in rule order, into one merged action list per message.
 * Builds a fresh set on every call.
 */
export function aggregate(matches: readonly RuleMatch[]): PendingActionSet {
  const states = new Map<string, MergeState>();

  for (const { rule, messageId } of matches) {
    let state = states.get(messageId);
    if (!state) {
      state = emptyState();
      states.set(messageId, state);
    }
    for (const action of rule.actions) {
      mergeAction(state, action);
    }
  }

  const pending: PendingActionSet = new Map();
  for (const [messageId, state] of states) {
    const actions = toActions(state);
    if (actions.length > 0) {
      pending.set(messageId, actions);
    }
  }
  return pending;
}

/**
 * Stable key used for grouping and counting, e.g. `add_label:Promo`
 */
export function actionKey(action: Action): string {
  return action.type === "add_label" || action.type === "remove_label"
    ? `${action.type}:${action.label_name}`
    : action.type;
}
