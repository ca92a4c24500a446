import type { Action, Condition, MatchableMessage, Rule } from "../types.js";

export function makeRule(overrides: Partial<Rule> & { id: string }): Rule {
  return {
    name: overrides.id,
    description: "",
    is_enabled: true,
    conditions: [{ field: "from", operator: "contains", value: "a@b.com" }],
    condition_conjunction: "AND",
    actions: [{ type: "trash" }],
    ...overrides,
  };
}

export function condition(
  field: Condition["field"],
  operator: Condition["operator"],
  value: string
): Condition {
  return { field, operator, value };
}

export const addLabel = (label_name: string): Action => ({
  type: "add_label",
  label_name,
});

export const removeLabel = (label_name: string): Action => ({
  type: "remove_label",
  label_name,
});

export function makeMessage(
  overrides: Partial<Omit<MatchableMessage, "labels">> & {
    id: string;
    labels?: string[];
  }
): MatchableMessage {
  return {
    threadId: null,
    from: "",
    to: "",
    subject: "",
    bodySnippet: "",
    receivedAt: null,
    ...overrides,
    labels: new Set(overrides.labels ?? []),
  };
}
