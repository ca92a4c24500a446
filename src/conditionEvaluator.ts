import type {
  Condition,
  ConditionField,
  ConditionOperator,
  MatchableMessage,
  Rule,
} from "./types.js";
import { UnsupportedConditionError } from "./errors.js";
import { parseDateValue } from "./ruleSchema.js";

type TextField = Exclude<ConditionField, "label" | "date">;

const TEXT_OPERATORS: ReadonlySet<ConditionOperator> = new Set([
  "contains",
  "not_contains",
  "equals",
  "not_equals",
  "starts_with",
  "ends_with",
]);

const LABEL_OPERATORS: ReadonlySet<ConditionOperator> = new Set([
  "contains",
  "not_contains",
  "equals",
  "not_equals",
]);

const DATE_OPERATORS: ReadonlySet<ConditionOperator> = new Set([
  "before",
  "after",
  "equals",
  "not_equals",
]);

function operatorsFor(field: ConditionField): ReadonlySet<ConditionOperator> {
  switch (field) {
    case "label":
      return LABEL_OPERATORS;
    case "date":
      return DATE_OPERATORS;
    default:
      return TEXT_OPERATORS;
  }
}

/**
 * Throw UnsupportedConditionError unless the field/operator pair is evaluable
 */
export function assertSupported(condition: Condition): void {
  if (!operatorsFor(condition.field).has(condition.operator)) {
    throw new UnsupportedConditionError(condition.field, condition.operator);
  }
}

function textValue(message: MatchableMessage, field: TextField): string {
  switch (field) {
    case "from":
      return message.from;
    case "to":
      return message.to;
    case "subject":
      return message.subject;
    case "body_snippet":
      return message.bodySnippet;
  }
}

function evaluateText(
  operator: ConditionOperator,
  fieldValue: string,
  expected: string
): boolean {
  const haystack = fieldValue.toLowerCase();
  const needle = expected.toLowerCase();

  switch (operator) {
    case "contains":
      return haystack.includes(needle);
    case "not_contains":
      return !haystack.includes(needle);
    case "equals":
      return haystack === needle;
    case "not_equals":
      return haystack !== needle;
    case "starts_with":
      return haystack.startsWith(needle);
    case "ends_with":
      return haystack.endsWith(needle);
    default:
      throw new UnsupportedConditionError("text", operator);
  }
}

function evaluateLabel(
  operator: ConditionOperator,
  labels: ReadonlySet<string>,
  expected: string
): boolean {
  const needle = expected.toLowerCase();
  let present = false;
  for (const label of labels) {
    if (label.toLowerCase() === needle) {
      present = true;
      break;
    }
  }

  switch (operator) {
    case "contains":
    case "equals":
      return present;
    case "not_contains":
    case "not_equals":
      return !present;
    default:
      throw new UnsupportedConditionError("label", operator);
  }
}

function sameUtcDay(a: Date, b: Date): boolean {
  return a.toISOString().slice(0, 10) === b.toISOString().slice(0, 10);
}

function evaluateDate(
  operator: ConditionOperator,
  receivedAt: Date | null,
  expected: string
): boolean {
  const boundary = parseDateValue(expected);
  if (!boundary || !receivedAt) {
    return false;
  }

  switch (operator) {
    case "before":
      return receivedAt.getTime() < boundary.getTime();
    case "after":
      return receivedAt.getTime() >= boundary.getTime();
    case "equals":
      return sameUtcDay(receivedAt, boundary);
    case "not_equals":
      return !sameUtcDay(receivedAt, boundary);
    default:
      throw new UnsupportedConditionError("date", operator);
  }
}

/**
 * Evaluate one condition against a message. Pure; string comparisons are
 * case-insensitive.
 */
export function evaluate(
  condition: Condition,
  message: MatchableMessage
): boolean {
  assertSupported(condition);

  switch (condition.field) {
    case "label":
      return evaluateLabel(condition.operator, message.labels, condition.value);
    case "date":
      return evaluateDate(
        condition.operator,
        message.receivedAt,
        condition.value
      );
    default:
      return evaluateText(
        condition.operator,
        textValue(message, condition.field),
        condition.value
      );
  }
}

/**
 * Evaluate all of a rule's conditions under its conjunction, short-circuiting
 */
export function evaluateRule(rule: Rule, message: MatchableMessage): boolean {
  // a rule without conditions matches nothing
  if (rule.conditions.length === 0) {
    return false;
  }
  if (rule.condition_conjunction === "AND") {
    return rule.conditions.every((condition) => evaluate(condition, message));
  }
  return rule.conditions.some((condition) => evaluate(condition, message));
}
