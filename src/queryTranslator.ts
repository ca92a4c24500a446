import type { Condition, DateRange, Rule, TranslationResult } from "./types.js";
import { parseDateValue } from "./ruleSchema.js";

const SEARCH_KEYS: Partial<Record<Condition["field"], string>> = {
  from: "from",
  to: "to",
  subject: "subject",
  label: "label",
};

const NEEDS_QUOTES = /[\s(){}"]/;

/**
 * Quote a search value when the server would otherwise split it
 */
export function quoteValue(value: string): string {
  const cleaned = value.replace(/"/g, "").trim();
  return NEEDS_QUOTES.test(cleaned) ? `"${cleaned}"` : cleaned;
}

/**
 * Label search terms use hyphens in place of spaces and slashes
 */
function labelTerm(value: string): string {
  return value.trim().replace(/[\s/]+/g, "-");
}

/**
 * Translate a single condition into a server search term, or null when the
 * server syntax cannot express it exactly
 */
export function translateCondition(condition: Condition): string | null {
  const key = SEARCH_KEYS[condition.field];
  if (!key) {
    return null;
  }

  const value =
    condition.field === "label"
      ? labelTerm(condition.value)
      : quoteValue(condition.value);
  if (!value) {
    return null;
  }

  switch (condition.operator) {
    case "contains":
    case "equals":
      return `${key}:${value}`;
    case "not_contains":
    case "not_equals":
      return `-${key}:${value}`;
    default:
      return null;
  }
}

/**
 * Convert a rule's conditions into a server-side query fragment.
 *
 * AND rules yield a usable superset filter from whichever conditions
 * translate. OR rules only yield a fragment when every condition translates,
 * since a partial OR would under-fetch.
 */
export function translate(rule: Rule): TranslationResult {
  const terms = rule.conditions.map(translateCondition);
  const translated = terms.filter((term): term is string => term !== null);
  const fullyTranslatable =
    translated.length > 0 && translated.length === terms.length;

  if (rule.condition_conjunction === "OR") {
    if (!fullyTranslatable) {
      return { queryFragment: null, fullyTranslatable: false };
    }
    const queryFragment =
      translated.length === 1
        ? translated[0]
        : `(${translated.join(" OR ")})`;
    return { queryFragment, fullyTranslatable: true };
  }

  if (translated.length === 0) {
    return { queryFragment: null, fullyTranslatable: false };
  }
  return { queryFragment: translated.join(" "), fullyTranslatable };
}

function formatQueryDate(value: string | Date): string {
  const date = typeof value === "string" ? parseDateValue(value) : value;
  if (!date || Number.isNaN(date.getTime())) {
    throw new Error(`Invalid date for query filter: ${String(value)}`);
  }
  return date.toISOString().slice(0, 10).replace(/-/g, "/");
}

/**
 * Build the caller-supplied global filter: free query plus date range
 */
export function buildGlobalFilter(
  query?: string | null,
  dateRange: DateRange = {}
): string {
  const parts: string[] = [];
  const trimmed = query?.trim();
  if (trimmed) {
    // a bare OR would bind to the terms appended after it
    parts.push(/\sOR\s/.test(trimmed) ? `(${trimmed})` : trimmed);
  }
  if (dateRange.after !== undefined) {
    parts.push(`after:${formatQueryDate(dateRange.after)}`);
  }
  if (dateRange.before !== undefined) {
    parts.push(`before:${formatQueryDate(dateRange.before)}`);
  }
  return parts.join(" ");
}

/**
 * AND-combine the global filter with a rule fragment
 */
export function combineQuery(
  globalFilter: string,
  queryFragment: string | null
): string {
  return [globalFilter.trim(), queryFragment ?? ""]
    .filter((part) => part.length > 0)
    .join(" ");
}
