import type { MatchPlan, Rule } from "./types.js";
import { assertSupported } from "./conditionEvaluator.js";
import { translate } from "./queryTranslator.js";
import { logger } from "./config.js";

/**
 * Server search is trusted on its own only when the whole rule is one
 * translated term or an AND of them. An OR of several terms is kept as a
 * pre-filter and every candidate is confirmed client-side.
 */
function serverSearchSuffices(rule: Rule, fullyTranslatable: boolean): boolean {
  if (!fullyTranslatable) {
    return false;
  }
  return rule.condition_conjunction === "AND" || rule.conditions.length === 1;
}

/**
 * Decide how a rule is matched. When the server query is equivalent to the
 * rule, every candidate it returns is a confirmed match; otherwise
 * candidates are fetched in detail and evaluated client-side.
 *
 * @throws UnsupportedConditionError when a condition cannot be evaluated
 */
export function plan(rule: Rule): MatchPlan {
  rule.conditions.forEach(assertSupported);

  const { queryFragment, fullyTranslatable } = translate(rule);
  const matchPlan: MatchPlan = {
    rule,
    queryFragment,
    needsDetailFetch: !serverSearchSuffices(rule, fullyTranslatable),
  };

  logger.debug(
    `Planned rule '${rule.name}': query=${queryFragment ?? "<none>"}, ` +
      `detail fetch=${matchPlan.needsDetailFetch}`
  );
  return matchPlan;
}
