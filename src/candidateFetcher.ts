import type { CandidateStub, MailTransport, MatchPlan } from "./types.js";
import type { ScanBudget } from "./scanBudget.js";
import { combineQuery } from "./queryTranslator.js";
import { logger } from "./config.js";

export interface FetchOptions {
  /** Preferred page size; capped by the transport and the budget */
  pageSize?: number;
}

/**
 * Page through the transport for one rule's candidates.
 *
 * Page sizes never ask for more than the budget has left, and iteration
 * stops as soon as the budget is spent, even mid-rule.
 */
export async function* fetchCandidates(
  transport: MailTransport,
  matchPlan: MatchPlan,
  globalFilter: string,
  budget: ScanBudget,
  options: FetchOptions = {}
): AsyncGenerator<CandidateStub, void, undefined> {
  const query = combineQuery(globalFilter, matchPlan.queryFragment);
  const pageLimit = Math.min(
    options.pageSize ?? transport.maxPageSize,
    transport.maxPageSize
  );
  let pageToken: string | undefined;
  let fetched = 0;

  logger.debug(
    `Listing candidates for rule '${matchPlan.rule.name}' (query: ${query || "<all>"})`
  );

  do {
    if (budget.isExhausted()) {
      logger.info(
        `Scan limit reached while fetching rule '${matchPlan.rule.name}'`
      );
      return;
    }

    const pageSize = Math.max(1, Math.min(pageLimit, budget.remaining()));
    const page = await transport.listCandidates(query, pageSize, pageToken);

    for (const stub of page.messages) {
      if (budget.consume(1) === 0) {
        logger.info(
          `Scan limit reached while fetching rule '${matchPlan.rule.name}'`
        );
        return;
      }
      fetched++;
      yield stub;
    }

    pageToken = page.nextPageToken ?? undefined;
  } while (pageToken);

  logger.debug(
    `Rule '${matchPlan.rule.name}': ${fetched} candidate(s) listed`
  );
}
