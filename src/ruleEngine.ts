import type {
  DateRange,
  DetailFormat,
  MailTransport,
  MatchableMessage,
  MatchPlan,
  Rule,
  RuleMatch,
  RunState,
  RunSummary,
} from "./types.js";
import { plan } from "./matchPlanner.js";
import { evaluateRule } from "./conditionEvaluator.js";
import { buildGlobalFilter } from "./queryTranslator.js";
import { fetchCandidates } from "./candidateFetcher.js";
import { aggregate } from "./actionAggregator.js";
import { createRunSummary, execute } from "./batchExecutor.js";
import { ScanBudget } from "./scanBudget.js";
import { selectRules } from "./rules.js";
import { parseRule } from "./ruleSchema.js";
import {
  RuleValidationError,
  UnsupportedConditionError,
  errorKind,
  errorMessage,
  isAuthError,
} from "./errors.js";
import { logger } from "./config.js";

export interface RunRequest {
  /** Rules in definition order; disabled rules are ignored */
  rules: Rule[];
  /** Rules the store rejected at load time, reported in the summary */
  invalidRules?: RuleValidationError[];
  /** Restrict the run to these rule ids or names */
  ruleIds?: string[];
  query?: string;
  dateRange?: DateRange;
  /** Total candidates across all rules; 0 or absent means unbounded */
  scanLimit?: number;
  dryRun: boolean;
}

export interface EngineOptions {
  pageSize?: number;
  batchSize?: number;
  detailFormat?: DetailFormat;
}

/**
 * Applies rules to the mailbox: plans each rule, fetches its candidates
 * under the shared scan budget, aggregates actions per message and
 * executes them in batches.
 */
export class RuleEngine {
  private transport: MailTransport;
  private options: EngineOptions;
  private currentState: RunState = "LOADED";

  constructor(transport: MailTransport, options: EngineOptions = {}) {
    this.transport = transport;
    this.options = options;
  }

  get state(): RunState {
    return this.currentState;
  }

  private transition(state: RunState, summary: RunSummary): void {
    logger.debug(`Run state: ${this.currentState} -> ${state}`);
    this.currentState = state;
    summary.state = state;
  }

  /**
   * Run the rule application workflow
   *
   * @throws TransportAuthError when the transport rejects our credentials;
   * no summary is produced in that case
   */
  async run(request: RunRequest): Promise<RunSummary> {
    const summary = createRunSummary(request.dryRun);
    this.currentState = "LOADED";

    for (const invalid of request.invalidRules ?? []) {
      summary.skippedRules.push({
        ruleId: invalid.ruleId,
        ruleName: invalid.ruleName,
        errorKind: invalid.name,
        message: invalid.message,
      });
    }

    const rules = this.admissibleRules(
      selectRules(request.rules, request.ruleIds),
      summary
    );
    const globalFilter = buildGlobalFilter(request.query, request.dateRange);
    const budget = new ScanBudget(request.scanLimit);

    logger.info(
      `Applying ${rules.length} rule(s)` +
        (globalFilter ? ` (filter: ${globalFilter})` : "") +
        (budget.isBounded ? `, scan limit ${request.scanLimit}` : "") +
        (request.dryRun ? " [dry-run]" : "")
    );

    try {
      const matches = await this.collectMatches(
        rules,
        globalFilter,
        budget,
        summary
      );
      summary.scanned = budget.scanned;
      summary.scanLimitReached = budget.isBounded && budget.isExhausted();
      this.transition("FETCHED", summary);

      const pending = aggregate(matches);
      summary.messagesMatched = new Set(matches.map((m) => m.messageId)).size;
      this.transition("AGGREGATED", summary);

      await execute(
        this.transport,
        pending,
        { dryRun: request.dryRun, batchSize: this.options.batchSize },
        summary
      );
      this.transition(request.dryRun ? "DRY_REPORTED" : "EXECUTED", summary);
    } catch (error) {
      if (isAuthError(error)) {
        this.transition("ABORTED", summary);
        logger.error("Run aborted: mail transport authentication failed", error);
      }
      throw error;
    }

    this.logSummary(summary);
    return summary;
  }

  /**
   * Compute and report intended actions without mutating the mailbox
   */
  async preview(request: Omit<RunRequest, "dryRun">): Promise<RunSummary> {
    return this.run({ ...request, dryRun: true });
  }

  /**
   * Drop rules that fail schema validation or repeat an earlier id
   */
  private admissibleRules(rules: Rule[], summary: RunSummary): Rule[] {
    const seen = new Set<string>();
    return rules.filter((rule) => {
      try {
        parseRule(rule);
      } catch (error) {
        if (!(error instanceof RuleValidationError)) {
          throw error;
        }
        this.skipRule(rule, error, summary);
        return false;
      }

      if (seen.has(rule.id)) {
        const duplicate = new RuleValidationError(
          `Duplicate rule id '${rule.id}'`,
          [],
          rule
        );
        this.skipRule(rule, duplicate, summary);
        return false;
      }
      seen.add(rule.id);
      return true;
    });
  }

  private async collectMatches(
    rules: Rule[],
    globalFilter: string,
    budget: ScanBudget,
    summary: RunSummary
  ): Promise<RuleMatch[]> {
    const matches: RuleMatch[] = [];
    const details = new Map<string, MatchableMessage>();

    for (const rule of rules) {
      let matchPlan: MatchPlan;
      try {
        matchPlan = plan(rule);
      } catch (error) {
        this.skipRule(rule, error, summary);
        continue;
      }
      this.transition("PLANNED", summary);

      if (budget.isExhausted()) {
        logger.info(`Scan limit reached; rule '${rule.name}' not scanned`);
        summary.matchedPerRule[rule.id] = 0;
        continue;
      }

      try {
        const ruleMatches = await this.matchRule(
          matchPlan,
          globalFilter,
          budget,
          details,
          summary
        );
        matches.push(...ruleMatches);
        summary.matchedPerRule[rule.id] = ruleMatches.length;
        logger.info(`Rule '${rule.name}' matched ${ruleMatches.length} message(s)`);
      } catch (error) {
        if (error instanceof UnsupportedConditionError) {
          this.skipRule(rule, error, summary);
          continue;
        }
        throw error;
      }
    }

    return matches;
  }

  private async matchRule(
    matchPlan: MatchPlan,
    globalFilter: string,
    budget: ScanBudget,
    details: Map<string, MatchableMessage>,
    summary: RunSummary
  ): Promise<RuleMatch[]> {
    const { rule } = matchPlan;
    const matches: RuleMatch[] = [];
    const candidates = fetchCandidates(
      this.transport,
      matchPlan,
      globalFilter,
      budget,
      { pageSize: this.options.pageSize }
    );

    try {
      for await (const candidate of candidates) {
        if (!matchPlan.needsDetailFetch) {
          matches.push({ rule, messageId: candidate.id });
          continue;
        }

        const message = await this.loadDetails(candidate.id, details, summary);
        if (message && evaluateRule(rule, message)) {
          matches.push({ rule, messageId: candidate.id });
        }
      }
    } catch (error) {
      if (isAuthError(error) || error instanceof UnsupportedConditionError) {
        throw error;
      }
      logger.error(`Listing candidates for rule '${rule.name}' failed:`, error);
      summary.errors.push({
        stage: "fetch",
        action: null,
        messageIds: [],
        errorKind: errorKind(error),
        message: errorMessage(error),
      });
    }

    return matches;
  }

  /**
   * Fetch a message in detail once per run; failures other than auth are
   * recorded and the message is skipped
   */
  private async loadDetails(
    messageId: string,
    details: Map<string, MatchableMessage>,
    summary: RunSummary
  ): Promise<MatchableMessage | null> {
    const cached = details.get(messageId);
    if (cached) {
      return cached;
    }

    try {
      const message = await this.transport.fetchDetails(
        messageId,
        this.options.detailFormat ?? "metadata"
      );
      details.set(messageId, message);
      return message;
    } catch (error) {
      if (isAuthError(error)) {
        throw error;
      }
      logger.warn(`Failed to fetch details for message ${messageId}:`, error);
      summary.errors.push({
        stage: "fetch",
        action: null,
        messageIds: [messageId],
        errorKind: errorKind(error),
        message: errorMessage(error),
      });
      return null;
    }
  }

  private skipRule(rule: Rule, error: unknown, summary: RunSummary): void {
    logger.warn(`Skipping rule '${rule.name}': ${errorMessage(error)}`);
    summary.skippedRules.push({
      ruleId: rule.id,
      ruleName: rule.name,
      errorKind: errorKind(error),
      message: errorMessage(error),
    });
  }

  /**
   * Log run summary
   */
  private logSummary(summary: RunSummary): void {
    logger.info(`Rule application summary${summary.dryRun ? " (dry-run)" : ""}:`);
    logger.info(`   Scanned: ${summary.scanned}`);
    logger.info(`   Messages matched: ${summary.messagesMatched}`);
    for (const [key, count] of Object.entries(summary.actionsPerType)) {
      logger.info(`   ${key}: ${count} message(s)`);
    }
    if (summary.scanLimitReached) {
      logger.info("   Scan limit reached before all candidates were listed");
    }
    if (summary.errors.length > 0) {
      logger.warn(`   Errors: ${summary.errors.length}`);
    }
  }
}
