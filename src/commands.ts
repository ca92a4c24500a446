import { RuleEngine } from "./ruleEngine.js";
import type { RuleStore } from "./rules.js";
import { chunk } from "./batchExecutor.js";
import {
  CliUsageError,
  HELP_TEXT,
  type CliOptions,
  type JsonEnvelope,
  commandName,
  formatRules,
  formatSummary,
  jsonEnvelope,
  parseCliArgs,
} from "./cli.js";
import { MailRulesError, errorMessage, isAuthError } from "./errors.js";
import { logger } from "./config.js";
import type { AppConfig, MailTransport, MatchableMessage } from "./types.js";

/**
 * Everything a command needs from the outside world
 */
export interface CliContext {
  config: AppConfig;
  store: RuleStore;
  /** Connects to the mailbox; only called by commands that touch it */
  connect: () => Promise<MailTransport>;
  confirm: (question: string) => Promise<boolean>;
  readFile: (filePath: string) => Promise<string>;
  print: (text: string) => void;
}

type Outcome = "success" | "aborted_by_user";

interface Report {
  message: string;
  data?: unknown;
  /** Human output when it differs from the message */
  text?: string;
}

function report(
  options: CliOptions,
  context: CliContext,
  status: JsonEnvelope["status"],
  { message, data = null, text }: Report
): void {
  context.print(
    options.outputFormat === "json"
      ? jsonEnvelope(commandName(options), status, message, data)
      : (text ?? message)
  );
}

async function confirmAll(context: CliContext, questions: string[]): Promise<boolean> {
  for (const question of questions) {
    if (!(await context.confirm(question))) {
      return false;
    }
  }
  return true;
}

async function applyRules(options: CliOptions, context: CliContext): Promise<Outcome> {
  const { rules, invalid } = await context.store.load();

  if (options.confirm && !options.dryRun && !options.yes) {
    const confirmed = await context.confirm(
      "Are you sure you want to apply rules and potentially modify emails?"
    );
    if (!confirmed) {
      report(options, context, "aborted_by_user", {
        message: "Rule application aborted by user confirmation.",
      });
      return "aborted_by_user";
    }
  }

  const { config } = context;
  const engine = new RuleEngine(await context.connect(), {
    pageSize: config.listPageSize,
    batchSize: config.mutationBatchSize,
  });
  const summary = await engine.run({
    rules,
    invalidRules: invalid,
    ruleIds: options.ruleIds,
    query: options.query,
    dateRange: { after: options.dateAfter, before: options.dateBefore },
    scanLimit: options.scanLimit ?? config.scanLimit,
    dryRun: options.dryRun,
  });

  report(options, context, "success", {
    message: "Rules applied",
    data: summary,
    text: formatSummary(summary, rules),
  });
  return "success";
}

function describeMessage(message: MatchableMessage) {
  return {
    id: message.id,
    threadId: message.threadId,
    from: message.from,
    to: message.to,
    subject: message.subject,
    date: message.receivedAt ? message.receivedAt.toISOString() : null,
    snippet: message.bodySnippet,
    labels: [...message.labels],
  };
}

type ListedMessage = ReturnType<typeof describeMessage> | { id: string; error: string };

async function listEmails(options: CliOptions, context: CliContext): Promise<Outcome> {
  const transport = await context.connect();
  const page = await transport.listCandidates(
    options.query ?? "",
    options.maxResults ?? 10,
    options.pageToken
  );

  const messages: ListedMessage[] = [];
  for (const stub of page.messages) {
    try {
      messages.push(describeMessage(await transport.fetchDetails(stub.id, "metadata")));
    } catch (error) {
      if (isAuthError(error)) {
        throw error;
      }
      logger.warn(`Could not fetch details for ${stub.id}: ${errorMessage(error)}`);
      messages.push({ id: stub.id, error: `Could not fetch details: ${errorMessage(error)}` });
    }
  }

  const message =
    messages.length === 0
      ? options.query
        ? "No emails found matching your criteria."
        : "No emails found."
      : `Successfully listed ${messages.length} email(s).`;

  const lines = [message];
  for (const entry of messages) {
    if ("error" in entry) {
      lines.push(`  ID: ${entry.id} (${entry.error})`);
      continue;
    }
    lines.push(
      `  ID: ${entry.id}`,
      `    From: ${entry.from}`,
      `    Subject: ${entry.subject}`,
      `    Date: ${entry.date ?? "unknown"}`
    );
  }
  if (page.nextPageToken) {
    lines.push(`Next page token: ${page.nextPageToken}`);
  }

  report(options, context, "success", {
    message,
    data: {
      count_returned: messages.length,
      next_page_token: page.nextPageToken,
      messages,
    },
    text: lines.join("\n"),
  });
  return "success";
}

async function getEmail(options: CliOptions, context: CliContext): Promise<Outcome> {
  const transport = await context.connect();
  const id = options.id ?? "";
  const details = describeMessage(await transport.fetchDetails(id, options.format ?? "full"));

  report(options, context, "success", {
    message: `Successfully retrieved details for email ID ${id}.`,
    data: details,
    text: [
      `--- Details for Email ID: ${details.id} ---`,
      `Thread ID: ${details.threadId ?? "unknown"}`,
      `From: ${details.from}`,
      `To: ${details.to}`,
      `Subject: ${details.subject}`,
      `Date: ${details.date ?? "unknown"}`,
      `Labels: ${details.labels.join(", ")}`,
      `Snippet: ${details.snippet}`,
    ].join("\n"),
  });
  return "success";
}

interface Mutation {
  dryRunMessage: string;
  /** Asked in order unless --yes is given; empty means no confirmation */
  questions: string[];
  abortMessage: string;
  successMessage: string;
  data: Record<string, unknown>;
  apply: (transport: MailTransport, ids: string[]) => Promise<void>;
}

async function mutateEmails(
  options: CliOptions,
  context: CliContext,
  mutation: Mutation
): Promise<Outcome> {
  if (options.dryRun) {
    report(options, context, "success", {
      message: mutation.dryRunMessage,
      data: { ...mutation.data, action_taken: false },
    });
    return "success";
  }

  if (!options.yes && !(await confirmAll(context, mutation.questions))) {
    report(options, context, "aborted_by_user", {
      message: mutation.abortMessage,
      data: { action_taken: false },
    });
    return "aborted_by_user";
  }

  const transport = await context.connect();
  for (const batch of chunk(options.ids ?? [], transport.maxBatchSize)) {
    await mutation.apply(transport, batch);
  }

  report(options, context, "success", {
    message: mutation.successMessage,
    data: { ...mutation.data, action_taken: true },
  });
  return "success";
}

function describeLabelChange(add: string[], remove: string[]): string {
  const parts: string[] = [];
  if (add.length > 0) {
    parts.push(`add labels [${add.join(", ")}]`);
  }
  if (remove.length > 0) {
    parts.push(`remove labels [${remove.join(", ")}]`);
  }
  return parts.join(" and ");
}

function emailMutation(options: CliOptions): Mutation | null {
  const ids = options.ids ?? [];
  const count = ids.length;

  switch (options.emailCommand) {
    case "trash":
      return {
        dryRunMessage: `DRY RUN: ${count} email(s) would be moved to Trash. No actual changes made.`,
        questions: [`Are you sure you want to move these ${count} email(s) to Trash?`],
        abortMessage: "Trash operation aborted by user.",
        successMessage: `Successfully moved ${count} email(s) to Trash.`,
        data: { processed_ids_count: count },
        apply: (transport, batch) => transport.batchTrash(batch),
      };
    case "delete":
      return {
        dryRunMessage: `DRY RUN: ${count} email(s) would be PERMANENTLY DELETED. No actual changes made.`,
        questions: [
          `Are you absolutely sure you want to PERMANENTLY DELETE these ${count} email(s)? This is IRREVERSIBLE.`,
          "FINAL WARNING: Confirm PERMANENT DELETION of these emails?",
        ],
        abortMessage: "Permanent deletion aborted by user.",
        successMessage: `Successfully permanently deleted ${count} email(s).`,
        data: { processed_ids_count: count },
        apply: (transport, batch) => transport.batchDelete(batch),
      };
    case "label": {
      const add = options.addLabels ?? [];
      const remove = options.removeLabels ?? [];
      return {
        dryRunMessage: `DRY RUN: Would ${describeLabelChange(add, remove)} for ${count} email(s). No actual changes made.`,
        questions: [],
        abortMessage: "Label operation aborted by user.",
        successMessage: `Successfully modified labels for ${count} email(s).`,
        data: { processed_ids: ids, add_labels: add, remove_labels: remove },
        apply: (transport, batch) => transport.batchModifyLabels(batch, add, remove),
      };
    }
    case "mark": {
      const markAs = options.markAs ?? "read";
      return {
        dryRunMessage: `DRY RUN: ${count} email(s) would be marked as ${markAs}. No actual changes made.`,
        questions: [],
        abortMessage: "Mark operation aborted by user.",
        successMessage: `Successfully marked ${count} email(s) as ${markAs}.`,
        data: { processed_ids: ids, mark_action: markAs },
        apply: (transport, batch) => transport.batchMark(batch, markAs),
      };
    }
    default:
      return null;
  }
}

async function runEmailCommand(options: CliOptions, context: CliContext): Promise<Outcome> {
  if (options.emailCommand === "list") {
    return listEmails(options, context);
  }
  if (options.emailCommand === "get") {
    return getEmail(options, context);
  }
  const mutation = emailMutation(options);
  if (!mutation) {
    throw new CliUsageError(`Unknown email command: ${options.emailCommand}`);
  }
  return mutateEmails(options, context, mutation);
}

async function runCommand(options: CliOptions, context: CliContext): Promise<Outcome> {
  const { store } = context;

  switch (options.command) {
    case "help":
      context.print(HELP_TEXT);
      return "success";
    case "apply":
      return applyRules(options, context);
    case "emails":
      return runEmailCommand(options, context);
    case "list": {
      const { rules } = await store.load();
      report(options, context, "success", {
        message: `${rules.length} rule(s)`,
        data: rules,
        text: formatRules(rules),
      });
      return "success";
    }
    case "add": {
      const content = await context.readFile(options.file ?? "");
      const rule = await store.add(JSON.parse(content));
      report(options, context, "success", {
        message: `Rule '${rule.name}' (ID: ${rule.id}) added successfully.`,
        data: rule,
      });
      return "success";
    }
    case "delete": {
      const rule = await store.remove(options.id ?? "");
      report(options, context, "success", {
        message: `Rule '${rule.name}' deleted successfully.`,
        data: { deleted_identifier: rule.id },
      });
      return "success";
    }
  }
}

/**
 * Run one command line and return the process exit code: 0 on success,
 * 1 on an error or a declined confirmation
 */
export async function runCli(args: string[], context: CliContext): Promise<number> {
  let options: CliOptions | null = null;
  try {
    options = parseCliArgs(args);
    const outcome = await runCommand(options, context);
    return outcome === "success" ? 0 : 1;
  } catch (error) {
    const code = error instanceof MailRulesError ? error.code : "UNEXPECTED_ERROR";
    if (options?.outputFormat === "json") {
      context.print(
        jsonEnvelope(commandName(options), "error", errorMessage(error), null, {
          code,
          details: errorMessage(error),
        })
      );
    } else {
      logger.error(`${code}: ${errorMessage(error)}`);
    }
    return 1;
  }
}
