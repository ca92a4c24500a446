import * as readline from "readline";
import type { DetailFormat, Rule, RunSummary } from "./types.js";
import { MailRulesError } from "./errors.js";

export type Command = "apply" | "list" | "add" | "delete" | "help" | "emails";
export type EmailCommand = "list" | "get" | "trash" | "delete" | "label" | "mark";
export type OutputFormat = "human" | "json";

export interface CliOptions {
  command: Command;
  emailCommand?: EmailCommand;
  dryRun: boolean;
  confirm: boolean;
  yes: boolean;
  outputFormat: OutputFormat;
  query?: string;
  ruleIds?: string[];
  scanLimit?: number;
  dateAfter?: string;
  dateBefore?: string;
  file?: string;
  id?: string;
  ids?: string[];
  maxResults?: number;
  pageToken?: string;
  format?: DetailFormat;
  addLabels?: string[];
  removeLabels?: string[];
  markAs?: "read" | "unread";
}

export class CliUsageError extends MailRulesError {
  constructor(message: string) {
    super(message, "USAGE_ERROR");
  }
}

const COMMANDS: ReadonlySet<string> = new Set(["apply", "list", "add", "delete", "help", "emails"]);
const EMAIL_COMMANDS: ReadonlySet<string> = new Set([
  "list",
  "get",
  "trash",
  "delete",
  "label",
  "mark",
]);

const VALUE_FLAGS = new Set([
  "--query",
  "--rule-ids",
  "--scan-limit",
  "--date-after",
  "--date-before",
  "--output-format",
  "--file",
  "--id",
  "--ids",
  "--max-results",
  "--page-token",
  "--format",
  "--add-labels",
  "--remove-labels",
  "--action",
]);

function isCommand(value: string): value is Command {
  return COMMANDS.has(value);
}

function isEmailCommand(value: string): value is EmailCommand {
  return EMAIL_COMMANDS.has(value);
}

function parseCount(flag: string, raw: string, minimum: number): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < minimum) {
    const kind = minimum > 0 ? "positive" : "non-negative";
    throw new CliUsageError(`${flag} must be a ${kind} integer, got "${raw}"`);
  }
  return value;
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Command name as reported in JSON output, e.g. `emails trash`
 */
export function commandName(options: CliOptions): string {
  return options.command === "emails" && options.emailCommand
    ? `emails ${options.emailCommand}`
    : options.command;
}

function validateEmailCommand(options: CliOptions): void {
  const sub = options.emailCommand;
  if (!sub) {
    throw new CliUsageError("emails requires a subcommand: list, get, trash, delete, label, mark");
  }
  if (sub === "get" && !options.id) {
    throw new CliUsageError("emails get requires --id <message id>");
  }
  if (sub !== "list" && sub !== "get" && !options.ids?.length) {
    throw new CliUsageError(`emails ${sub} requires --ids <id,id,...>`);
  }
  if (sub === "label" && !options.addLabels?.length && !options.removeLabels?.length) {
    throw new CliUsageError("emails label requires --add-labels or --remove-labels");
  }
  if (sub === "mark" && !options.markAs) {
    throw new CliUsageError("emails mark requires --action read|unread");
  }
}

/**
 * Parse command line arguments (without the node and script entries)
 */
export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    command: "apply",
    dryRun: false,
    confirm: false,
    yes: false,
    outputFormat: "human",
  };
  let commandSeen = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const equals = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const flag = equals > 0 ? arg.slice(0, equals) : arg;
    const inlineValue: string | undefined =
      equals > 0 ? arg.slice(equals + 1) : undefined;

    if (VALUE_FLAGS.has(flag)) {
      const value = inlineValue ?? args[++i];
      if (value === undefined) {
        throw new CliUsageError(`${flag} requires a value`);
      }
      switch (flag) {
        case "--query":
          options.query = value;
          break;
        case "--rule-ids":
          options.ruleIds = splitList(value);
          break;
        case "--scan-limit":
          options.scanLimit = parseCount(flag, value, 0);
          break;
        case "--date-after":
          options.dateAfter = value;
          break;
        case "--date-before":
          options.dateBefore = value;
          break;
        case "--output-format":
          if (value !== "human" && value !== "json") {
            throw new CliUsageError(`--output-format must be human or json, got "${value}"`);
          }
          options.outputFormat = value;
          break;
        case "--file":
          options.file = value;
          break;
        case "--id":
          options.id = value;
          break;
        case "--ids":
          options.ids = splitList(value);
          break;
        case "--max-results":
          options.maxResults = parseCount(flag, value, 1);
          break;
        case "--page-token":
          options.pageToken = value;
          break;
        case "--format":
          if (value !== "metadata" && value !== "full") {
            throw new CliUsageError(`--format must be metadata or full, got "${value}"`);
          }
          options.format = value;
          break;
        case "--add-labels":
          options.addLabels = splitList(value);
          break;
        case "--remove-labels":
          options.removeLabels = splitList(value);
          break;
        case "--action": {
          const action = value.toLowerCase();
          if (action !== "read" && action !== "unread") {
            throw new CliUsageError(`--action must be read or unread, got "${value}"`);
          }
          options.markAs = action;
          break;
        }
      }
      continue;
    }

    switch (flag) {
      case "--dry-run":
      case "--preview":
      case "-p":
        options.dryRun = true;
        break;
      case "--confirm":
        options.confirm = true;
        break;
      case "--yes":
      case "-y":
        options.yes = true;
        break;
      case "--help":
      case "-h":
        options.command = "help";
        commandSeen = true;
        break;
      default:
        if (!commandSeen && isCommand(flag)) {
          options.command = flag;
          commandSeen = true;
          break;
        }
        if (options.command === "emails" && !options.emailCommand && isEmailCommand(flag)) {
          options.emailCommand = flag;
          break;
        }
        throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  if (options.command === "add" && !options.file) {
    throw new CliUsageError("add requires --file <path>");
  }
  if (options.command === "delete" && !options.id) {
    throw new CliUsageError("delete requires --id <id or name>");
  }
  if (options.command === "emails") {
    validateEmailCommand(options);
  }
  return options;
}

/**
 * Human-readable run summary
 */
export function formatSummary(summary: RunSummary, rules: Rule[] = []): string {
  const names = new Map(rules.map((rule) => [rule.id, rule.name]));
  const lines = [
    "Rule Application Summary",
    `  Dry Run: ${summary.dryRun ? "Yes" : "No"}`,
    `  Total Emails Scanned: ${summary.scanned}`,
    `  Emails Matching Any Rule: ${summary.messagesMatched}`,
  ];

  if (summary.scanLimitReached) {
    lines.push("  Scan limit reached: remaining candidates were not scanned");
  }

  const perRule = Object.entries(summary.matchedPerRule);
  if (perRule.length > 0) {
    lines.push("  Matches per rule:");
    for (const [ruleId, count] of perRule) {
      lines.push(`    ${names.get(ruleId) ?? ruleId}: ${count}`);
    }
  }

  const actions = Object.entries(summary.actionsPerType);
  lines.push(summary.dryRun ? "  Actions planned:" : "  Actions taken:");
  if (actions.length === 0) {
    lines.push("    none");
  }
  for (const [key, count] of actions) {
    lines.push(`    ${key}: ${count} email(s)`);
  }

  for (const skipped of summary.skippedRules) {
    lines.push(
      `  Skipped rule ${skipped.ruleName ?? skipped.ruleId ?? "<unknown>"}: ${skipped.message}`
    );
  }
  for (const error of summary.errors) {
    const target = error.action ?? error.stage;
    const kind = error.causeKind
      ? `${error.errorKind} (${error.causeKind})`
      : error.errorKind;
    lines.push(
      `  Error (${target}, ${error.messageIds.length} message(s)): ${kind}: ${error.message}`
    );
  }
  return lines.join("\n");
}

export function formatRules(rules: Rule[]): string {
  if (rules.length === 0) {
    return "No rules defined.";
  }
  return rules
    .map((rule) => {
      const conditions = rule.conditions
        .map((c) => `${c.field} ${c.operator} "${c.value}"`)
        .join(` ${rule.condition_conjunction} `);
      const actions = rule.actions
        .map((a) =>
          a.type === "add_label" || a.type === "remove_label"
            ? `${a.type}:${a.label_name}`
            : a.type
        )
        .join(", ");
      const status = rule.is_enabled ? "enabled" : "disabled";
      return `${rule.name} (${rule.id}) [${status}]\n  if ${conditions}\n  then ${actions}`;
    })
    .join("\n\n");
}

export interface JsonEnvelope {
  status: "success" | "error" | "aborted_by_user";
  command_executed: string;
  message: string;
  data: unknown;
  error_details: { code: string; details: string } | null;
}

export function jsonEnvelope(
  command: string,
  status: JsonEnvelope["status"],
  message: string,
  data: unknown = null,
  error?: { code: string; details: string }
): string {
  const envelope: JsonEnvelope = {
    status,
    command_executed: `mailbox-rules ${command}`,
    message,
    data,
    error_details: error ?? null,
  };
  return JSON.stringify(envelope, null, 2);
}

/**
 * Ask a yes/no question; anything but y/yes declines
 */
export function promptYesNo(question: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(`${question} [y/N] `, (answer: string) => {
      rl.close();
      resolve(/^y(es)?$/i.test(answer.trim()));
    });
  });
}

export const HELP_TEXT = `
Mailbox Rules

USAGE:
  mailbox-rules [command] [options]

COMMANDS:
  apply (default)           Apply enabled rules to the mailbox
  list                      List stored rules
  add --file <path>         Add a rule from a JSON file
  delete --id <id|name>     Delete a rule
  emails <subcommand>       Work with individual messages (see below)

APPLY OPTIONS:
  --dry-run, --preview, -p  Report intended actions without executing them
  --query <q>               Extra Gmail search filter for every rule
  --rule-ids <a,b>          Only apply these rule ids or names
  --scan-limit <n>          Cap on candidates scanned across all rules (0 = no cap)
  --date-after <date>       Only messages after this date (YYYY/MM/DD)
  --date-before <date>      Only messages before this date (YYYY/MM/DD)
  --confirm                 Ask before modifying messages
  --yes, -y                 Answer yes to the confirmation

EMAIL COMMANDS:
  emails list               List messages [--query <q>] [--max-results <n>] [--page-token <t>]
  emails get --id <id>      Show one message [--format metadata|full]
  emails trash --ids <a,b>  Move messages to Trash
  emails delete --ids <a,b> Permanently delete messages
  emails label --ids <a,b>  Change labels: --add-labels <a,b> and/or --remove-labels <a,b>
  emails mark --ids <a,b>   Mark messages: --action read|unread
  Changes accept --dry-run; trash and delete ask first unless --yes is given.

COMMON OPTIONS:
  --output-format <fmt>     human (default) or json
  --help, -h                Show this help message

ENVIRONMENT VARIABLES:
  RULES_FILE               Rules file (default: data/rules.json)
  GMAIL_CREDENTIALS_FILE   Path to Gmail credentials (default: credentials.json)
  GMAIL_TOKEN_FILE         Path to Gmail token (default: data/token.json)
  SCAN_LIMIT               Default scan limit (default: 0)
  LIST_PAGE_SIZE           Candidates per page, max 500 (default: 100)
  MUTATION_BATCH_SIZE      Messages per batch call, max 1000 (default: 1000)
  MAX_RETRIES              Retries for transient API errors (default: 3)
  LOG_LEVEL                Logging level (default: info)
`;
