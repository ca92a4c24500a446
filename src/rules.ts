import * as fs from "fs/promises";
import * as path from "path";
import type { Rule } from "./types.js";
import { parseRule } from "./ruleSchema.js";
import {
  RuleNotFoundError,
  RuleStorageError,
  RuleValidationError,
} from "./errors.js";
import { logger } from "./config.js";

export interface LoadedRules {
  rules: Rule[];
  invalid: RuleValidationError[];
}

function matchesIdentifier(rule: Rule, identifier: string): boolean {
  return (
    rule.id === identifier || rule.name.toLowerCase() === identifier.toLowerCase()
  );
}

/**
 * Keep enabled rules in stored order, optionally restricted to the given
 * ids or names
 */
export function selectRules(rules: Rule[], identifiers?: string[]): Rule[] {
  const enabled = rules.filter((rule) => rule.is_enabled);
  if (!identifiers || identifiers.length === 0) {
    return enabled;
  }

  for (const identifier of identifiers) {
    if (!rules.some((rule) => matchesIdentifier(rule, identifier))) {
      logger.warn(`No rule matches '${identifier}'`);
    }
  }
  return enabled.filter((rule) =>
    identifiers.some((identifier) => matchesIdentifier(rule, identifier))
  );
}

/**
 * JSON file storage for rules
 */
export class RuleStore {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  private async readEntries(): Promise<unknown[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        logger.info(`Rules file not found at ${this.filePath}, no rules loaded`);
        return [];
      }
      throw new RuleStorageError(`Could not read rules file: ${this.filePath}`, {
        cause: error,
      });
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new RuleStorageError(`Invalid JSON in rules file: ${this.filePath}`, {
        cause: error,
      });
    }
    if (!Array.isArray(data)) {
      throw new RuleStorageError(
        `Rules file must contain a JSON array: ${this.filePath}`
      );
    }
    return data;
  }

  private async writeEntries(entries: unknown[]): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(entries, null, 2) + "\n");
    } catch (error) {
      throw new RuleStorageError(
        `Could not write rules file: ${this.filePath}`,
        { cause: error }
      );
    }
    logger.debug(`Saved ${entries.length} rule(s) to ${this.filePath}`);
  }

  /**
   * Load and validate all rules. Invalid entries are skipped and reported.
   */
  async load(): Promise<LoadedRules> {
    const data = await this.readEntries();
    const rules: Rule[] = [];
    const invalid: RuleValidationError[] = [];
    const seenIds = new Set<string>();

    data.forEach((entry: unknown, index) => {
      try {
        const rule = parseRule(entry);
        if (seenIds.has(rule.id)) {
          throw new RuleValidationError(
            `Duplicate rule id '${rule.id}'`,
            ["id: duplicate"],
            rule
          );
        }
        seenIds.add(rule.id);
        rules.push(rule);
      } catch (error) {
        if (!(error instanceof RuleValidationError)) {
          throw error;
        }
        logger.warn(`Skipping invalid rule #${index + 1}: ${error.message}`);
        invalid.push(error);
      }
    });

    logger.info(
      `Loaded ${rules.length} rule(s) from ${this.filePath}` +
        (invalid.length > 0 ? `, skipped ${invalid.length} invalid` : "")
    );
    return { rules, invalid };
  }

  async save(rules: Rule[]): Promise<void> {
    await this.writeEntries(rules);
  }

  /**
   * Validate and add a new rule. Names are unique, case-insensitively.
   */
  async add(input: unknown): Promise<Rule> {
    const rule = parseRule(input);
    const { rules } = await this.load();
    const entries = await this.readEntries();

    const clash = rules.find(
      (existing) =>
        existing.id === rule.id ||
        existing.name.toLowerCase() === rule.name.toLowerCase()
    );
    if (clash) {
      throw new RuleValidationError(
        `A rule named '${clash.name}' already exists (ID: ${clash.id})`,
        ["name: duplicate"],
        rule
      );
    }

    await this.writeEntries([...entries, rule]);
    logger.info(`Added rule: ${rule.name} (ID: ${rule.id})`);
    return rule;
  }

  /**
   * Remove a rule by id or name. Entries that fail validation are kept as
   * they are.
   */
  async remove(identifier: string): Promise<Rule> {
    const entries = await this.readEntries();

    for (const [index, entry] of entries.entries()) {
      let rule: Rule;
      try {
        rule = parseRule(entry);
      } catch (error) {
        if (error instanceof RuleValidationError) {
          continue;
        }
        throw error;
      }
      if (matchesIdentifier(rule, identifier)) {
        await this.writeEntries(entries.filter((_, i) => i !== index));
        logger.info(`Removed rule: ${rule.name} (ID: ${rule.id})`);
        return rule;
      }
    }

    throw new RuleNotFoundError(identifier);
  }

  async find(identifier: string): Promise<Rule | null> {
    const { rules } = await this.load();
    return rules.find((rule) => matchesIdentifier(rule, identifier)) ?? null;
  }
}
