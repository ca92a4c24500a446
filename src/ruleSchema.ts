import { z } from "zod";
import { v4 as uuidv4 } from "uuid";
import {
  ACTION_TYPES,
  CONDITION_FIELDS,
  CONDITION_OPERATORS,
  type Action,
  type Condition,
  type Rule,
} from "./types.js";
import { RuleValidationError } from "./errors.js";

const SLASH_DATE = /^(\d{4})\/(\d{2})\/(\d{2})$/;

/**
 * Parse a rule or filter date. Accepts YYYY/MM/DD, YYYY-MM-DD and ISO
 * timestamps; calendar dates are taken as UTC midnight.
 */
export function parseDateValue(value: string): Date | null {
  const trimmed = value.trim();
  const slash = SLASH_DATE.exec(trimmed);
  const normalized = slash
    ? `${slash[1]}-${slash[2]}-${slash[3]}T00:00:00Z`
    : trimmed;
  const time = Date.parse(normalized);
  return Number.isNaN(time) ? null : new Date(time);
}

export const ConditionSchema = z
  .object({
    field: z.enum(CONDITION_FIELDS),
    operator: z.enum(CONDITION_OPERATORS),
    value: z.string().min(1, "value cannot be empty"),
  })
  .superRefine((condition, ctx) => {
    if (condition.field === "date" && !parseDateValue(condition.value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `'${condition.value}' is not a valid date`,
        path: ["value"],
      });
    }
  })
  .transform((condition): Condition => ({ ...condition }));

export const ActionSchema = z
  .object({
    type: z.enum(ACTION_TYPES),
    label_name: z.string().nullish(),
  })
  .transform((action, ctx): Action => {
    if (action.type === "add_label" || action.type === "remove_label") {
      const labelName = action.label_name?.trim();
      if (!labelName) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `label_name is required for ${action.type}`,
          path: ["label_name"],
        });
        return z.NEVER;
      }
      return { type: action.type, label_name: labelName };
    }

    if (action.label_name !== undefined && action.label_name !== null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `label_name must not be set for ${action.type}`,
        path: ["label_name"],
      });
      return z.NEVER;
    }
    return { type: action.type };
  });

export const RuleSchema = z
  .object({
    id: z.string().trim().min(1).optional(),
    name: z.string().trim().min(1, "name is required"),
    description: z.string().nullish(),
    is_enabled: z.boolean().default(true),
    conditions: z
      .array(ConditionSchema)
      .min(1, "at least one condition is required"),
    condition_conjunction: z.enum(["AND", "OR"]).default("AND"),
    actions: z.array(ActionSchema).min(1, "at least one action is required"),
  })
  .transform(
    (rule): Rule => ({
      id: rule.id ?? uuidv4(),
      name: rule.name,
      description: rule.description ?? "",
      is_enabled: rule.is_enabled,
      conditions: rule.conditions,
      condition_conjunction: rule.condition_conjunction,
      actions: rule.actions,
    })
  );

export type RuleInput = z.input<typeof RuleSchema>;

function describeRaw(input: unknown): { id: string | null; name: string | null } {
  if (typeof input !== "object" || input === null) {
    return { id: null, name: null };
  }
  const id = "id" in input && typeof input.id === "string" ? input.id : null;
  const name =
    "name" in input && typeof input.name === "string" ? input.name : null;
  return { id, name };
}

/**
 * Validate raw rule data into a Rule, listing every schema issue on failure
 */
export function parseRule(input: unknown): Rule {
  const result = RuleSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.join(".")}: ${issue.message}`
      : issue.message
  );
  const raw = describeRaw(input);
  throw new RuleValidationError(
    `Invalid rule${raw.name ? ` '${raw.name}'` : ""}: ${issues.join("; ")}`,
    issues,
    raw
  );
}
