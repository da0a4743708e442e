import { z } from "zod";
import { parseDecimal } from "./gravity.js";
import type { BrewDetails, BrewFields } from "./types.js";

export type Outcome<T = void> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly reason: string };

export function ok<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function reject<T = never>(reason: string): Outcome<T> {
  return { ok: false, reason };
}

function decimal(label: string, { nonNegative = false } = {}) {
  return z.string().transform((text, ctx) => {
    const value = parseDecimal(text);
    if (value === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} must be a number` });
      return z.NEVER;
    }
    if (nonNegative && value < 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} cannot be negative` });
      return z.NEVER;
    }
    return value;
  });
}

const requiredName = z.string().trim().min(1, "Name is required");
const volume = decimal("Volume", { nonNegative: true });
const gravity = (label: string) => decimal(label, { nonNegative: true });

const newBrewSchema = z.object({
  name: requiredName,
  category: z.string().optional(),
  stage: z.string().optional(),
  recipe: z.string().optional(),
  notes: z.string().optional(),
  volume: volume.optional(),
  og: gravity("OG").optional(),
});

const brewDetailsSchema = z.object({
  name: requiredName.optional(),
  category: z.string().optional(),
  stage: z.string().optional(),
  recipe: z.string().optional(),
  notes: z.string().optional(),
  volume: volume.optional(),
  og: gravity("OG").optional(),
  fg: gravity("FG").optional(),
  ph: decimal("pH").optional(),
  temp: decimal("Temperature").optional(),
});

export type NewBrewInput = z.input<typeof newBrewSchema>;
export type BrewDetailsInput = z.input<typeof brewDetailsSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join("; ");
}

/** Checks form text for a new brew. Volume doubles as the original volume. */
export function validateNewBrew(input: NewBrewInput): Outcome<BrewFields> {
  const result = newBrewSchema.safeParse(input);
  if (!result.success) return reject(describeIssues(result.error));

  const { volume: vol, ...rest } = result.data;
  return ok(vol === undefined ? rest : { ...rest, volume: vol, original_volume: vol });
}

export function validateBrewDetails(input: BrewDetailsInput): Outcome<BrewDetails> {
  const result = brewDetailsSchema.safeParse(input);
  if (!result.success) return reject(describeIssues(result.error));
  return ok(result.data);
}
