import { z } from "zod";
import { ValidationError } from "../../lib/errors";
import type { Rfp } from "./types";

export const ToleranceKindSchema = z.enum(["exact", "numeric-percent", "none"]);

export const RequiredAttributeSchema = z.object({
  value: z.union([z.string().trim().min(1), z.number().finite()]),
  tolerance: ToleranceKindSchema,
  tolerancePercent: z.number().positive().max(100).optional(),
});

export const RequestItemSchema = z.object({
  id: z.string().trim().min(1),
  description: z.string().trim().min(1),
  quantity: z.number().finite().positive(),
  unit: z.string().trim().min(1),
  // key order is the order of the per-attribute breakdown
  attributes: z.record(z.string().trim().min(1), RequiredAttributeSchema),
});

export const TestRequirementSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().optional(),
  standard: z.string().optional(),
  price: z.number().finite().nonnegative(),
});

export const RfpSchema = z
  .object({
    id: z.string().trim().min(1),
    title: z.string(),
    buyer: z.string().nullish(),
    summary: z.string().nullish(),
    items: z.array(RequestItemSchema).min(1),
    testRequirements: z.array(TestRequirementSchema).default([]),
  })
  .superRefine((rfp, ctx) => {
    const seen = new Set<string>();
    rfp.items.forEach((item, index) => {
      if (seen.has(item.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["items", index, "id"],
          message: `Duplicate item id "${item.id}"`,
        });
      }
      seen.add(item.id);
    });
  });

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

/** Validates a raw RFP record. Throws ValidationError listing every issue. */
export function parseRfp(raw: unknown): Rfp {
  const parsed = RfpSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(formatIssue);
    throw new ValidationError(`Malformed RFP: ${issues[0]}`, issues);
  }
  return parsed.data;
}
