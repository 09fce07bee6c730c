import { z } from "zod";

export const CLAIM_TYPES = ["property", "liability", "workers_comp", "auto"] as const;

const US_STATES = new Set([
  "AL", "AK", "AZ", "AR", "CA", "CO", "CT", "DE", "FL", "GA",
  "HI", "ID", "IL", "IN", "IA", "KS", "KY", "LA", "ME", "MD",
  "MA", "MI", "MN", "MS", "MO", "MT", "NE", "NV", "NH", "NJ",
  "NM", "NY", "NC", "ND", "OH", "OK", "OR", "PA", "RI", "SC",
  "SD", "TN", "TX", "UT", "VT", "VA", "WA", "WV", "WI", "WY"
]);

function isCalendarDate(value: string) {
  const [year, month, day] = value.split("-").map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

export const ClaimSchema = z.object({
  date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be in YYYY-MM-DD format")
    .refine(isCalendarDate, "Date must be a real calendar date"),
  type: z.enum(CLAIM_TYPES),
  amount: z.number().nonnegative()
});

export const ApplicationSchema = z.object({
  businessName: z.string().trim().min(1),
  businessType: z.string().trim().min(1).toLowerCase(),
  annualRevenue: z.number().nonnegative(),
  employeeCount: z.number().int().nonnegative(),
  state: z
    .string()
    .trim()
    .toUpperCase()
    .refine((value) => US_STATES.has(value), "State must be a valid US state code"),
  city: z.string().trim().min(1),
  yearsInBusiness: z.number().int().nonnegative(),
  businessDescription: z.string().trim().min(1, "Business description cannot be empty"),
  claimsHistory: z.array(ClaimSchema).default([]),
  additionalNotes: z.string().trim().optional()
});

export const BatchSchema = z.array(z.unknown()).min(1).max(50);

export type ClaimInput = z.input<typeof ClaimSchema>;
export type ApplicationInput = z.input<typeof ApplicationSchema>;

export function formatIssues(error: z.ZodError) {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`)
    .join("; ");
}
