import { z } from "zod";

export const LineSchema = z.object({
  id: z.string().trim().min(1),
  stations: z.array(z.string().trim().min(1)).min(1),
});

export const TransferPointSchema = z.object({
  station: z.string().trim().min(1),
  lines: z.array(z.string().trim().min(1)).min(2, "a transfer point joins at least two lines"),
});

export const NetworkSchema = z.object({
  lines: z.array(LineSchema),
  transferPoints: z.array(TransferPointSchema).default([]),
});

export type NetworkInput = z.input<typeof NetworkSchema>;

/** Render zod issues as "path: message" strings. */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}
