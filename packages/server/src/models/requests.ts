import { z } from "zod";

export const PlanRouteRequestSchema = z.object({
  origin: z.string(),
  destination: z.string(),
  /** How many runner-up routes to include (default from planner config) */
  alternatives: z.number().int().min(0).max(10).optional(),
});

export type PlanRouteRequest = z.infer<typeof PlanRouteRequestSchema>;
