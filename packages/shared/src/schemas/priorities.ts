import { z } from 'zod';

export const DEFAULT_PRIORITY_SCORE = 5.0;

export const priorityEntrySchema = z.object({
  priority_score: z.number().min(0).max(10),
  reasoning: z.string(),
});

export const priorityTableSchema = z.record(z.string(), priorityEntrySchema);

export type PriorityEntry = z.infer<typeof priorityEntrySchema>;
export type PriorityTable = z.infer<typeof priorityTableSchema>;

export function priorityScoreOf(priorities: PriorityTable, courseCode: string): number {
  return priorities[courseCode]?.priority_score ?? DEFAULT_PRIORITY_SCORE;
}
