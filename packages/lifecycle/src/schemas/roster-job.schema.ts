import { z } from 'zod';

// ============================================================================
// Roster Transition Job Schemas
// ============================================================================

export const EntityRefSchema = z.object({
  type: z.enum(['wrestler', 'manager', 'referee', 'tag_team', 'stable']),
  id: z.string().min(1),
});

export const RosterTransitionJobDataSchema = z.object({
  transition: z.enum(['employ', 'suspend', 'release', 'retire', 'injure', 'reinstate']),
  entities: z.array(EntityRefSchema).min(1),
  effectiveDate: z.iso.datetime({ offset: true }).optional(),
  notes: z.string().min(1).max(2000).optional(),
  continueOnError: z.boolean().default(false),
  triggeredBy: z.enum(['scheduled', 'manual']).default('manual'),
});

/** Shape accepted by `enqueueRosterTransition`. */
export type RosterTransitionJobInput = z.input<typeof RosterTransitionJobDataSchema>;
export type RosterTransitionJobData = z.output<typeof RosterTransitionJobDataSchema>;
