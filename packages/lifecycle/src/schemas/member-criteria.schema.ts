import { z } from 'zod';

// ============================================================================
// Member Collection Filter Schemas
// ============================================================================

export const EmploymentStatusFilterSchema = z.enum(['employed', 'unemployed', 'released', 'any']);
export const SuspensionStatusFilterSchema = z.enum(['suspended', 'active', 'any']);
export const InjuryStatusFilterSchema = z.enum(['injured', 'healthy', 'any']);
export const RetirementStatusFilterSchema = z.enum(['retired', 'active', 'any']);

export type EmploymentStatusFilter = z.infer<typeof EmploymentStatusFilterSchema>;
export type SuspensionStatusFilter = z.infer<typeof SuspensionStatusFilterSchema>;
export type InjuryStatusFilter = z.infer<typeof InjuryStatusFilterSchema>;
export type RetirementStatusFilter = z.infer<typeof RetirementStatusFilterSchema>;

export const MemberCriteriaSchema = z
  .object({
    employmentStatus: EmploymentStatusFilterSchema,
    suspensionStatus: SuspensionStatusFilterSchema,
    injuryStatus: InjuryStatusFilterSchema,
    retirementStatus: RetirementStatusFilterSchema,
    availability: z.boolean(),
    types: z.union([z.string().min(1), z.array(z.string().min(1))]),
  })
  .partial()
  .strict();

export type MemberCriteria = z.infer<typeof MemberCriteriaSchema>;
