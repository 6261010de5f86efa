export { managers, wrestlers, tagTeams, allMembers, custom } from './employment.js';
export { suspendMembers, suspendManagers, suspendWrestlers } from './suspension.js';
export { reinstateWrestlers, reinstateManagers } from './reinstatement.js';
export {
  leaveStable,
  detachManagers,
  leaveTagTeam,
  detachManagedMembers,
  removeStableMembers,
} from './retirement.js';
export { currentMembers, awaitingEmployment } from './relationships.js';
export type { MemberRelationship } from './relationships.js';
