/**
 * Recovery request lifecycle
 */

export { RecoveryRequestMachine, getPhaseDescription } from './state-machine.js';
export { ApprovalBitmap } from './bitmap.js';
export { RecoveryPhase } from './types.js';
export type {
  RecoveryRequest,
  RecoveryState,
  RecoveryStatus,
  ProposalResult,
  ApprovalResult,
} from './types.js';
