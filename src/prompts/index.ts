/**
 * Prompts for the rebound loop.
 */

export { getArchitectPrompt } from './architect';
export { buildContinuationPrompt, buildInitialPrompt } from './continuation';
export type { ExecutionFeedback } from './continuation';
export { GOVERNANCE_BLOCK, withGovernance } from './governance';
