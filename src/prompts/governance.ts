/**
 * Governance block appended to every system prompt the router sends: specs,
 * code and docs move together or not at all.
 */

export const GOVERNANCE_BLOCK =
    '\n\n' +
    'ALIGNMENT PROTOCOL ENABLED: You manage a strict ecosystem of Specs, Code, and Docs.\n' +
    '1. NEVER output Code without checking if `impl-docs/` needs an update.\n' +
    '2. NEVER implement a feature without checking if `specs/` needs a retrofit.\n' +
    '3. If you change one, you must evaluate the others.\n' +
    'Failure to align all three layers is a critical error.\n';

/** Appends the block once; a prompt that already ends with it is returned as is. */
export function withGovernance(systemPrompt: string): string {
    const base = systemPrompt.trimEnd();
    if (base.endsWith(GOVERNANCE_BLOCK.trimEnd())) return base + '\n';
    return base + GOVERNANCE_BLOCK;
}
