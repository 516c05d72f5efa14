import test from 'node:test';
import assert from 'node:assert/strict';

import { GOVERNANCE_BLOCK, getArchitectPrompt, withGovernance } from '../src/prompts';

test('withGovernance appends the alignment block exactly once', () => {
    const once = withGovernance('base prompt\n\n');
    assert.equal(once, 'base prompt' + GOVERNANCE_BLOCK);
    assert.equal(withGovernance(once), once);
    assert.ok(once.endsWith('Failure to align all three layers is a critical error.\n'));
});

test('the architect prompt carries the consistency rules and the loop limits', () => {
    const prompt = getArchitectPrompt(4, 'workbench/scripts');
    assert.ok(prompt.includes('you MUST also generate the matching update for `impl-docs/` in the same response'));
    assert.ok(prompt.includes('`specs/traceability_matrix.md` is the source of truth.'));
    assert.ok(prompt.includes('relative to workbench/scripts/'));
    assert.ok(prompt.endsWith('You get at most 4 turns per instruction. Omit "next_action" when you are done.'));
});
