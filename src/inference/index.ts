export { forwardChain, newlySatisfiable } from './forward.js';
export { backwardChain, rulesUsed, PROOF_MESSAGES } from './backward.js';
export { detectContradictions, negatedFact } from './contradictions.js';
