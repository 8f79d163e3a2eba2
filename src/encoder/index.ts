/**
 * Rule Encoder
 *
 * Translates the rules of one War hand into constraints over a registry.
 */

import type { WarModelConfig } from '../types/index.js';
import { PropositionRegistry } from '../registry.js';
import { EncodingBuilder, Encoding } from './builder.js';
import { encodeDeckComposition, encodeReveals } from './reveals.js';
import {
    encodeHandOutcome,
    encodeOutcomeExclusivity,
    encodeRoundComparison,
    encodeWarEscalation,
} from './rounds.js';
import { defineFairness } from './fairness.js';

export function encodeWarRules(registry: PropositionRegistry, config: WarModelConfig): Encoding {
    const b = new EncodingBuilder(registry, config);
    encodeReveals(b);
    encodeDeckComposition(b);
    encodeRoundComparison(b);
    encodeOutcomeExclusivity(b);
    encodeWarEscalation(b);
    encodeHandOutcome(b);
    defineFairness(b);
    return b.build();
}

export { EncodingBuilder } from './builder.js';
export type { Encoding } from './builder.js';
export * from './naming.js';
