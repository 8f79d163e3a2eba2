import type { Constraint, Formula, WarModelConfig } from '../types/index.js';
import { PropositionRegistry, PropositionRole } from '../registry.js';
import { createProp } from '../formula/index.js';
import { Player, rankName, reachedName } from './naming.js';

/**
 * Output of the rule encoder: hard constraints plus query-only definitions.
 */
export interface Encoding {
    readonly constraints: readonly Constraint[];
    readonly definitions: ReadonlyMap<string, Formula>;
}

/**
 * Collects constraints while registering every proposition it hands out.
 */
export class EncodingBuilder {
    private readonly constraints: Constraint[] = [];
    private readonly definitions = new Map<string, Formula>();

    constructor(
        readonly registry: PropositionRegistry,
        readonly config: WarModelConfig
    ) {}

    prop(name: string, role: PropositionRole): Formula {
        return createProp(this.registry.register(name, role).name);
    }

    /** Modeled levels, 0..maxWarDepth */
    levels(): number[] {
        return Array.from({ length: this.config.maxWarDepth + 1 }, (_, i) => i);
    }

    /** Ranks 1..ranks, lowest first */
    ranks(): number[] {
        return Array.from({ length: this.config.ranks }, (_, i) => i + 1);
    }

    rank(player: Player, rank: number, level: number): Formula {
        return this.prop(rankName(player, rank, level), 'rank');
    }

    reached(level: number): Formula {
        return this.prop(reachedName(level), 'progress');
    }

    require(label: string, formula: Formula): void {
        this.constraints.push(Object.freeze({ label, formula }));
    }

    define(name: string, formula: Formula): void {
        this.definitions.set(name, formula);
    }

    build(): Encoding {
        return {
            constraints: [...this.constraints],
            definitions: new Map(this.definitions),
        };
    }
}
