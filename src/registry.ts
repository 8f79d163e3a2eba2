/**
 * Proposition Registry
 *
 * Allocates and names every boolean variable of a theory.
 * Registration is idempotent by name, so rules built in different places can
 * refer to the same proposition without creating duplicate variables.
 */

import {
    createIncompatiblePropositionError,
    createInvalidPropositionError,
} from './types/errors.js';

/**
 * Semantic role of a proposition. Two roles for one name is a construction defect.
 */
export type PropositionRole =
    | 'rank'      // player reveals a rank at a level
    | 'outcome'   // a player wins a round
    | 'war'       // a tie triggers (or exhausts) a war
    | 'progress'  // a war round is reached
    | 'hand'      // a player takes the whole hand
    | 'plain';

export interface Proposition {
    readonly name: string;
    readonly role: PropositionRole;
    /** Registration order, starting at 0 */
    readonly index: number;
}

const NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;

export class PropositionRegistry {
    private readonly byName = new Map<string, Proposition>();

    /**
     * Create a proposition, or return the existing one of the same name.
     * A role given explicitly must match the stored role.
     */
    register(name: string, role?: PropositionRole): Proposition {
        const existing = this.byName.get(name);
        if (existing) {
            if (role !== undefined && role !== existing.role) {
                throw createIncompatiblePropositionError(name, existing.role, role);
            }
            return existing;
        }

        if (!NAME_PATTERN.test(name)) {
            throw createInvalidPropositionError(name);
        }

        const prop: Proposition = Object.freeze({
            name,
            role: role ?? 'plain',
            index: this.byName.size,
        });
        this.byName.set(name, prop);
        return prop;
    }

    get(name: string): Proposition | undefined {
        return this.byName.get(name);
    }

    has(name: string): boolean {
        return this.byName.has(name);
    }

    /**
     * Every registered proposition, in registration order.
     */
    all(): Proposition[] {
        return Array.from(this.byName.values());
    }

    get size(): number {
        return this.byName.size;
    }
}

export function createRegistry(): PropositionRegistry {
    return new PropositionRegistry();
}
