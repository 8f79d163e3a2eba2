/**
 * War analysis entry point
 *
 * The stable call sequence for outer tools: build the registry, encode the
 * rules, assemble the theory, run a named list of queries and return the
 * answers by name.
 */

import type { Formula, ProgressCallback, QueryOptions, WarModelConfig } from './types/index.js';
import type { SolverBackend } from './engines/interface.js';
import { createSATBackend } from './engines/sat/index.js';
import { createExactlyOne, createProp } from './formula/index.js';
import { resolveConfig, WarModelConfigInput } from './config.js';
import { PropositionRegistry, createRegistry } from './registry.js';
import {
    DECK_IS_STACKED,
    Encoding,
    encodeWarRules,
    rankName,
    roundWinnerName,
    warTriggeredName,
} from './encoder/index.js';
import { assemble } from './assembler.js';
import { Theory, TheorySize } from './theory.js';
import { Likelihood, ModelCount, ModelResult, QueryEngine } from './query.js';

type Given = Record<string, boolean>;

export type NamedQuery =
    | { name: string; kind: 'satisfiable'; given?: Given }
    | { name: string; kind: 'model'; given?: Given }
    | { name: string; kind: 'entailed'; target: string | Formula; given?: Given }
    | { name: string; kind: 'excluded'; target: string | Formula; given?: Given }
    | { name: string; kind: 'count'; subset: string[]; given?: Given }
    | { name: string; kind: 'likelihood'; target: string | Formula; given?: Given };

export type QueryAnswer = boolean | ModelResult | ModelCount | Likelihood;

export interface AnalysisOptions extends QueryOptions {
    backend?: SolverBackend;
}

export interface WarTheory {
    config: WarModelConfig;
    registry: PropositionRegistry;
    encoding: Encoding;
    theory: Theory;
}

export interface AnalysisReport {
    config: WarModelConfig;
    size: TheorySize;
    answers: Map<string, QueryAnswer>;
}

/**
 * Registry, encoding and assembled (self-checked) theory for one configuration.
 */
export function buildWarTheory(
    input: WarModelConfigInput = {},
    options: { backend?: SolverBackend; onProgress?: ProgressCallback } = {}
): WarTheory {
    const config = resolveConfig(input);
    const registry = createRegistry();
    options.onProgress?.(undefined, `Encoding ${config.maxWarDepth + 1} rounds over ${config.ranks} ranks`);
    const encoding = encodeWarRules(registry, config);
    const theory = assemble(registry, encoding, options);
    return { config, registry, encoding, theory };
}

/**
 * Queries that hold or fail for any valid configuration: consistency,
 * first-round outcomes and the stacked-deck check.
 */
export function defaultQueries(config: WarModelConfig): NamedQuery[] {
    const top = config.ranks;
    const firstRound = [
        createProp(roundWinnerName('A')),
        createProp(roundWinnerName('B')),
        createProp(warTriggeredName()),
    ];
    return [
        { name: 'consistent', kind: 'satisfiable' },
        { name: 'a_can_win_first_round', kind: 'satisfiable', given: { [roundWinnerName('A')]: true } },
        { name: 'single_first_round_outcome', kind: 'entailed', target: createExactlyOne(firstRound) },
        {
            name: 'higher_rank_wins',
            kind: 'entailed',
            target: roundWinnerName('A'),
            given: { [rankName('A', top)]: true, [rankName('B', top - 1)]: true },
        },
        {
            name: 'tie_triggers_war',
            kind: 'entailed',
            target: warTriggeredName(),
            given: { [rankName('A', 1)]: true, [rankName('B', 1)]: true },
        },
        { name: 'stacked_deck_entailed', kind: 'entailed', target: DECK_IS_STACKED },
        { name: 'stacked_deck_excluded', kind: 'excluded', target: DECK_IS_STACKED },
    ];
}

function answer(engine: QueryEngine, base: Theory, query: NamedQuery, options: QueryOptions): QueryAnswer {
    const theory = query.given ? base.assume(query.given) : base;
    switch (query.kind) {
        case 'satisfiable':
            return engine.isSatisfiable(theory);
        case 'model':
            return engine.findModel(theory);
        case 'entailed':
            return engine.isEntailed(theory, query.target);
        case 'excluded':
            return engine.isExcluded(theory, query.target);
        case 'count':
            return engine.countModels(theory, query.subset, options);
        case 'likelihood':
            return engine.likelihood(theory, query.target, options);
    }
}

/**
 * Run queries in order. Query names must be unique; a later query with the
 * same name replaces the earlier answer.
 */
export function runQueries(
    theory: Theory,
    queries: readonly NamedQuery[],
    options: AnalysisOptions = {}
): Map<string, QueryAnswer> {
    const engine = new QueryEngine(options.backend ?? createSATBackend(), options);
    const answers = new Map<string, QueryAnswer>();
    queries.forEach((query, i) => {
        options.onProgress?.(i / queries.length, `Running query ${query.name}`);
        answers.set(query.name, answer(engine, theory, query, options));
    });
    return answers;
}

export function analyzeWar(
    input: WarModelConfigInput = {},
    queries?: readonly NamedQuery[],
    options: AnalysisOptions = {}
): AnalysisReport {
    const backend = options.backend ?? createSATBackend();
    const { config, theory } = buildWarTheory(input, { backend, onProgress: options.onProgress });
    const answers = runQueries(theory, queries ?? defaultQueries(config), { ...options, backend });
    return { config, size: theory.size(), answers };
}
