/**
 * Proposition names for the War encoding.
 *
 * Level 0 is the initial comparison; level k >= 1 is the k-th war round.
 * War rounds get their own prefix so no proposition is shared between levels.
 */

export const PLAYERS = ['A', 'B'] as const;
export type Player = typeof PLAYERS[number];

export const WAR_EXHAUSTED = 'war_exhausted';
export const DECK_IS_STACKED = 'deck_is_stacked';

function levelPrefix(level: number): string {
    return level === 0 ? '' : `war${level}_`;
}

export function rankName(player: Player, rank: number, level = 0): string {
    return `${levelPrefix(level)}${player}_card_rank_is_${rank}`;
}

export function roundWinnerName(player: Player, level = 0): string {
    return `${levelPrefix(level)}round_winner_is_${player}`;
}

export function warTriggeredName(level = 0): string {
    return `${levelPrefix(level)}war_triggered`;
}

/**
 * Only war rounds have a reached flag; the initial round is always played.
 */
export function reachedName(level: number): string {
    return `war${level}_reached`;
}

export function handWinnerName(player: Player): string {
    return `hand_winner_is_${player}`;
}

export function stackedForName(player: Player): string {
    return `${DECK_IS_STACKED}_for_${player}`;
}
