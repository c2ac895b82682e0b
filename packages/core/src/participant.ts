// =============================================================================
// Potluck — Participants
// =============================================================================

import { v4 as uuidv4 } from 'uuid';
import { parseInput, participantNameSchema } from './schemas.js';
import type { Participant, ParticipantId } from './types.js';

export function generateParticipantId(): ParticipantId {
    return uuidv4() as ParticipantId;
}

/**
 * Create a participant with a fresh id and an empty balance map.
 */
export function createParticipant(name: string): Participant {
    return {
        id: generateParticipantId(),
        name: parseInput(participantNameSchema, name, 'participant name'),
        balances: new Map<ParticipantId, number>(),
    };
}

/** Balance against one counterparty; absent means zero */
export function getBalanceWith(participant: Participant, counterpartyId: ParticipantId): number {
    return participant.balances.get(counterpartyId) ?? 0;
}

export function adjustBalance(participant: Participant, counterpartyId: ParticipantId, delta: number): void {
    const next = getBalanceWith(participant, counterpartyId) + delta;
    if (next === 0) {
        participant.balances.delete(counterpartyId);
    } else {
        participant.balances.set(counterpartyId, next);
    }
}

/**
 * Net position across every counterparty.
 * Positive = owed money overall, negative = owes money overall.
 */
export function getNetBalance(participant: Participant): number {
    let net = 0;
    for (const amount of participant.balances.values()) net += amount;
    return net;
}
