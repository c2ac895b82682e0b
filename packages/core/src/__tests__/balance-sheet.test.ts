// =============================================================================
// Balance Sheet Unit Tests
// =============================================================================

import { describe, it, expect } from 'vitest';
import { BalanceSheet } from '../balance-sheet.js';
import { generateParticipantId } from '../participant.js';

const alice = generateParticipantId();
const bob = generateParticipantId();
const carol = generateParticipantId();

describe('BalanceSheet', () => {
    it('reads absent entries as zero without creating them', () => {
        const sheet = new BalanceSheet();
        expect(sheet.get(alice, bob)).toBe(0);
        expect(sheet.has(alice, bob)).toBe(false);
        expect(sheet.snapshot().size).toBe(0);
        expect(Array.from(sheet.entries())).toEqual([]);
    });

    it('accumulates increments per ordered pair', () => {
        const sheet = new BalanceSheet();
        sheet.increment(bob, alice, 100);
        sheet.increment(bob, alice, 50);
        sheet.increment(alice, bob, 20);

        expect(sheet.get(bob, alice)).toBe(150);
        expect(sheet.get(alice, bob)).toBe(20);
    });

    it('ignores zero increments', () => {
        const sheet = new BalanceSheet();
        sheet.increment(bob, alice, 0);
        expect(sheet.snapshot().size).toBe(0);
    });

    it('drops entries and rows that reach zero', () => {
        const sheet = new BalanceSheet();
        sheet.increment(bob, alice, 100);
        sheet.increment(bob, carol, 10);
        sheet.decrement(bob, alice, 100);

        expect(sheet.snapshot()).toEqual(new Map([[bob, new Map([[carol, 10]])]]));
        sheet.decrement(bob, carol, 10);
        expect(sheet.snapshot().size).toBe(0);
    });

    it('refuses to go negative', () => {
        const sheet = new BalanceSheet();
        sheet.increment(bob, alice, 5);
        expect(() => sheet.decrement(bob, alice, 6)).toThrow(RangeError);
        expect(sheet.get(bob, alice)).toBe(5);
    });

    it('lists entries in insertion order', () => {
        const sheet = new BalanceSheet();
        sheet.increment(bob, alice, 1);
        sheet.increment(carol, alice, 2);
        sheet.increment(bob, carol, 3);

        expect(Array.from(sheet.entries())).toEqual([
            [bob, alice, 1],
            [bob, carol, 3],
            [carol, alice, 2],
        ]);
    });

    it('hands out detached snapshots', () => {
        const sheet = new BalanceSheet();
        sheet.increment(bob, alice, 7);
        const snapshot = sheet.snapshot();
        snapshot.get(bob)?.set(alice, 0);
        expect(sheet.get(bob, alice)).toBe(7);
    });
});
