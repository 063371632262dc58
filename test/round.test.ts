import assert from 'assert';
import { it } from 'node:test';

import { farmingEnd, rewardPerRound, roundIndex, roundsBetween, roundTimestamp } from '../src/farm/round.js';

const schedule = { farmingStart: 1000, roundsTotal: 10, roundDuration: 60 };

it('roundIndex is 0 before and at the farming start', () => {
    assert.strictEqual(roundIndex(schedule, 0), 0);
    assert.strictEqual(roundIndex(schedule, 999), 0);
    assert.strictEqual(roundIndex(schedule, 1000), 0);
    assert.strictEqual(roundIndex(schedule, 1059), 0);
});

it('roundIndex counts whole elapsed rounds', () => {
    assert.strictEqual(roundIndex(schedule, 1060), 1);
    assert.strictEqual(roundIndex(schedule, 1000 + 3 * 60 + 59), 3);
});

it('roundIndex is clamped to roundsTotal after the window', () => {
    assert.strictEqual(farmingEnd(schedule), 1600);
    assert.strictEqual(roundIndex(schedule, 1600), 10);
    assert.strictEqual(roundIndex(schedule, 100000), 10);
});

it('roundTimestamp is the start of the current round', () => {
    assert.strictEqual(roundTimestamp(schedule, 500), 1000);
    assert.strictEqual(roundTimestamp(schedule, 1130), 1120);
    assert.strictEqual(roundTimestamp(schedule, 5000), 1600);
});

it('roundsBetween counts a trailing partial round', () => {
    assert.strictEqual(roundsBetween(0, 600, 60), 10);
    assert.strictEqual(roundsBetween(0, 601, 60), 11);
});

it('rewardPerRound truncates the remainder', () => {
    assert.strictEqual(rewardPerRound(1000n, schedule), 100n);
    assert.strictEqual(rewardPerRound(1009n, schedule), 100n);
});
