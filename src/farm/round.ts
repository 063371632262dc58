import type { FarmSchedule } from './farm-interfaces.js';

export function farmingEnd(schedule: FarmSchedule): number {
    return schedule.farmingStart + schedule.roundsTotal * schedule.roundDuration;
}

/**
 * Index of the round `now` falls in, counted from the farming start.
 * 0 before the start, `roundsTotal` once the window has closed.
 */
export function roundIndex(schedule: FarmSchedule, now: number): number {
    if (now < schedule.farmingStart) return 0;
    const elapsed = Math.floor((now - schedule.farmingStart) / schedule.roundDuration);
    return Math.min(schedule.roundsTotal, elapsed);
}

/** Start time of the round `now` falls in; the farming end once every round has elapsed. */
export function roundTimestamp(schedule: FarmSchedule, now: number): number {
    return schedule.farmingStart + roundIndex(schedule, now) * schedule.roundDuration;
}

/** Number of rounds covering [start, end); a trailing partial round counts as a full one. */
export function roundsBetween(start: number, end: number, roundDuration: number): number {
    return Math.ceil((end - start) / roundDuration);
}

export function rewardPerRound(totalRewardSupply: bigint, schedule: FarmSchedule): bigint {
    return totalRewardSupply / BigInt(schedule.roundsTotal);
}
