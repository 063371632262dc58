const config = {
    // Fixed-point scale for reward-per-weight, token rates and item weights
    scale: '1000000000000000000000000', // 1e24
    basisPoints: 10000,
    maxFeeRate: 1000, // 10% in basis points
    maxBoost: 50000, // 5x in basis points
    defaultRoundDuration: 60,
    maxRounds: 10_000_000,
    maxValue: '999999999999999999999999999999999999999999999999',
    accountNameMaxLength: 64,
    tokenIdMaxLength: 128,
    // bigint fields are stored zero-padded so they sort in MongoDB
    dbStringLength: 80,
    eventsTopic: 'farm-events',
};

export const SCALE: bigint = BigInt(config.scale);
export const BASIS_POINTS: bigint = BigInt(config.basisPoints);

export default config;
