export interface PoolSeed {
    apr: number;
    periodDays: number;
}

// APRs are scaled by 100: 1000 = 10.00%
const pools: PoolSeed[] = [
    { apr: 1000, periodDays: 30 },
    { apr: 2000, periodDays: 180 },
    { apr: 3000, periodDays: 365 },
];

const config = {
    networkName: 'Lockstake Devnet',
    tokenSymbol: 'STK',
    tokenPrecision: 18,
    // Account that holds staked principal and the reward reserve
    custodyAccount: 'staking-vault',
    ownerAccount: 'ledger-admin',
    genesisBalance: '1000000000000000000000000000',
    daySeconds: 86400,
    pools,
    aprFactor: 10,
    userAprFactor: 500,
    emergencyFee: 10, // percent of principal kept on early exit
    compoundPeriod: 86400,
    stakingSupply: '600000000000000000000000000',
    maxValue: '999999999999999999999999999999',
    maxApr: 1000000,
    maxBatchSize: 200,
    recentEventsBuffer: 1000,
};

export default config;
