import assert from 'assert';
import { it } from 'node:test';

import { localIntake } from '../src/dev-registry.js';
import { LocalTokenRegistry } from '../src/farm/registry.js';
import { activeFarm, fungibleDefinition, nftDefinition, SCALE, TestClock } from './helpers.js';

const SUPPLY = 1000n * SCALE;

function lpFarm(balances: Record<string, bigint>) {
    const registry = new LocalTokenRegistry('lp-farm', { autoRegister: true });
    for (const [account, amount] of Object.entries(balances)) registry.mint('lp-token', account, amount);
    const clock = new TestClock();
    const controller = activeFarm(fungibleDefinition(), registry, clock);
    for (const account of Object.keys(balances)) controller.register(account);
    return { registry, clock, controller, intake: localIntake(controller, registry) };
}

it('a lone staker over the whole window receives the whole supply', async () => {
    const { registry, clock, controller, intake } = lpFarm({ alice: 1000n });
    intake.stake('alice', 1000n);
    assert.strictEqual(registry.balanceOf('lp-token', 'lp-farm'), 1000n);

    clock.atRound(10);
    const receipt = controller.close('alice');
    await receipt.settled;
    assert.strictEqual(registry.balanceOf('reward-token', 'alice'), SUPPLY);
    assert.strictEqual(registry.balanceOf('lp-token', 'alice'), 1000n);
    assert.deepStrictEqual(controller.params().totalHarvested, [SUPPLY]);
    assert.strictEqual(controller.params().accountsRegistered, 0);
});

it('rounds with nothing staked are forfeited', async () => {
    const { registry, clock, controller, intake } = lpFarm({ alice: 1000n, bob: 1000n });
    clock.atRound(0);
    intake.stake('alice', 1000n);

    clock.atRound(3);
    await controller.unstake('alice', 1000n).settled;
    clock.atRound(5);
    intake.stake('bob', 1000n);

    clock.atRound(10);
    await Promise.all([controller.close('alice').settled, controller.close('bob').settled]);
    assert.strictEqual(registry.balanceOf('reward-token', 'alice'), 300n * SCALE);
    assert.strictEqual(registry.balanceOf('reward-token', 'bob'), 500n * SCALE);
    assert.deepStrictEqual(controller.params().totalHarvested, [800n * SCALE]);
});

it('a late staker shares only the rounds after joining', () => {
    const { clock, controller, intake } = lpFarm({ alice: 500n, bob: 500n });
    clock.atRound(0);
    intake.stake('alice', 500n);
    clock.atRound(2, 30);
    intake.stake('bob', 500n);

    clock.atRound(4);
    assert.strictEqual(controller.status('alice').accruedUnits, 300n * SCALE);
    assert.strictEqual(controller.status('bob').accruedUnits, 100n * SCALE);
});

it('harvest and unstake issued together pay out no more than was accrued', async () => {
    const { registry, clock, controller, intake } = lpFarm({ alice: 1000n });
    clock.atRound(0);
    intake.stake('alice', 1000n);
    clock.atRound(4);

    const harvest = controller.harvest('alice');
    const unstake = controller.unstake('alice', 1000n);
    const again = controller.harvest('alice');
    assert.deepStrictEqual(again.result, [0n]);
    await Promise.all([harvest.settled, unstake.settled, again.settled]);

    assert.strictEqual(registry.balanceOf('reward-token', 'alice'), 400n * SCALE);
    assert.strictEqual(registry.balanceOf('lp-token', 'alice'), 1000n);
    assert.strictEqual(registry.history.length, 2);
});

it('payouts across many accounts never exceed the supply', async () => {
    const { registry, clock, controller, intake } = lpFarm({ alice: 100n, bob: 200n, carol: 400n });
    clock.atRound(0);
    intake.stake('alice', 100n);
    intake.stake('bob', 200n);
    intake.stake('carol', 400n);

    clock.atRound(5, 7);
    await controller.harvest('alice').settled;
    await controller.unstake('bob', 50n).settled;

    clock.atRound(10);
    await Promise.all(['alice', 'bob', 'carol'].map((account) => controller.close(account).settled));
    const paid = ['alice', 'bob', 'carol'].reduce((sum, account) => sum + registry.balanceOf('reward-token', account), 0n);
    assert.deepStrictEqual(controller.params().totalHarvested, [paid]);
    assert.ok(paid <= SUPPLY);
    assert.ok(paid > SUPPLY - 1000n);
    assert.strictEqual(controller.params().totalWeight, 0n);
    assert.strictEqual(controller.params().totalStaked, 0n);
});

it('an item farm returns the items and pays every reward token', async () => {
    const registry = new LocalTokenRegistry('nft-farm', { autoRegister: true });
    registry.mintItem('nft.collection', '1', 'alice');
    registry.mintItem('boost.collection', '7', 'alice');
    const clock = new TestClock();
    const controller = activeFarm(nftDefinition(), registry, clock);
    const intake = localIntake(controller, registry);
    controller.register('alice');

    intake.stakeItem('alice', 'nft.collection', '1');
    intake.stakeBoost('alice', 'boost.collection', '7');
    assert.strictEqual(registry.ownerOf('nft.collection', '1'), 'nft-farm');
    assert.deepStrictEqual(controller.params().totalItems, { 'nft.collection': 1, 'boost.collection': 1 });

    clock.atRound(10);
    const receipt = controller.close('alice');
    assert.deepStrictEqual(receipt.result.rewards, [SUPPLY, SUPPLY / 2n]);
    await receipt.settled;
    assert.strictEqual(registry.ownerOf('nft.collection', '1'), 'alice');
    assert.strictEqual(registry.ownerOf('boost.collection', '7'), 'alice');
    assert.strictEqual(registry.balanceOf('partner-token', 'alice'), SUPPLY / 2n);
    assert.strictEqual(controller.farm.vaults.has('alice'), false);
    assert.deepStrictEqual(controller.params().totalItems, {});
});
