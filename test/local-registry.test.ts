import assert from 'assert';
import { it } from 'node:test';

import { localIntake, seedLocalRegistry } from '../src/dev-registry.js';
import { createFarmState } from '../src/farm/farm-config.js';
import { FarmController } from '../src/farm/farm-controller.js';
import { ValidationError } from '../src/farm/errors.js';
import { LocalTokenRegistry, RegistryError } from '../src/farm/registry.js';
import { activeFarm, fungibleDefinition, nftDefinition, OWNER, TestClock } from './helpers.js';

it('credits need a registered receiver', async () => {
    const registry = new LocalTokenRegistry('lp-farm');
    await assert.rejects(registry.credit('reward-token', 'alice', 5n, 'lp-farm:harvest'), /alice is not registered with reward-token/);

    registry.registerAccount('reward-token', 'alice');
    await registry.credit('reward-token', 'alice', 5n, 'lp-farm:harvest');
    assert.strictEqual(registry.balanceOf('reward-token', 'alice'), 5n);
    assert.deepStrictEqual(registry.history, [
        { kind: 'credit', token: 'reward-token', receiver: 'alice', amount: 5n, memo: 'lp-farm:harvest' },
    ]);

    registry.unregisterAccount('reward-token', 'alice');
    assert.strictEqual(registry.isRegistered('reward-token', 'alice'), false);
});

it('debit transfers pay out of the custodian balance', async () => {
    const registry = new LocalTokenRegistry('lp-farm', { autoRegister: true });
    registry.mint('lp-token', 'lp-farm', 10n);
    await assert.rejects(registry.debitTransfer('lp-token', 'alice', 11n, 'lp-farm:unstake'), RegistryError);
    await registry.debitTransfer('lp-token', 'alice', 4n, 'lp-farm:unstake');
    assert.strictEqual(registry.balanceOf('lp-token', 'lp-farm'), 6n);
    assert.strictEqual(registry.balanceOf('lp-token', 'alice'), 4n);
});

it('transferCall refunds the sender when the receiver throws', () => {
    const registry = new LocalTokenRegistry('lp-farm');
    registry.mint('lp-token', 'alice', 10n);
    assert.throws(() => registry.transferCall('lp-token', 'alice', 11n, () => 0), /alice holds 10 lp-token/);
    assert.throws(
        () =>
            registry.transferCall('lp-token', 'alice', 10n, () => {
                throw new Error('rejected');
            }),
        /rejected/
    );
    assert.strictEqual(registry.balanceOf('lp-token', 'alice'), 10n);
    assert.strictEqual(registry.balanceOf('lp-token', 'lp-farm'), 0n);
    assert.strictEqual(registry.transferCall('lp-token', 'alice', 3n, () => 'kept'), 'kept');
    assert.strictEqual(registry.balanceOf('lp-token', 'lp-farm'), 3n);
});

it('items move only from their owner', async () => {
    const registry = new LocalTokenRegistry('nft-farm');
    registry.mintItem('nft.collection', '1', 'alice');
    assert.throws(() => registry.transferItemCall('nft.collection', '1', 'bob', () => true), /is not held by bob/);
    await assert.rejects(registry.transferItem('nft.collection', 'alice', '1', 'nft-farm:unstake'), /is not held by nft-farm/);

    registry.transferItemCall('nft.collection', '1', 'alice', () => true);
    assert.strictEqual(registry.ownerOf('nft.collection', '1'), 'nft-farm');
    await registry.transferItem('nft.collection', 'alice', '1', 'nft-farm:unstake');
    assert.strictEqual(registry.ownerOf('nft.collection', '1'), 'alice');
});

it('the registry is seeded from the config section', () => {
    const registry = new LocalTokenRegistry('nft-farm');
    seedLocalRegistry(registry, {
        balances: [{ token: 'lp-token', account: 'alice', amount: '250' }],
        items: [{ collection: 'nft.collection', tokenId: '4', owner: 'bob' }],
    });
    assert.strictEqual(registry.balanceOf('lp-token', 'alice'), 250n);
    assert.strictEqual(registry.ownerOf('nft.collection', '4'), 'bob');

    seedLocalRegistry(registry, undefined);
    assert.throws(() => seedLocalRegistry(registry, { balances: {} }), /registry.balances must be an array/);
    assert.throws(
        () => seedLocalRegistry(registry, { balances: [{ token: 'lp-token', account: 'alice', amount: 250 }] }),
        ValidationError
    );
    assert.throws(() => seedLocalRegistry(registry, { items: [{ collection: 'nft.collection', tokenId: '5' }] }), /is missing owner/);
});

it('stake taken through the intake is refunded when the farm refuses it', () => {
    const registry = new LocalTokenRegistry('lp-farm');
    registry.mint('lp-token', 'alice', 100n);
    const clock = new TestClock();
    const controller = new FarmController(createFarmState(fungibleDefinition()), registry, { now: clock.now });
    controller.register('alice');
    const intake = localIntake(controller, registry);

    assert.throws(() => intake.stake('alice', 60n), /does not accept stake while setup/);
    assert.strictEqual(registry.balanceOf('lp-token', 'alice'), 100n);
    assert.strictEqual(controller.farm.totalStaked, 0n);
});

it('items staked through the intake are held by the farm', () => {
    const registry = new LocalTokenRegistry('nft-farm');
    registry.mintItem('nft.collection', '1', 'alice');
    const controller = activeFarm(nftDefinition(), registry, new TestClock());
    controller.register('alice');
    const intake = localIntake(controller, registry);

    assert.throws(() => intake.stakeItem('alice', 'nft.collection', '2'), RegistryError);
    intake.stakeItem('alice', 'nft.collection', '1');
    assert.strictEqual(registry.ownerOf('nft.collection', '1'), 'nft-farm');
    assert.deepStrictEqual(controller.status('alice').stakedItems, [{ collection: 'nft.collection', tokenId: '1' }]);
});

it('setup deposits are taken from the sender before the farm records them', () => {
    const registry = new LocalTokenRegistry('lp-farm');
    const controller = new FarmController(createFarmState(fungibleDefinition()), registry, { now: new TestClock().now });
    const intake = localIntake(controller, registry);
    const expected = controller.expectedDeposit('reward-token');

    assert.throws(() => intake.setupDeposit('nobody', 'reward-token', expected), /nobody holds 0 reward-token/);
    assert.deepStrictEqual(controller.params().deposits, [0n]);
    assert.throws(() => controller.finalizeSetup(OWNER), /Missing deposits for reward-token/);
    assert.strictEqual(controller.phase(), 'setup');

    registry.mint('reward-token', OWNER, expected);
    assert.throws(() => intake.setupDeposit(OWNER, 'reward-token', expected - 1n), ValidationError);
    assert.strictEqual(registry.balanceOf('reward-token', OWNER), expected);

    intake.setupDeposit(OWNER, 'reward-token', expected);
    assert.strictEqual(registry.balanceOf('reward-token', 'lp-farm'), expected);
    assert.strictEqual(registry.balanceOf('reward-token', OWNER), 0n);
    controller.finalizeSetup(OWNER);
    assert.strictEqual(controller.phase(), 'active');
});
