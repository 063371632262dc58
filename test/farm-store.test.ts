import assert from 'assert';
import { it } from 'node:test';

import { fromDocuments, toFarmDocument, toVaultDocument, vaultDocumentId } from '../src/farm/farm-store.js';
import { activeFarm, DeferredRegistry, nftDefinition, SCALE, TestClock } from './helpers.js';

function stakedNftFarm() {
    const clock = new TestClock();
    const controller = activeFarm(nftDefinition(), new DeferredRegistry(), clock);
    controller.register('alice');
    controller.register('bob');
    clock.atRound(0);
    controller.stakeItem('alice', 'nft.collection', '1');
    controller.stakeItem('alice', 'rare.collection', '9');
    controller.stakeBoost('alice', 'boost.collection', '7');
    controller.stakeItem('bob', 'nft.collection', '2');
    clock.atRound(3);
    controller.stakeItem('bob', 'nft.collection', '3');
    return controller.farm;
}

it('amounts are stored as fixed-width strings and collections as values', () => {
    const farm = stakedNftFarm();
    const doc = toFarmDocument(farm, new Date('2026-01-02T03:04:05.000Z'));

    assert.strictEqual(doc._id, 'nft-farm');
    assert.strictEqual(doc.updatedAt, '2026-01-02T03:04:05.000Z');
    assert.strictEqual(doc.totalRewardSupply.length, 80);
    assert.strictEqual(BigInt(doc.totalRewardSupply), 1000n * SCALE);
    assert.deepStrictEqual(doc.stake, {
        kind: 'nft',
        stakeCollections: [
            { collection: 'nft.collection', rate: SCALE.toString().padStart(80, '0') },
            { collection: 'rare.collection', rate: (3n * SCALE).toString().padStart(80, '0') },
        ],
        boostCollections: [{ collection: 'boost.collection', boost: 2500 }],
    });
    assert.deepStrictEqual(doc.totalItems, [
        { collection: 'nft.collection', count: 3 },
        { collection: 'rare.collection', count: 1 },
        { collection: 'boost.collection', count: 1 },
    ]);
});

it('a vault document keys by farm and account', () => {
    const farm = stakedNftFarm();
    const vault = farm.vaults.get('bob');
    assert.ok(vault);
    const doc = toVaultDocument('nft-farm', vault);
    assert.strictEqual(doc._id, vaultDocumentId('nft-farm', 'bob'));
    assert.strictEqual(doc._id, 'nft-farm_bob');
    assert.deepStrictEqual(doc.stakedItems, [{ collection: 'nft.collection', tokenIds: ['2', '3'] }]);
    assert.strictEqual(BigInt(doc.weight), 2n * SCALE);
    assert.strictEqual(doc.boostItem, null);
});

it('a farm read back from its documents equals the one saved', () => {
    const farm = stakedNftFarm();
    const vaultDocs = [...farm.vaults.values()].map((vault) => toVaultDocument('nft-farm', vault));
    const restored = fromDocuments(toFarmDocument(farm), vaultDocs);
    assert.deepStrictEqual(restored, farm);
    assert.notStrictEqual(restored.config.stake, farm.config.stake);
});
