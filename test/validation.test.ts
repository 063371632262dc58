import assert from 'assert';
import { it } from 'node:test';

import validate from '../src/validation/index.js';

it('validate.integer enforces sign, zero and bounds', () => {
    assert.strictEqual(validate.integer(5), true);
    assert.strictEqual(validate.integer(0), false);
    assert.strictEqual(validate.integer(0, true), true);
    assert.strictEqual(validate.integer(-1, true), false);
    assert.strictEqual(validate.integer(-1, true, true), true);
    assert.strictEqual(validate.integer(1.5), false);
    assert.strictEqual(validate.integer('5'), false);
    assert.strictEqual(validate.integer(1001, true, false, 1000), false);
});

it('validate.string checks type and length', () => {
    assert.strictEqual(validate.string('alice', 64, 1), true);
    assert.strictEqual(validate.string('', 64, 1), false);
    assert.strictEqual(validate.string('x'.repeat(65), 64, 1), false);
    assert.strictEqual(validate.string(12, 64), false);
});

it('validate.bigint takes bigints and integer strings', () => {
    assert.strictEqual(validate.bigint(10n), true);
    assert.strictEqual(validate.bigint('10'), true);
    assert.strictEqual(validate.bigint('1e3'), false);
    assert.strictEqual(validate.bigint(10), false);
    assert.strictEqual(validate.bigint('0'), false);
    assert.strictEqual(validate.bigint('0', true), true);
    assert.strictEqual(validate.bigint('-3', true), false);
    assert.strictEqual(validate.bigint('-3', true, true), true);
    assert.strictEqual(validate.bigint(4n, false, false, 5n), false);
    assert.strictEqual(validate.bigint(10n ** 48n), false);
    assert.strictEqual(validate.bigint(11n, false, false, undefined, 10n), false);
});

it('validate.boolean accepts both values and nothing else', () => {
    assert.strictEqual(validate.boolean(true), true);
    assert.strictEqual(validate.boolean(false), true);
    assert.strictEqual(validate.boolean('true'), false);
});
