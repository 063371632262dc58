import express, { Request, Response, Router } from 'express';

import type { FarmController } from '../../farm/farm-controller.js';
import type { SettlementReceipt } from '../../farm/farm-interfaces.js';
import logger from '../../logger.js';
import { errorBody, errorStatus, readAmount, readBoolean, readInteger, readOptionalAmount, readOptionalString, readString, toJson } from './utils.js';

/** Called after every request that may have changed farm state. */
export type ChangeListener = () => void;

/** Entry point for everything paid into the farm: stake, items and the reward-token setup deposits. */
export interface DepositIntake {
    stake(account: string, amount: bigint): bigint;
    stakeItem(account: string, collection: string, tokenId: string): bigint;
    stakeBoost(account: string, collection: string, tokenId: string): bigint;
    setupDeposit(sender: string, token: string, amount: bigint): void;
}

/** Records deposits without moving tokens, for registries that have already taken custody. */
export function directIntake(controller: FarmController): DepositIntake {
    return {
        stake: (account, amount) => controller.stake(account, amount),
        stakeItem: (account, collection, tokenId) => controller.stakeItem(account, collection, tokenId),
        stakeBoost: (account, collection, tokenId) => controller.stakeBoost(account, collection, tokenId),
        setupDeposit: (_sender, token, amount) => controller.setupDeposit(token, amount),
    };
}

function fail(res: Response, route: string, error: unknown): void {
    const status = errorStatus(error);
    if (status >= 500) logger.error(`[http-farm] ${route} failed: ${error instanceof Error ? error.stack : String(error)}`);
    else logger.debug(`[http-farm] ${route} rejected: ${error instanceof Error ? error.message : String(error)}`);
    res.status(status).json(errorBody(error));
}

/**
 * Routes for one farm. Account operations take the acting account as
 * `sender` in the JSON body; amounts are integer strings in base units.
 */
export function createFarmRouter(
    controller: FarmController,
    onChange: ChangeListener = () => undefined,
    intake: DepositIntake = directIntake(controller)
): Router {
    const router: Router = express.Router();

    const sync = (route: string, run: (body: unknown) => unknown) => (req: Request, res: Response) => {
        try {
            const result = run(req.body);
            onChange();
            res.json({ result: toJson(result) });
        } catch (error) {
            fail(res, route, error);
        }
    };

    // Responds once every leg has reconciled, so the caller sees the final outcome.
    const settled = (route: string, run: (body: unknown) => SettlementReceipt<unknown>) => async (req: Request, res: Response) => {
        let receipt: SettlementReceipt<unknown>;
        try {
            receipt = run(req.body);
        } catch (error) {
            fail(res, route, error);
            return;
        }
        onChange();
        try {
            const report = await receipt.settled;
            res.json({ result: toJson(receipt.result), report: toJson(report) });
        } catch (error) {
            fail(res, route, error);
        } finally {
            onChange();
        }
    };

    router.get('/', (req: Request, res: Response) => {
        res.json(toJson(controller.params()));
    });

    router.get('/status/:account', (req: Request, res: Response) => {
        try {
            res.json(toJson(controller.status(req.params.account)));
        } catch (error) {
            fail(res, 'status', error);
        }
    });

    router.get('/deposits/:token', (req: Request, res: Response) => {
        try {
            res.json({ token: req.params.token, expected: controller.expectedDeposit(req.params.token).toString() });
        } catch (error) {
            fail(res, 'deposits', error);
        }
    });

    router.post('/register', sync('register', (body) => controller.register(readString(body, 'sender'))));
    router.post('/stake', sync('stake', (body) => intake.stake(readString(body, 'sender'), readAmount(body, 'amount'))));
    router.post(
        '/stake-item',
        sync('stake-item', (body) => intake.stakeItem(readString(body, 'sender'), readString(body, 'collection'), readString(body, 'tokenId')))
    );
    router.post(
        '/stake-boost',
        sync('stake-boost', (body) => intake.stakeBoost(readString(body, 'sender'), readString(body, 'collection'), readString(body, 'tokenId')))
    );

    router.post('/unstake', settled('unstake', (body) => controller.unstake(readString(body, 'sender'), readAmount(body, 'amount'))));
    router.post(
        '/unstake-item',
        settled('unstake-item', (body) =>
            controller.unstakeItem(readString(body, 'sender'), readString(body, 'collection'), readOptionalString(body, 'tokenId'))
        )
    );
    router.post('/withdraw-boost', settled('withdraw-boost', (body) => controller.withdrawBoost(readString(body, 'sender'))));
    router.post('/harvest', settled('harvest', (body) => controller.harvest(readString(body, 'sender'), readOptionalAmount(body, 'amount'))));
    router.post('/close', settled('close', (body) => controller.close(readString(body, 'sender'))));
    router.post(
        '/withdraw-recovered',
        settled('withdraw-recovered', (body) => controller.withdrawRecovered(readString(body, 'sender'), readString(body, 'token')))
    );

    // Setup and owner operations
    router.post(
        '/setup-deposit',
        sync('setup-deposit', (body) =>
            intake.setupDeposit(readString(body, 'sender'), readString(body, 'token'), readAmount(body, 'amount'))
        )
    );
    router.post('/finalize-setup', sync('finalize-setup', (body) => controller.finalizeSetup(readString(body, 'sender'))));
    router.post('/active', sync('active', (body) => controller.setActive(readString(body, 'sender'), readBoolean(body, 'active'))));
    router.post(
        '/start-end',
        sync('start-end', (body) => controller.setStartEnd(readString(body, 'sender'), readInteger(body, 'start'), readInteger(body, 'end')))
    );
    router.post('/withdraw-fees', settled('withdraw-fees', (body) => controller.withdrawFees(readString(body, 'sender'))));

    return router;
}
