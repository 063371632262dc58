import 'winston';
import { LeveledLogMethod } from 'winston';

declare module 'winston' {
    interface Logger {
        trace: LeveledLogMethod;
        fatal: LeveledLogMethod;
    }
}
