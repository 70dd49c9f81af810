import 'winston';
import { LeveledLogMethod } from 'winston';

// Levels added in logger.ts on top of winston's npm set
declare module 'winston' {
    interface Logger {
        fatal: LeveledLogMethod;
        trace: LeveledLogMethod;
    }
}
