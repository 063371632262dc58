// Runtime settings sourced from environment variables

export const apiPort: number = process.env.API_PORT ? Number(process.env.API_PORT) : 3000;
export const logLevel: string = process.env.LOG_LEVEL || 'info';
export const mongoUrl: string = process.env.MONGO_URL || 'mongodb://localhost:27017';
export const mongoDb: string = process.env.MONGO_DB || 'farm';
export const farmConfigPath: string = process.env.FARM_CONFIG || 'config/farm.json';
export const useNotification: boolean = process.env.USE_NOTIFICATION === 'true';
// A remote call that has not answered after this many ms counts as failed; 0 waits forever
export const remoteCallTimeoutMs: number = process.env.REMOTE_CALL_TIMEOUT_MS ? parseInt(process.env.REMOTE_CALL_TIMEOUT_MS) : 30000;

export default {
    apiPort,
    logLevel,
    mongoUrl,
    mongoDb,
    farmConfigPath,
    useNotification,
    remoteCallTimeoutMs,
};
