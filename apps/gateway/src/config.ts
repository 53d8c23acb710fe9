import 'dotenv/config';

function intFromEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;

    const value = parseInt(raw, 10);
    if (Number.isNaN(value)) {
        console.warn(`[config] ${name}=${raw} is not a number, using ${fallback}`);
        return fallback;
    }
    return value;
}

// Central Configuration
export const config = {
    port: intFromEnv('PORT', 50051),
    host: process.env.HOST || '0.0.0.0',
    dataDir: process.env.DATA_DIR || 'data',
    immediateResponseTimeoutMs: intFromEnv('IMMEDIATE_RESPONSE_TIMEOUT_MS', 3000),
    pollIntervalMs: intFromEnv('POLL_INTERVAL_MS', 2000),
    maxPolls: intFromEnv('MAX_POLLS', 1800),
    remoteTimeoutMs: intFromEnv('REMOTE_TIMEOUT_MS', 60_000),
    snapshotIntervalMs: intFromEnv('SNAPSHOT_INTERVAL_MS', 300_000),
    taskRetentionSeconds: intFromEnv('TASK_RETENTION_SECONDS', 604_800),
    reaperIntervalMs: intFromEnv('REAPER_INTERVAL_MS', 60_000),
};
